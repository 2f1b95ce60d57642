// © 2026 LearnHubPlay BV. All rights reserved.
// packages/core/src/index.ts — public API for @lanwake/core

export { MacAddress } from "./mac/mac-address.js";
export { parseMac, detectSeparator } from "./mac/parser.js";
export { MagicPacket, buildMagicPacket, buildFromRawBytes, buildFromString } from "./packet/builder.js";
export { sendMagic, sendMagicTo } from "./broadcast/broadcaster.js";
export {
    WakeError,
    InvalidMacLengthError,
    InvalidMacFormatError,
    SendFailureError,
    ConfigurationError,
} from "./exceptions.js";
export type { WakeErrorKind, SendStage } from "./exceptions.js";
export {
    MAC_SIZE,
    MAC_PER_MAGIC,
    HEADER,
    PACKET_LEN,
    MAC_STRING_LENGTH,
    MAC_SEPARATORS,
    DEFAULT_SOURCE,
    DEFAULT_DESTINATION,
} from "./types.js";
export type { MacSeparator, SocketAddress } from "./types.js";
