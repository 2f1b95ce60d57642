// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/core/src/packet/builder.ts
// MagicPacket — Wake-on-LAN payload.
// 6 bytes 0xFF + MAC address repeated 16 times = 102 bytes.

import { MacAddress } from "../mac/mac-address.js";
import { parseMac } from "../mac/parser.js";
import { HEADER, MAC_PER_MAGIC, MAC_SIZE, PACKET_LEN } from "../types.js";

/** Immutable magic packet. The payload buffer never leaves the instance. */
export class MagicPacket {
    readonly length = PACKET_LEN;

    private constructor(
        readonly mac: MacAddress,
        private readonly payload: Buffer,
    ) {}

    /** @internal use {@link buildMagicPacket} */
    static of(mac: MacAddress): MagicPacket {
        const macBuffer = Buffer.from(mac.bytes());
        const packet = Buffer.alloc(PACKET_LEN);

        // sync stream
        packet.set(HEADER, 0);

        for (let i = 0; i < MAC_PER_MAGIC; i++) {
            macBuffer.copy(packet, HEADER.length + i * MAC_SIZE);
        }

        return new MagicPacket(mac, packet);
    }

    /** Copy of the 102 payload bytes. */
    bytes(): Buffer {
        return Buffer.from(this.payload);
    }

    equals(other: MagicPacket): boolean {
        return this.payload.equals(other.payload);
    }

    toHex(): string {
        return this.payload.toString("hex");
    }
}

/** Build the magic packet for a parsed MAC address. */
export function buildMagicPacket(mac: MacAddress): MagicPacket {
    return MagicPacket.of(mac);
}

/**
 * Build a magic packet from raw MAC bytes that did not come through the
 * parser.
 *
 * @throws InvalidMacLengthError unless exactly 6 bytes are given
 * @throws InvalidMacFormatError when an entry is not an integer in 0..255
 */
export function buildFromRawBytes(bytes: ArrayLike<number>): MagicPacket {
    return MagicPacket.of(MacAddress.fromBytes(bytes));
}

/** Parse `text` with {@link parseMac} and build its packet. */
export function buildFromString(text: string, separator: string): MagicPacket {
    return MagicPacket.of(parseMac(text, separator));
}
