// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/** Shared constants and types for LanWake. */

/** Bytes in a MAC address. */
export const MAC_SIZE = 6;

/** Times the MAC is repeated inside a magic packet. */
export const MAC_PER_MAGIC = 16;

/** Sync stream that opens every magic packet. */
export const HEADER: readonly number[] = Object.freeze([0xff, 0xff, 0xff, 0xff, 0xff, 0xff]);

export const PACKET_LEN = HEADER.length + MAC_SIZE * MAC_PER_MAGIC;

/** Two hex digits per octet plus one separator between octets. */
export const MAC_STRING_LENGTH = MAC_SIZE * 3 - 1;

/** Separators recognised when inferring the format of a MAC string. */
export const MAC_SEPARATORS = [":", "-", "/"] as const;

export type MacSeparator = (typeof MAC_SEPARATORS)[number];

/** A UDP endpoint. `host` may be an IPv4 literal or a resolvable host name. */
export interface SocketAddress {
  host: string;
  port: number;
}

export const DEFAULT_SOURCE: Readonly<SocketAddress> = Object.freeze({ host: "0.0.0.0", port: 0 });

/** Local-segment broadcast on the discard port, the usual WoL target. */
export const DEFAULT_DESTINATION: Readonly<SocketAddress> = Object.freeze({
  host: "255.255.255.255",
  port: 9,
});
