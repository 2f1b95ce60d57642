// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import { describe, it, expect } from "vitest";
import { buildMagicPacket, buildFromRawBytes, buildFromString } from "../../src/packet/builder.js";
import { parseMac } from "../../src/mac/parser.js";
import { InvalidMacFormatError, InvalidMacLengthError } from "../../src/exceptions.js";
import { PACKET_LEN } from "../../src/types.js";

// ── Helpers ──────────────────────────────────────────────────────────────────

function macGroups(packet: Buffer): number[][] {
    const groups: number[][] = [];
    for (let offset = 6; offset < packet.length; offset += 6) {
        groups.push(Array.from(packet.subarray(offset, offset + 6)));
    }
    return groups;
}

// ── buildMagicPacket ─────────────────────────────────────────────────────────

describe("buildMagicPacket", () => {
    it("produces header + 16 MAC repetitions for 00:01:02:03:04:05", () => {
        const packet = buildMagicPacket(parseMac("00:01:02:03:04:05", ":")).bytes();

        expect(packet).toHaveLength(102);
        expect(Array.from(packet.subarray(0, 6))).toEqual([0xff, 0xff, 0xff, 0xff, 0xff, 0xff]);

        const groups = macGroups(packet);
        expect(groups).toHaveLength(16);
        for (const group of groups) {
            expect(group).toEqual([0x00, 0x01, 0x02, 0x03, 0x04, 0x05]);
        }
    });

    it("is all 0xFF for the broadcast MAC", () => {
        const packet = buildFromRawBytes([0xff, 0xff, 0xff, 0xff, 0xff, 0xff]).bytes();
        expect(packet.length).toBe(PACKET_LEN);
        expect(packet.every((b) => b === 0xff)).toBe(true);
    });

    it("builds byte-identical packets from the same MAC", () => {
        const mac = parseMac("de:ad:be:ef:00:42", ":");
        const a = buildMagicPacket(mac);
        const b = buildMagicPacket(mac);
        expect(a.equals(b)).toBe(true);
        expect(a.bytes().equals(b.bytes())).toBe(true);
    });

    it("keeps a reference to its MAC", () => {
        const packet = buildMagicPacket(parseMac("de:ad:be:ef:00:42", ":"));
        expect(packet.mac.toString()).toBe("de:ad:be:ef:00:42");
        expect(packet.length).toBe(102);
    });

    it("cannot be mutated through bytes()", () => {
        const packet = buildFromRawBytes([1, 2, 3, 4, 5, 6]);
        const copy = packet.bytes();
        copy.fill(0);
        expect(packet.bytes()[0]).toBe(0xff);
        expect(packet.bytes()[6]).toBe(1);
    });

    it("renders as hex", () => {
        const hex = buildFromRawBytes([0x0a, 0x0b, 0x0c, 0x0d, 0x0e, 0x0f]).toHex();
        expect(hex).toBe("ffffffffffff" + "0a0b0c0d0e0f".repeat(16));
    });
});

// ── buildFromRawBytes ────────────────────────────────────────────────────────

describe("buildFromRawBytes", () => {
    it("rejects five bytes", () => {
        expect(() => buildFromRawBytes([1, 2, 3, 4, 5])).toThrow(InvalidMacLengthError);
    });

    it("rejects seven bytes", () => {
        expect(() => buildFromRawBytes([1, 2, 3, 4, 5, 6, 7])).toThrow(InvalidMacLengthError);
    });

    it("rejects an empty sequence", () => {
        expect(() => buildFromRawBytes(new Uint8Array(0))).toThrow(InvalidMacLengthError);
    });

    it("rejects negative byte values", () => {
        expect(() => buildFromRawBytes([1, 2, 3, 4, 5, -1])).toThrow(InvalidMacFormatError);
    });

    it("accepts a Uint8Array", () => {
        const packet = buildFromRawBytes(Uint8Array.of(9, 8, 7, 6, 5, 4)).bytes();
        expect(Array.from(packet.subarray(96, 102))).toEqual([9, 8, 7, 6, 5, 4]);
    });
});

// ── buildFromString ──────────────────────────────────────────────────────────

describe("buildFromString", () => {
    it("parses then builds", () => {
        const packet = buildFromString("01-02-03-04-05-06", "-").bytes();
        expect(macGroups(packet)[15]).toEqual([1, 2, 3, 4, 5, 6]);
    });

    it("propagates parser errors", () => {
        expect(() => buildFromString("01:02:03:04:05", ":")).toThrow(InvalidMacLengthError);
        expect(() => buildFromString("ZZ:02:03:04:05:06", ":")).toThrow(InvalidMacFormatError);
    });
});
