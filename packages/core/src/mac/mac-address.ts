// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/core/src/mac/mac-address.ts
// MacAddress — immutable 6-byte hardware address value.

import { InvalidMacFormatError, InvalidMacLengthError } from "../exceptions.js";
import { MAC_SIZE } from "../types.js";

export class MacAddress {
    private readonly octets: Uint8Array;

    private constructor(octets: Uint8Array) {
        this.octets = octets;
    }

    /**
     * Wrap raw MAC bytes. The input is copied, so later writes to it do not
     * reach the MacAddress.
     */
    static fromBytes(bytes: ArrayLike<number>): MacAddress {
        if (bytes.length !== MAC_SIZE) {
            throw new InvalidMacLengthError(bytes.length, MAC_SIZE);
        }

        const octets = new Uint8Array(MAC_SIZE);
        for (let i = 0; i < MAC_SIZE; i++) {
            const value = bytes[i];
            if (value === undefined || !Number.isInteger(value) || value < 0 || value > 0xff) {
                throw new InvalidMacFormatError(String(Array.from(bytes)), `byte ${i} is not in 0..255`);
            }
            octets[i] = value;
        }
        return new MacAddress(octets);
    }

    /** Copy of the six address bytes. */
    bytes(): Uint8Array {
        return Uint8Array.from(this.octets);
    }

    equals(other: MacAddress): boolean {
        return this.octets.every((b, i) => other.octets[i] === b);
    }

    toString(separator = ":"): string {
        return Array.from(this.octets, (b) => b.toString(16).padStart(2, "0")).join(separator);
    }
}
