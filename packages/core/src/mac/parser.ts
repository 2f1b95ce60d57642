// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/core/src/mac/parser.ts
// Text → MacAddress. Accepts six 2-digit hex octets joined by one separator,
// e.g. "01:02:03:04:05:06", "01-02-03-04-05-06" or "01/02/03/04/05/06".

import { InvalidMacFormatError, InvalidMacLengthError } from "../exceptions.js";
import { MAC_SEPARATORS, MAC_SIZE, MAC_STRING_LENGTH } from "../types.js";
import { MacAddress } from "./mac-address.js";

const OCTET = /^[\da-f]{2}$/i;
const SEPARATORS: ReadonlySet<string> = new Set(MAC_SEPARATORS);

/**
 * Parse a MAC address string.
 *
 * The length is checked before splitting, so a stray digit that shifts the
 * field boundaries ("01002:03:04:05:06") fails as a format error rather than
 * being tokenized into something plausible.
 *
 * @throws InvalidMacLengthError when `text` is not exactly 17 bytes of UTF-8
 * @throws InvalidMacFormatError when a field is not a 2-digit hex octet or
 *   the separator does not yield exactly six fields
 */
export function parseMac(text: string, separator: string): MacAddress {
    const length = Buffer.byteLength(text, "utf8");
    if (length !== MAC_STRING_LENGTH) {
        throw new InvalidMacLengthError(length, MAC_STRING_LENGTH);
    }
    if (separator.length !== 1) {
        throw new InvalidMacFormatError(text, `separator must be one character, got "${separator}"`);
    }

    const fields = text.split(separator);
    if (fields.length !== MAC_SIZE) {
        throw new InvalidMacFormatError(text, `expected ${MAC_SIZE} fields, got ${fields.length}`);
    }

    const bytes = fields.map((field) => {
        if (!OCTET.test(field)) {
            throw new InvalidMacFormatError(text, `"${field}" is not a hex octet`);
        }
        return parseInt(field, 16);
    });

    return MacAddress.fromBytes(bytes);
}

/**
 * First of `:`, `-` or `/` found scanning left to right, or `fallback` when
 * the string holds none of them.
 */
export function detectSeparator(text: string, fallback: string = ":"): string {
    for (const ch of text) {
        if (SEPARATORS.has(ch)) return ch;
    }
    return fallback;
}
