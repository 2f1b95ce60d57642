import { describe, it, expect } from "vitest";
import { ConfigurationError } from "@lanwake/core";
import { formatSocketAddress, parseSocketAddress } from "../../src/address.js";

describe("parseSocketAddress", () => {
    it("parses an IPv4 literal with port", () => {
        expect(parseSocketAddress("192.168.1.255:9")).toEqual({ host: "192.168.1.255", port: 9 });
    });

    it("parses a host name", () => {
        expect(parseSocketAddress("nas.local:7")).toEqual({ host: "nas.local", port: 7 });
    });

    it("accepts port 0 for a source and 65535 for either role", () => {
        expect(parseSocketAddress("0.0.0.0:0", "source").port).toBe(0);
        expect(parseSocketAddress("0.0.0.0:65535", "source").port).toBe(65535);
        expect(parseSocketAddress("192.168.1.255:65535", "destination").port).toBe(65535);
    });

    it("rejects port 0 for a destination", () => {
        expect(() => parseSocketAddress("192.168.1.255:0", "destination")).toThrow(
            'Invalid socket address "192.168.1.255:0": port must be 1-65535',
        );
        expect(() => parseSocketAddress("192.168.1.255:0")).toThrow(ConfigurationError);
    });

    it("rejects a missing port", () => {
        expect(() => parseSocketAddress("192.168.1.255")).toThrow(ConfigurationError);
        expect(() => parseSocketAddress("192.168.1.255:")).toThrow(ConfigurationError);
    });

    it("rejects a missing host", () => {
        expect(() => parseSocketAddress(":9")).toThrow(ConfigurationError);
    });

    it("rejects out-of-range and non-numeric ports", () => {
        expect(() => parseSocketAddress("host:65536")).toThrow("port must be 1-65535");
        expect(() => parseSocketAddress("host:nine", "source")).toThrow("port must be 0-65535");
    });

    it("round-trips through formatSocketAddress", () => {
        expect(formatSocketAddress(parseSocketAddress("10.0.0.255:9"))).toBe("10.0.0.255:9");
    });
});
