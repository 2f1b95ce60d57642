import { ConfigurationError, type SocketAddress } from "@lanwake/core";

export type AddressRole = "source" | "destination";

/**
 * Parse "host:port" (IPv4 literal or host name). Only a source may use port 0,
 * which asks for an ephemeral port; nothing can be sent to port 0.
 */
export function parseSocketAddress(text: string, role: AddressRole = "destination"): SocketAddress {
    const sep = text.lastIndexOf(":");
    const host = text.slice(0, sep).trim();
    const portText = text.slice(sep + 1).trim();

    if (sep <= 0 || host.length === 0 || host.includes(":")) {
        throw new ConfigurationError(`Invalid socket address "${text}": expected host:port`);
    }
    const minPort = role === "source" ? 0 : 1;
    if (!/^\d{1,5}$/.test(portText) || Number(portText) < minPort || Number(portText) > 65535) {
        throw new ConfigurationError(`Invalid socket address "${text}": port must be ${minPort}-65535`);
    }

    return { host, port: Number(portText) };
}

export function formatSocketAddress(address: SocketAddress): string {
    return `${address.host}:${address.port}`;
}
