// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/core/src/broadcast/broadcaster.ts
// One-shot UDP broadcast of a magic packet. WoL has no acknowledgement, so
// nothing is awaited beyond the local send completing.

import { createSocket } from "dgram";

import { SendFailureError, type SendStage } from "../exceptions.js";
import type { MagicPacket } from "../packet/builder.js";
import { DEFAULT_DESTINATION, DEFAULT_SOURCE, type SocketAddress } from "../types.js";

/**
 * Broadcast the packet from 0.0.0.0:0 to 255.255.255.255:9.
 */
export async function sendMagic(packet: MagicPacket): Promise<void> {
    return sendMagicTo(packet, DEFAULT_SOURCE, DEFAULT_DESTINATION);
}

/**
 * Bind a fresh udp4 socket to `source`, enable broadcast and send the packet
 * as one datagram to `destination`. The socket is closed whether or not the
 * send succeeds.
 *
 * @throws SendFailureError tagged with the stage that failed
 */
export async function sendMagicTo(
    packet: MagicPacket,
    source: SocketAddress,
    destination: SocketAddress,
): Promise<void> {
    // source may be 0 (ephemeral); a datagram cannot go to port 0
    if (!isPort(source.port, 0)) {
        throw new SendFailureError("bind", new RangeError(`Invalid source port: ${source.port}`));
    }
    if (!isPort(destination.port, 1)) {
        throw new SendFailureError("send", new RangeError(`Invalid destination port: ${destination.port}`));
    }

    const payload = packet.bytes();

    return new Promise((resolve, reject) => {
        const socket = createSocket("udp4");
        let stage: SendStage = "bind";
        let settled = false;

        const finish = (err: Error | null): void => {
            if (settled) return;
            settled = true;
            socket.close();
            if (err) reject(new SendFailureError(stage, err));
            else resolve();
        };

        socket.on("error", finish);

        try {
            socket.bind(source.port, source.host, () => {
                stage = "broadcast";
                try {
                    socket.setBroadcast(true);
                    stage = "send";
                    socket.send(payload, destination.port, destination.host, finish);
                } catch (err) {
                    finish(toError(err));
                }
            });
        } catch (err) {
            finish(toError(err));
        }
    });
}

function isPort(port: number, min: number): boolean {
    return Number.isInteger(port) && port >= min && port <= 65535;
}

function toError(err: unknown): Error {
    return err instanceof Error ? err : new Error(String(err));
}
