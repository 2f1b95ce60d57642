import { Command } from "commander";
import chalk from "chalk";
import {
    buildMagicPacket,
    detectSeparator,
    parseMac,
    sendMagicTo,
    type MacAddress,
    type MagicPacket,
    type SocketAddress,
} from "@lanwake/core";

import { formatSocketAddress, parseSocketAddress } from "./address.js";
import { loadConfig, type LanWakeConfig } from "./config.js";

export interface WakeOptions {
    separator?: string;
    from?: SocketAddress;
    to?: SocketAddress;
}

export interface WakeTarget {
    /** What the user typed: a MAC or a device name */
    label: string;
    mac: MacAddress;
    source: SocketAddress;
    destination: SocketAddress;
}

export type WakeOutcome =
    | { label: string; ok: true; target: WakeTarget; packet: MagicPacket }
    | { label: string; ok: false; error: Error };

export type Sender = (packet: MagicPacket, source: SocketAddress, destination: SocketAddress) => Promise<void>;

/**
 * Turn a CLI target into a MAC plus endpoints. Configured device names win
 * over MAC parsing; command-line endpoints win over configured ones.
 */
export function resolveTarget(label: string, config: LanWakeConfig, opts: WakeOptions = {}): WakeTarget {
    const device = Object.hasOwn(config.devices, label) ? config.devices[label] : undefined;
    const text = device?.mac ?? label;
    const separator = device ? detectSeparator(text) : (opts.separator ?? detectSeparator(text));

    return {
        label,
        mac: parseMac(text, separator),
        source: opts.from ?? config.defaults.source,
        destination: opts.to ?? device?.destination ?? config.defaults.destination,
    };
}

/**
 * Wake every target independently. One failing target never stops the
 * others; each gets its own packet and socket.
 */
export async function wakeTargets(
    labels: string[],
    config: LanWakeConfig,
    opts: WakeOptions = {},
    send: Sender = sendMagicTo,
): Promise<WakeOutcome[]> {
    return Promise.all(
        labels.map(async (label): Promise<WakeOutcome> => {
            try {
                const target = resolveTarget(label, config, opts);
                const packet = buildMagicPacket(target.mac);
                await send(packet, target.source, target.destination);
                return { label, ok: true, target, packet };
            } catch (err) {
                return { label, ok: false, error: err instanceof Error ? err : new Error(String(err)) };
            }
        }),
    );
}

interface WakeCommandOptions {
    separator?: string;
    from?: string;
    to?: string;
    config?: string;
    verbose?: boolean;
}

export const wakeCommand = new Command("wake")
    .description("Send a Wake-on-LAN magic packet to one or more devices")
    .argument("<targets...>", "MAC addresses (AA:BB:CC:DD:EE:FF, AA-BB-…, AA/BB/…) or configured device names")
    .option("-s, --separator <char>", "MAC separator (inferred from the address when omitted)")
    .option("--from <host:port>", "Local address to send from")
    .option("--to <host:port>", "Destination address (default 255.255.255.255:9)")
    .option("-c, --config <path>", "Path to lanwake.yaml")
    .option("-v, --verbose", "Print the packet bytes")
    .action(async (targets: string[], options: WakeCommandOptions) => {
        const config = loadConfig(options.config);
        const opts: WakeOptions = {
            separator: options.separator,
            from: options.from ? parseSocketAddress(options.from, "source") : undefined,
            to: options.to ? parseSocketAddress(options.to, "destination") : undefined,
        };

        const outcomes = await wakeTargets(targets, config, opts);

        for (const outcome of outcomes) {
            if (outcome.ok) {
                const { target, packet } = outcome;
                console.log(
                    chalk.green(`Sent the magic packet to ${target.mac.toString()}`) +
                        chalk.gray(` (${outcome.label} → ${formatSocketAddress(target.destination)})`),
                );
                if (options.verbose) console.log(chalk.gray(packet.toHex()));
            } else {
                console.error(chalk.red(`Failed to send the magic packet to ${outcome.label}: ${outcome.error.message}`));
            }
        }

        if (outcomes.some((o) => !o.ok)) process.exitCode = 1;
    });
