import { Command } from "commander";
import { buildFromString, detectSeparator } from "@lanwake/core";

export const packetCommand = new Command("packet")
    .description("Print the magic packet for a MAC address as hex, without sending it")
    .argument("<mac>", "MAC address")
    .option("-s, --separator <char>", "MAC separator (inferred from the address when omitted)")
    .action((mac: string, options: { separator?: string }) => {
        const packet = buildFromString(mac, options.separator ?? detectSeparator(mac));
        console.log(packet.toHex());
    });
