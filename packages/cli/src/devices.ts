import { Command } from "commander";
import chalk from "chalk";

import { formatSocketAddress } from "./address.js";
import { loadConfig } from "./config.js";

export const devicesCommand = new Command("devices")
    .description("List devices configured in lanwake.yaml")
    .option("-c, --config <path>", "Path to lanwake.yaml")
    .action((options: { config?: string }) => {
        const config = loadConfig(options.config);
        const names = Object.keys(config.devices).sort();

        if (names.length === 0) {
            console.log(chalk.yellow("No devices configured."));
            return;
        }

        for (const name of names) {
            const device = config.devices[name];
            if (!device) continue;
            const destination = formatSocketAddress(device.destination ?? config.defaults.destination);
            console.log(
                `${chalk.bold(name.padEnd(16))} ${device.mac}  ${chalk.gray(destination)}` +
                    (device.description ? chalk.gray(`  ${device.description}`) : ""),
            );
        }
    });
