#!/usr/bin/env -S node --import tsx

import { Command } from "commander";
import chalk from "chalk";

import { wakeCommand } from "./wake.js";
import { devicesCommand } from "./devices.js";
import { packetCommand } from "./packet.js";

const program = new Command();

program
    .name("lanwake")
    .description("Wake devices on the local network with Wake-on-LAN magic packets")
    .version("1.0.0");

program.addCommand(wakeCommand);
program.addCommand(devicesCommand);
program.addCommand(packetCommand);

program.parseAsync(process.argv).catch((err: unknown) => {
    console.error(chalk.red(`\nFatal error: ${err instanceof Error ? err.message : String(err)}`));
    process.exit(1);
});
