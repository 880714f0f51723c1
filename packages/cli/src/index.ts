#!/usr/bin/env node
// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import "dotenv/config";
import { Command } from "commander";
import chalk from "chalk";
import { VERSION, describeError } from "@edugate/core";

import { serveCommand } from "./serve.js";
import { classifyCommand } from "./classify.js";
import { askCommand } from "./ask.js";

const program = new Command();

program
    .name("edugate")
    .description("Educational question gateway: content classifier and tiered model router")
    .version(VERSION);

program.addCommand(serveCommand);
program.addCommand(classifyCommand);
program.addCommand(askCommand);

program.parseAsync(process.argv).catch((err: unknown) => {
    console.error(chalk.red(`\nFatal error: ${describeError(err)}`));
    process.exit(1);
});
