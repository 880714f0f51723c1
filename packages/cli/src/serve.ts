// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import { Command } from "commander";
import chalk from "chalk";
import { applyEnvOverrides } from "@edugate/core";
import { startServer } from "@edugate/api";

import { loadRuntimeConfig, type CommonOptions } from "./runtime.js";

interface ServeOptions extends CommonOptions {
    port?: string;
    swagger: boolean;
}

export const serveCommand = new Command("serve")
    .description("Start the EduGate REST API")
    .option("-c, --config <path>", "Path to edugate.yaml")
    .option("-p, --port <number>", "Port to bind to (overrides config and PORT)")
    .option("--no-swagger", "Disable Swagger UI at /docs")
    .action(async (options: ServeOptions) => {
        let config = loadRuntimeConfig(options);
        if (options.port !== undefined) {
            config = applyEnvOverrides(config, { PORT: options.port });
        }

        console.log(chalk.green(`[EduGate API] Booting on ${config.server.host}:${config.server.port}...`));
        await startServer({ config, swagger: options.swagger ? undefined : false });
    });
