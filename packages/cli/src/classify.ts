// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import { Command } from "commander";
import chalk from "chalk";
import { createClassifier } from "@edugate/core";

import { describeVerdict } from "./format.js";
import { commandLogger, loadRuntimeConfig, type CommonOptions } from "./runtime.js";

interface ClassifyOptions extends CommonOptions {
    json?: boolean;
}

export const classifyCommand = new Command("classify")
    .description("Check whether a text is educational (no chat model is called)")
    .argument("<text...>", "Text to classify")
    .option("-c, --config <path>", "Path to edugate.yaml")
    .option("--json", "Print the full verdict as JSON")
    .option("-v, --verbose", "Log classifier activity")
    .action(async (words: string[], options: ClassifyOptions) => {
        const config = loadRuntimeConfig(options);
        const classifier = createClassifier(config, commandLogger(config, options));

        try {
            const verdict = await classifier.classify(words.join(" "));
            if (options.json) {
                console.log(JSON.stringify(verdict, null, 2));
                return;
            }
            console.log(verdict.educational ? chalk.green("educational") : chalk.yellow("not educational"));
            console.log(chalk.dim(describeVerdict(verdict)));
        } finally {
            await classifier.close();
        }
    });
