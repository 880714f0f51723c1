// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import { Command } from "commander";
import chalk from "chalk";
import { createClassifier, createModelRouter } from "@edugate/core";
import { OFF_TOPIC_TEXT } from "@edugate/api";

import { commandLogger, loadRuntimeConfig, type CommonOptions } from "./runtime.js";

interface AskOptions extends CommonOptions {
    previous?: string;
    classify: boolean;
    systemPrompt: boolean;
    explain?: boolean;
}

export const askCommand = new Command("ask")
    .description("Ask a question the same way POST /api/chat/text does")
    .argument("<question...>", "The question")
    .option("-c, --config <path>", "Path to edugate.yaml")
    .option("-p, --previous <text>", "Previous answer or feedback; dissatisfaction escalates the tier")
    .option("--no-classify", "Skip the educational check")
    .option("--no-system-prompt", "Send the question without the tutor system prompt")
    .option("-e, --explain", "Print the routing trace")
    .option("-v, --verbose", "Log router activity")
    .action(async (words: string[], options: AskOptions) => {
        const config = loadRuntimeConfig(options);
        const logger = commandLogger(config, options);
        const question = words.join(" ").trim();
        const router = createModelRouter(config, logger);

        if (options.classify) {
            const classifier = createClassifier(config, logger);
            try {
                if (!(await classifier.isEducational(question))) {
                    console.log(chalk.yellow(OFF_TOPIC_TEXT));
                    return;
                }
            } finally {
                await classifier.close();
            }
        }

        const result = await router.respond(question, {
            previousResponse: options.previous ?? "",
            systemPrompt: options.systemPrompt ? config.server.systemPrompt : undefined,
        });

        console.log(result.content);
        if (options.explain) {
            console.log();
            console.log(chalk.cyan(`tier: ${result.tier ?? "none"}  model: ${result.model ?? "none"}`));
            for (const line of result.trace) {
                console.log(chalk.dim(`  ${line}`));
            }
        }
    });
