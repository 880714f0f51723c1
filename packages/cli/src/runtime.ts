// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import { applyEnvOverrides, createLogger, loadConfig, type EduGateConfig, type Logger } from "@edugate/core";

export interface CommonOptions {
    config?: string;
    verbose?: boolean;
}

/** edugate.yaml (or defaults) with PORT / ALLOWED_ORIGINS applied from the environment. */
export function loadRuntimeConfig(options: CommonOptions): EduGateConfig {
    return applyEnvOverrides(loadConfig(options.config));
}

/** Keep stdout for command output: only warnings unless --verbose. */
export function commandLogger(config: EduGateConfig, options: CommonOptions): Logger {
    return createLogger(options.verbose ? "debug" : "warn", config.logging.pretty);
}
