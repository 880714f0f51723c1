// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import { pino, type Logger } from "pino";

import type { LogLevel } from "../types.js";

export type { Logger };

/**
 * Process-wide pino logger. The HTTP server hands the same instance to Fastify
 * so request logs and routing logs share one stream.
 */
export function createLogger(level: LogLevel = "info", pretty = false): Logger {
  return pino({
    name: "edugate",
    level,
    ...(pretty ? { transport: { target: "pino-pretty", options: { colorize: true } } } : {}),
  });
}

/** Logger that drops everything; default for library use and tests. */
export const silentLogger: Logger = pino({ level: "silent" });
