// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * Configuration loader for EduGate.
 * Reads edugate.yaml from the working directory or ~/.edugate/config.yaml.
 * Validates with Zod and provides typed defaults.
 */

import { existsSync, readFileSync } from "fs";
import { homedir } from "os";
import { join } from "path";

import yaml from "js-yaml";
import { z } from "zod";

import { ConfigurationError } from "../exceptions.js";
import type { EduGateConfig } from "../types.js";
import {
  APOLOGY_MESSAGE,
  DISSATISFACTION_TRIGGERS,
  EDUCATIONAL_KEYWORDS,
  EDUCATIONAL_LABEL,
  NON_EDUCATIONAL_KEYWORDS,
  NON_EDUCATIONAL_LABEL,
  SYSTEM_PROMPT,
  TECHNICAL_TRIGGERS,
} from "./defaults.js";

// ── Zod schema ───────────────────────────────────────────────────────────────

const phraseList = (defaults: string[]) => z.array(z.string().min(1)).default(defaults);

const ClassifierSchema = z.object({
  nonEducationalKeywords: phraseList(NON_EDUCATIONAL_KEYWORDS),
  educationalKeywords: phraseList(EDUCATIONAL_KEYWORDS),
  educationalLabel: z.string().min(1).default(EDUCATIONAL_LABEL),
  nonEducationalLabel: z.string().min(1).default(NON_EDUCATIONAL_LABEL),
  confidenceThreshold: z.number().min(0).max(1).default(0.85),
  backend: z.literal("huggingface").default("huggingface"),
  model: z.string().min(1).default("facebook/bart-large-mnli"),
  baseUrl: z.string().url().default("https://router.huggingface.co/hf-inference/models"),
  apiKeyEnv: z.string().min(1).default("HF_API_TOKEN"),
  timeoutSeconds: z.number().positive().default(30),
});

const ModelsSchema = z.object({
  free: z.string().min(1).default("gpt-3.5-turbo"),
  paid: z.string().min(1).default("gpt-4o-mini"),
  reason: z.string().min(1).default("gpt-4o"),
});

const RouterSchema = z.object({
  models: ModelsSchema.default({}),
  complexityThreshold: z.number().int().nonnegative().default(15),
  dissatisfactionTriggers: phraseList(DISSATISFACTION_TRIGGERS),
  technicalTriggers: phraseList(TECHNICAL_TRIGGERS),
  temperature: z.number().min(0).max(2).default(0.5),
  maxTokens: z.number().int().positive().default(2000),
  apologyMessage: z.string().min(1).default(APOLOGY_MESSAGE),
});

const ChatSchema = z.object({
  baseUrl: z.string().url().default("https://openrouter.ai/api/v1"),
  apiKeyEnv: z.string().min(1).default("OPENROUTER_API_KEY"),
  timeoutSeconds: z.number().positive().default(60),
});

const ServerSchema = z.object({
  port: z.number().int().min(0).max(65535).default(3001),
  host: z.string().default("0.0.0.0"),
  allowedOrigins: z.array(z.string()).default(["http://localhost:5173", "http://localhost:5000"]),
  maxUploadMb: z.number().positive().default(16),
  systemPrompt: z.string().default(SYSTEM_PROMPT),
  swagger: z.boolean().default(true),
  apiKey: z.string().optional(),
});

const LoggingSchema = z.object({
  level: z.enum(["trace", "debug", "info", "warn", "error", "fatal"]).default("info"),
  pretty: z.boolean().default(false),
});

const ConfigSchema = z.object({
  classifier: ClassifierSchema.default({}),
  router: RouterSchema.default({}),
  chat: ChatSchema.default({}),
  server: ServerSchema.default({}),
  logging: LoggingSchema.default({}),
});

// ── YAML key → camelCase mapping ─────────────────────────────────────────────

/** Convert snake_case YAML keys to camelCase for Zod schema. */
function toCamel(obj: unknown): unknown {
  if (Array.isArray(obj)) return obj.map(toCamel);
  if (obj !== null && typeof obj === "object") {
    return Object.fromEntries(
      Object.entries(obj).map(([k, v]) => [
        k.replace(/_([a-z])/g, (_, c: string) => c.toUpperCase()),
        toCamel(v),
      ]),
    );
  }
  return obj;
}

// ── Loader ───────────────────────────────────────────────────────────────────

const SEARCH_PATHS = [
  "edugate.yaml",
  "config/edugate.yaml",
  join(homedir(), ".edugate", "config.yaml"),
];

/** Validate an already-parsed (camelCase or snake_case) config object. */
export function parseConfig(raw: unknown, source = "inline config"): EduGateConfig {
  const result = ConfigSchema.safeParse(toCamel(raw ?? {}));
  if (!result.success) {
    const issues = result.error.issues.map((i) => `  ${i.path.join(".")}: ${i.message}`).join("\n");
    throw new ConfigurationError(`Invalid configuration in '${source}':\n${issues}`);
  }
  return result.data;
}

export function loadConfig(configPath?: string): EduGateConfig {
  const paths = configPath ? [configPath] : SEARCH_PATHS;
  const found = paths.find((p) => existsSync(p));

  if (!found) {
    if (configPath) {
      throw new ConfigurationError(`Config file '${configPath}' does not exist`);
    }
    return parseConfig({});
  }

  let raw: unknown;
  try {
    raw = yaml.load(readFileSync(found, "utf8"));
  } catch (err) {
    throw new ConfigurationError(`Failed to read config at '${found}': ${String(err)}`);
  }

  return parseConfig(raw, found);
}

/**
 * Apply deployment overrides from the environment: PORT and ALLOWED_ORIGINS
 * (comma separated). Returns a new object.
 */
export function applyEnvOverrides(
  config: EduGateConfig,
  env: NodeJS.ProcessEnv = process.env,
): EduGateConfig {
  const server = { ...config.server };

  const port = env["PORT"]?.trim();
  if (port) {
    const parsed = Number(port);
    if (!Number.isInteger(parsed) || parsed < 0 || parsed > 65535) {
      throw new ConfigurationError(`PORT must be an integer between 0 and 65535, got '${port}'`);
    }
    server.port = parsed;
  }

  const origins = env["ALLOWED_ORIGINS"]
    ?.split(",")
    .map((o) => o.trim())
    .filter(Boolean);
  if (origins && origins.length > 0) {
    server.allowedOrigins = origins;
  }

  return { ...config, server };
}

export const defaultConfig: EduGateConfig = parseConfig({});
