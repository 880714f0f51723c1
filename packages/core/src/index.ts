// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * EduGate public API.
 * Import from this module when using the classifier or the model router as a library.
 */

export { VERSION } from "./version.js";
export type {
  ClassificationStage,
  ClassificationVerdict,
  CompletionOptions,
  EduGateConfig,
  EscalationDecision,
  EscalationReason,
  LLMResponse,
  LogLevel,
  Message,
  ModelTier,
  RespondOptions,
  TierAttempt,
  TieredResponse,
  ZeroShotResult,
} from "./types.js";
export {
  EduGateError,
  ProviderError,
  ProviderUnavailableError,
  ClassifierBackendError,
  ExtractionError,
  ConfigurationError,
} from "./exceptions.js";
export { loadConfig, parseConfig, applyEnvOverrides, defaultConfig } from "./config/config.js";
export { EducationalClassifier, ZeroShotBackend, HuggingFaceZeroShot, normaliseZeroShot } from "./classifier/index.js";
export type { ClassifierSettings, EducationalClassifierOptions } from "./classifier/index.js";
export { ModelRouter, EscalationPolicy, buildMessages } from "./router/index.js";
export type { ModelRouterOptions, EscalationRules } from "./router/index.js";
export { BaseProvider, OpenAIProvider } from "./providers/index.js";
export { createClassifier, createModelRouter } from "./factory.js";
export { createLogger, silentLogger } from "./utils/logger.js";
export type { Logger } from "./utils/logger.js";
export { maskKey, envVar, requireEnvVar, describeError } from "./utils/security.js";
