// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * Core shared types for EduGate.
 * The classifier, the model router, the providers and the HTTP layer all operate on these types.
 */

export type MessageRole = "user" | "assistant" | "system";

export interface Message {
  role: MessageRole;
  content: string;
}

export interface CompletionOptions {
  model?: string;
  temperature?: number;
  maxTokens?: number;
}

/** Normalised response returned by every provider. */
export interface LLMResponse {
  content: string;
  model: string;
  inputTokens: number;
  outputTokens: number;
  latencyMs: number;
}

/** free is the default, paid the escalation target, reason the fallback when paid fails. */
export type ModelTier = "free" | "paid" | "reason";

export type EscalationReason = "dissatisfaction" | "complexity" | "technical";

export interface EscalationDecision {
  escalate: boolean;
  reason?: EscalationReason;
  /** Trigger phrase that fired, when the reason is phrase based. */
  trigger?: string;
}

export interface TierAttempt {
  tier: ModelTier;
  model: string;
  ok: boolean;
  latencyMs: number;
  error?: string;
}

/** Outcome of a routed question. `tier`/`model` are absent when every attempt failed. */
export interface TieredResponse {
  content: string;
  tier?: ModelTier;
  model?: string;
  escalated: boolean;
  reason?: EscalationReason;
  attempts: TierAttempt[];
  trace: string[];
}

export interface RespondOptions {
  previousResponse?: string;
  systemPrompt?: string;
}

export type ClassificationStage =
  | "empty"
  | "non_educational_keyword"
  | "educational_keyword"
  | "zero_shot"
  | "backend_error";

export interface ClassificationVerdict {
  educational: boolean;
  stage: ClassificationStage;
  matchedKeyword?: string;
  /** Top zero-shot label and its score, when the model was consulted. */
  label?: string;
  score?: number;
}

/** Labels ordered by descending score, with a parallel list of scores. */
export interface ZeroShotResult {
  labels: string[];
  scores: number[];
}

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

/** Full configuration schema: loaded from edugate.yaml */
export interface EduGateConfig {
  classifier: {
    nonEducationalKeywords: string[];
    educationalKeywords: string[];
    educationalLabel: string;
    nonEducationalLabel: string;
    confidenceThreshold: number;
    backend: "huggingface";
    model: string;
    baseUrl: string;
    apiKeyEnv: string;
    timeoutSeconds: number;
  };
  router: {
    models: Record<ModelTier, string>;
    complexityThreshold: number;
    dissatisfactionTriggers: string[];
    technicalTriggers: string[];
    temperature: number;
    maxTokens: number;
    apologyMessage: string;
  };
  chat: {
    /** OpenAI-compatible endpoint; OpenRouter by default. */
    baseUrl: string;
    apiKeyEnv: string;
    timeoutSeconds: number;
  };
  server: {
    port: number;
    host: string;
    allowedOrigins: string[];
    maxUploadMb: number;
    systemPrompt: string;
    swagger: boolean;
    apiKey?: string;
  };
  logging: {
    level: LogLevel;
    pretty: boolean;
  };
}
