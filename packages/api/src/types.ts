// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.
//
// packages/api/src/types.ts
// Shared types for the EduGate REST API layer. Wire fields stay snake_case.

import type { EduGateConfig, EducationalClassifier, Logger, ModelRouter, ModelTier } from "@edugate/core";

import type { FileKind, TextExtractors } from "./extract/index.js";

// ── Chat ─────────────────────────────────────────────────────────────────────

export interface ChatTextRequest {
    message?: string;
    /** Previous assistant answer or user feedback; dissatisfaction here escalates the model tier. */
    previous_response?: string;
}

export interface ChatAnswer {
    success: true;
    ai_response: string;
    is_educational: boolean;
    /** Tier that produced the answer; null when the apology was returned. */
    model_tier?: ModelTier | null;
}

export interface ErrorBody {
    success?: false;
    error: string;
}

// ── Classify / extract ───────────────────────────────────────────────────────

export interface ClassifyRequest {
    text?: string;
}

export interface ClassifyResponse {
    text: string;
    is_educational: boolean;
}

export interface ExtractResponse {
    success: true;
    extracted_text: string;
}

// ── Health ───────────────────────────────────────────────────────────────────

export interface ProviderHealth {
    name: string;
    status: "ok" | "degraded" | "unavailable";
    latency_ms: number;
}

export interface HealthQuery {
    /** Also check that the chat backend is reachable (one upstream call). */
    providers?: boolean;
}

export interface HealthResponse {
    status: "healthy";
    version: string;
    uptime: number;
    supported_files: Record<FileKind, readonly string[]>;
    classifier: string;
    models: Readonly<Record<ModelTier, string>>;
    chat_provider?: ProviderHealth;
}

// ── Server options ────────────────────────────────────────────────────────────

export interface ApiServerOptions {
    config: EduGateConfig;
    /** Defaults to a router built from config and the credential in `chat.apiKeyEnv`. */
    router?: ModelRouter;
    /** Defaults to the Hugging Face zero-shot classifier from config. */
    classifier?: EducationalClassifier;
    extractors?: TextExtractors;
    logger?: Logger;
    /** API key for authentication (optional, no auth when unset) */
    apiKey?: string;
    /** Enable Swagger UI at /docs; falls back to `server.swagger`. */
    swagger?: boolean;
}

/** Collaborators every route plugin receives. */
export interface RouteDeps {
    router: ModelRouter;
    classifier: EducationalClassifier;
    extractors: TextExtractors;
    systemPrompt: string;
}
