// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * ModelRouter: picks an LLM tier for a question and runs the completion.
 *
 * Pipeline:
 *   1. Escalation check → free, or paid
 *   2. Execute on the chosen tier
 *   3. paid returned nothing → retry once on reason
 *   4. Every attempt failed → apology message
 *
 * Paths: free → done | paid → done | paid ✗ → reason → done | paid ✗ → reason ✗ → apology.
 * `respond` and `getResponse` never throw.
 */

import { ConfigurationError } from "../exceptions.js";
import { defaultConfig } from "../config/config.js";
import { BaseProvider } from "../providers/base.js";
import { OpenAIProvider } from "../providers/openai.js";
import type {
  EduGateConfig,
  EscalationDecision,
  Message,
  ModelTier,
  RespondOptions,
  TierAttempt,
  TieredResponse,
} from "../types.js";
import { describeError, maskKey } from "../utils/security.js";
import { silentLogger, type Logger } from "../utils/logger.js";
import { EscalationPolicy } from "./escalation.js";

export interface ModelRouterOptions {
  /** Credential for the completion backend. Required, even when a provider is injected. */
  apiKey: string | undefined;
  router?: EduGateConfig["router"];
  chat?: EduGateConfig["chat"];
  /** Completion backend; defaults to an OpenAIProvider built from `apiKey` and `chat`. */
  provider?: BaseProvider;
  logger?: Logger;
}

/** Tier to try when the escalated tier returns nothing. */
const FALLBACK: Partial<Record<ModelTier, ModelTier>> = { paid: "reason" };

export class ModelRouter {
  readonly provider: BaseProvider;
  private readonly settings: EduGateConfig["router"];
  private readonly escalation: EscalationPolicy;
  private readonly log: Logger;

  constructor(opts: ModelRouterOptions) {
    const apiKey = opts.apiKey?.trim();
    if (!apiKey) {
      throw new ConfigurationError("API key is required to construct the model router.");
    }

    const chat = opts.chat ?? defaultConfig.chat;
    this.settings = opts.router ?? defaultConfig.router;
    this.escalation = new EscalationPolicy(this.settings);
    this.log = (opts.logger ?? silentLogger).child({ component: "router" });
    this.provider =
      opts.provider ??
      new OpenAIProvider({
        apiKey,
        baseUrl: chat.baseUrl,
        defaultModel: this.settings.models.free,
        timeoutMs: chat.timeoutSeconds * 1000,
      });

    this.log.debug(
      { provider: this.provider.name, key: maskKey(apiKey), models: this.settings.models },
      "model router ready",
    );
  }

  get models(): Readonly<Record<ModelTier, string>> {
    return this.settings.models;
  }

  /** True when the question should skip the free tier. */
  needsPaidModel(question: string, previousResponse = ""): boolean {
    return this.escalation.evaluate(question, previousResponse).escalate;
  }

  explainEscalation(question: string, previousResponse = ""): EscalationDecision {
    return this.escalation.evaluate(question, previousResponse);
  }

  /** Answer text only; the apology message when every attempt failed. */
  async getResponse(question: string, previousResponse = "", systemPrompt?: string): Promise<string> {
    const result = await this.respond(question, { previousResponse, systemPrompt });
    return result.content;
  }

  /** Route a question and return the full decision. */
  async respond(question: string, options: RespondOptions = {}): Promise<TieredResponse> {
    const trace: string[] = [];
    const attempts: TierAttempt[] = [];
    const decision = this.escalation.evaluate(question, options.previousResponse ?? "");

    let tier: ModelTier = decision.escalate ? "paid" : "free";
    trace.push(
      decision.escalate
        ? `escalate: ${decision.reason}${decision.trigger ? ` ('${decision.trigger}')` : ""} → paid`
        : `escalate: no → free`,
    );

    const messages = buildMessages(question, options.systemPrompt);

    for (;;) {
      const attempt = await this.query(tier, messages);
      attempts.push(attempt.record);

      if (attempt.content) {
        trace.push(`${tier}: ok (${attempt.record.model}, ${attempt.record.latencyMs}ms)`);
        this.log.info(
          { tier, model: attempt.record.model, escalated: decision.escalate, reason: decision.reason },
          "response generated",
        );
        return {
          content: attempt.content,
          tier,
          model: attempt.record.model,
          escalated: decision.escalate,
          reason: decision.reason,
          attempts,
          trace,
        };
      }

      trace.push(`${tier}: no response${attempt.record.error ? ` (${attempt.record.error})` : ""}`);
      const next: ModelTier | undefined = FALLBACK[tier];
      if (!next) break;
      this.log.warn({ from: tier, to: next }, "falling back to next tier");
      tier = next;
    }

    trace.push("all tiers failed → apology");
    this.log.error(
      { attempts: attempts.map((a) => `${a.tier}:${a.model}`) },
      "no tier produced a response",
    );
    return {
      content: this.settings.apologyMessage,
      escalated: decision.escalate,
      reason: decision.reason,
      attempts,
      trace,
    };
  }

  /** One completion call. Errors and empty answers come back as an attempt without content. */
  private async query(
    tier: ModelTier,
    messages: Message[],
  ): Promise<{ content: string | null; record: TierAttempt }> {
    const model = this.settings.models[tier];
    const start = Date.now();

    try {
      const response = await this.provider.complete(messages, {
        model,
        temperature: this.settings.temperature,
        maxTokens: this.settings.maxTokens,
      });
      const latencyMs = Date.now() - start;
      if (!response.content) {
        this.log.warn({ tier, model, operation: "chat.complete" }, "empty completion");
        return { content: null, record: { tier, model, ok: false, latencyMs, error: "empty response" } };
      }
      return { content: response.content, record: { tier, model, ok: true, latencyMs } };
    } catch (err) {
      const error = describeError(err);
      this.log.error(
        { tier, model, operation: "chat.complete", provider: this.provider.name, err: error },
        "completion call failed",
      );
      return { content: null, record: { tier, model, ok: false, latencyMs: Date.now() - start, error } };
    }
  }
}

export function buildMessages(question: string, systemPrompt?: string): Message[] {
  const messages: Message[] = [];
  if (systemPrompt) {
    messages.push({ role: "system", content: systemPrompt });
  }
  messages.push({ role: "user", content: question });
  return messages;
}
