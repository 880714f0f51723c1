// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * OpenAIProvider: chat completions via the OpenAI SDK.
 * Works against any OpenAI-compatible endpoint (OpenRouter by default).
 */

import OpenAI from "openai";

import { ProviderUnavailableError } from "../exceptions.js";
import type { CompletionOptions, LLMResponse, Message } from "../types.js";
import { BaseProvider } from "./base.js";

export interface OpenAIProviderOptions {
  apiKey: string;
  baseUrl?: string;
  defaultModel?: string;
  timeoutMs?: number;
}

export class OpenAIProvider extends BaseProvider {
  readonly name = "openai";
  private readonly client: OpenAI;
  private readonly defaultModel: string;

  constructor(opts: OpenAIProviderOptions) {
    super();
    this.client = new OpenAI({
      apiKey: opts.apiKey,
      baseURL: opts.baseUrl,
      timeout: opts.timeoutMs ?? 60_000,
      // The model router owns fallback; SDK-level retries would hide tier failures.
      maxRetries: 0,
    });
    this.defaultModel = opts.defaultModel ?? "gpt-3.5-turbo";
  }

  async complete(messages: Message[], options: CompletionOptions = {}): Promise<LLMResponse> {
    const model = options.model ?? this.defaultModel;
    const start = Date.now();

    try {
      const response = await this.client.chat.completions.create({
        model,
        messages: messages.map((m) => ({ role: m.role, content: m.content })),
        temperature: options.temperature ?? 0.5,
        max_tokens: options.maxTokens ?? 2000,
        stream: false,
      });

      const choice = response.choices[0];
      const content = choice?.message?.content ?? "";

      return {
        content,
        model,
        inputTokens: response.usage?.prompt_tokens ?? 0,
        outputTokens: response.usage?.completion_tokens ?? 0,
        latencyMs: Date.now() - start,
      };
    } catch (err) {
      throw new ProviderUnavailableError(this.name, describeApiError(err));
    }
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.client.models.list();
      return true;
    } catch {
      return false;
    }
  }
}

/** Status and error class name for logs; SDK errors carry the HTTP status. */
function describeApiError(err: unknown): string {
  if (err instanceof OpenAI.APIError) {
    return `${err.constructor.name} (status ${err.status ?? "n/a"}): ${err.message}`;
  }
  return String(err);
}
