// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * BaseProvider: abstract contract that every chat-completion adapter must implement.
 * The model router only ever talks to this surface.
 */

import type { CompletionOptions, LLMResponse, Message } from "../types.js";

export abstract class BaseProvider {
  /** Display name used in logs. */
  abstract readonly name: string;

  /**
   * Single-shot completion. Must return a full LLMResponse including usage stats,
   * and throw a ProviderError when the backend cannot answer.
   */
  abstract complete(messages: Message[], options?: CompletionOptions): Promise<LLMResponse>;

  /** Health check: true if the provider is reachable. */
  abstract healthCheck(): Promise<boolean>;
}
