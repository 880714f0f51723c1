// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

export { BaseProvider } from "./base.js";
export { OpenAIProvider } from "./openai.js";
export type { OpenAIProviderOptions } from "./openai.js";
