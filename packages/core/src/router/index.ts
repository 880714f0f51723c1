// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

export { ModelRouter, buildMessages } from "./router.js";
export type { ModelRouterOptions } from "./router.js";
export { EscalationPolicy } from "./escalation.js";
export type { EscalationRules } from "./escalation.js";
