// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * Escalation rules: decide whether a question leaves the free tier.
 *
 * Checked in order, first hit wins:
 *   1. dissatisfaction trigger in the previous response
 *   2. word count above the complexity threshold
 *   3. technical trigger phrase in the question
 */

import type { EscalationDecision } from "../types.js";
import { countWords, findPhrase, lowercaseAll } from "../utils/text.js";

export interface EscalationRules {
  complexityThreshold: number;
  dissatisfactionTriggers: readonly string[];
  technicalTriggers: readonly string[];
}

export class EscalationPolicy {
  private readonly threshold: number;
  private readonly dissatisfaction: string[];
  private readonly technical: string[];

  constructor(rules: EscalationRules) {
    this.threshold = rules.complexityThreshold;
    this.dissatisfaction = lowercaseAll(rules.dissatisfactionTriggers);
    this.technical = lowercaseAll(rules.technicalTriggers);
  }

  evaluate(question: string, previousResponse = ""): EscalationDecision {
    const unhappy = findPhrase(previousResponse.toLowerCase(), this.dissatisfaction);
    if (unhappy !== undefined) {
      return { escalate: true, reason: "dissatisfaction", trigger: unhappy };
    }

    if (countWords(question) > this.threshold) {
      return { escalate: true, reason: "complexity" };
    }

    const technical = findPhrase(question.toLowerCase(), this.technical);
    if (technical !== undefined) {
      return { escalate: true, reason: "technical", trigger: technical };
    }

    return { escalate: false };
  }
}
