// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * EducationalClassifier: decides whether a text is in scope for the tutor.
 *
 * Cascade, first decisive stage wins:
 *   1. empty text                      → false
 *   2. non-educational keyword present → false
 *   3. educational keyword present     → true
 *   4. zero-shot model: educational label on top with score > threshold → true, else false
 *   5. zero-shot backend error         → true (fail open)
 *
 * Keywords are plain substrings of the lowercased text.
 */

import { defaultConfig } from "../config/config.js";
import type { ClassificationVerdict, EduGateConfig } from "../types.js";
import { silentLogger, type Logger } from "../utils/logger.js";
import { describeError } from "../utils/security.js";
import { findPhrase, lowercaseAll } from "../utils/text.js";
import { ZeroShotBackend } from "./zero-shot/base.js";

export type ClassifierSettings = Pick<
  EduGateConfig["classifier"],
  | "nonEducationalKeywords"
  | "educationalKeywords"
  | "educationalLabel"
  | "nonEducationalLabel"
  | "confidenceThreshold"
>;

export interface EducationalClassifierOptions {
  backend: ZeroShotBackend;
  settings?: ClassifierSettings;
  logger?: Logger;
}

export class EducationalClassifier {
  private readonly backend: ZeroShotBackend;
  private readonly nonEducational: string[];
  private readonly educational: string[];
  private readonly labels: readonly [string, string];
  private readonly threshold: number;
  private readonly log: Logger;
  private ready: Promise<void> | null = null;

  constructor(opts: EducationalClassifierOptions) {
    const settings = opts.settings ?? defaultConfig.classifier;
    this.backend = opts.backend;
    this.nonEducational = lowercaseAll(settings.nonEducationalKeywords);
    this.educational = lowercaseAll(settings.educationalKeywords);
    this.labels = [settings.educationalLabel, settings.nonEducationalLabel];
    this.threshold = settings.confidenceThreshold;
    this.log = (opts.logger ?? silentLogger).child({ component: "classifier" });
  }

  get backendName(): string {
    return this.backend.name;
  }

  /**
   * Initialise the zero-shot backend. Idempotent; concurrent callers share one
   * initialisation. A failed init is retried on the next call.
   */
  init(): Promise<void> {
    if (!this.ready) {
      this.ready = this.backend.init().catch((err: unknown) => {
        this.ready = null;
        throw err;
      });
    }
    return this.ready;
  }

  /** Waits for a pending init; a backend whose init failed has nothing to release. */
  async close(): Promise<void> {
    const pending = this.ready;
    if (!pending) return;
    this.ready = null;
    const started = await pending.then(
      () => true,
      () => false,
    );
    if (started) await this.backend.close();
  }

  async isEducational(text: string | null | undefined): Promise<boolean> {
    const verdict = await this.classify(text);
    return verdict.educational;
  }

  /** Full verdict, including which stage of the cascade decided. */
  async classify(text: string | null | undefined): Promise<ClassificationVerdict> {
    if (!text) {
      return { educational: false, stage: "empty" };
    }

    const lower = text.toLowerCase();

    const blocked = findPhrase(lower, this.nonEducational);
    if (blocked !== undefined) {
      return { educational: false, stage: "non_educational_keyword", matchedKeyword: blocked };
    }

    const allowed = findPhrase(lower, this.educational);
    if (allowed !== undefined) {
      return { educational: true, stage: "educational_keyword", matchedKeyword: allowed };
    }

    try {
      await this.init();
      const result = await this.backend.classify(text, this.labels);
      const label = result.labels[0];
      const score = result.scores[0];
      if (label === undefined || score === undefined) {
        throw new Error("zero-shot backend returned no labels");
      }
      const educational = label === this.labels[0] && score > this.threshold;
      this.log.debug({ backend: this.backend.name, educational, score }, "zero-shot verdict");
      return { educational, stage: "zero_shot", label, score };
    } catch (err) {
      this.log.error(
        { backend: this.backend.name, operation: "zero-shot.classify", err: describeError(err) },
        "classifier backend failed; admitting text",
      );
      return { educational: true, stage: "backend_error" };
    }
  }
}
