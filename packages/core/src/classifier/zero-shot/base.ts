// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * ZeroShotBackend: scores a text against arbitrary candidate labels.
 * The classifier owns one instance for the life of the process: init() once, close() on shutdown.
 */

import type { ZeroShotResult } from "../../types.js";

export abstract class ZeroShotBackend {
  abstract readonly name: string;

  /** Prepare the backend (load a model, verify credentials). Called once before the first classify. */
  async init(): Promise<void> {}

  /** Labels ordered by descending score; throws ClassifierBackendError on failure. */
  abstract classify(text: string, candidateLabels: readonly string[]): Promise<ZeroShotResult>;

  /** Release whatever init() acquired. */
  async close(): Promise<void> {}
}
