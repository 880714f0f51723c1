// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * HuggingFaceZeroShot: hosted zero-shot classification through the Hugging Face inference API.
 * Docs: https://huggingface.co/docs/inference-providers/tasks/zero-shot-classification
 */

import { z } from "zod";

import { ClassifierBackendError } from "../../exceptions.js";
import type { ZeroShotResult } from "../../types.js";
import { ZeroShotBackend } from "./base.js";

interface ZeroShotRequest {
  inputs: string;
  parameters: { candidate_labels: string[] };
}

// The endpoint has answered in both shapes over time.
const ParallelListsSchema = z.object({
  labels: z.array(z.string()),
  scores: z.array(z.number()),
});
const LabelScoreListSchema = z.array(z.object({ label: z.string(), score: z.number() }));

export interface HuggingFaceZeroShotOptions {
  model: string;
  baseUrl: string;
  apiToken?: string;
  timeoutMs?: number;
}

export class HuggingFaceZeroShot extends ZeroShotBackend {
  readonly name: string;
  private readonly url: string;
  private readonly apiToken: string | undefined;
  private readonly timeoutMs: number;

  constructor(opts: HuggingFaceZeroShotOptions) {
    super();
    const base = opts.baseUrl.endsWith("/") ? opts.baseUrl.slice(0, -1) : opts.baseUrl;
    this.url = `${base}/${opts.model}`;
    this.apiToken = opts.apiToken;
    this.timeoutMs = opts.timeoutMs ?? 30_000;
    this.name = `huggingface[${opts.model}]`;
  }

  async classify(text: string, candidateLabels: readonly string[]): Promise<ZeroShotResult> {
    const body: ZeroShotRequest = {
      inputs: text,
      parameters: { candidate_labels: [...candidateLabels] },
    };
    const headers: Record<string, string> = { "Content-Type": "application/json" };
    if (this.apiToken) headers["Authorization"] = `Bearer ${this.apiToken}`;

    let resp: Response;
    try {
      resp = await fetch(this.url, {
        method: "POST",
        headers,
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      throw new ClassifierBackendError(this.name, String(err));
    }

    if (!resp.ok) {
      throw new ClassifierBackendError(this.name, `HTTP ${resp.status}`);
    }

    let payload: unknown;
    try {
      payload = await resp.json();
    } catch (err) {
      throw new ClassifierBackendError(this.name, `invalid JSON: ${String(err)}`);
    }

    return normaliseZeroShot(payload, this.name);
  }
}

/** Accept either response shape and sort by descending score. */
export function normaliseZeroShot(payload: unknown, backend = "zero-shot"): ZeroShotResult {
  let pairs: { label: string; score: number }[];

  const parallel = ParallelListsSchema.safeParse(payload);
  if (parallel.success) {
    const { labels, scores } = parallel.data;
    if (labels.length !== scores.length) {
      throw new ClassifierBackendError(backend, "labels and scores differ in length");
    }
    pairs = labels.map((label, i) => ({ label, score: scores[i] ?? 0 }));
  } else {
    const list = LabelScoreListSchema.safeParse(payload);
    if (!list.success) {
      throw new ClassifierBackendError(backend, "unexpected response shape");
    }
    pairs = list.data;
  }

  if (pairs.length === 0) {
    throw new ClassifierBackendError(backend, "no labels returned");
  }

  const sorted = [...pairs].sort((a, b) => b.score - a.score);
  return { labels: sorted.map((p) => p.label), scores: sorted.map((p) => p.score) };
}
