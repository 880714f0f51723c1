// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

export { EducationalClassifier } from "./educational.js";
export type { ClassifierSettings, EducationalClassifierOptions } from "./educational.js";
export { ZeroShotBackend } from "./zero-shot/base.js";
export { HuggingFaceZeroShot, normaliseZeroShot } from "./zero-shot/huggingface.js";
export type { HuggingFaceZeroShotOptions } from "./zero-shot/huggingface.js";
