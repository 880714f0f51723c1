// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * Wire the classifier and the model router from a loaded config and the environment.
 * Both are built once per process and shared read-only across requests.
 */

import { EducationalClassifier } from "./classifier/educational.js";
import { HuggingFaceZeroShot } from "./classifier/zero-shot/huggingface.js";
import { ModelRouter } from "./router/router.js";
import type { EduGateConfig } from "./types.js";
import type { Logger } from "./utils/logger.js";
import { envVar, requireEnvVar } from "./utils/security.js";

export function createClassifier(config: EduGateConfig, logger?: Logger): EducationalClassifier {
  const { classifier } = config;
  const backend = new HuggingFaceZeroShot({
    model: classifier.model,
    baseUrl: classifier.baseUrl,
    apiToken: envVar(classifier.apiKeyEnv),
    timeoutMs: classifier.timeoutSeconds * 1000,
  });
  return new EducationalClassifier({ backend, settings: classifier, logger });
}

/** Throws ConfigurationError when the credential named by `chat.apiKeyEnv` is unset. */
export function createModelRouter(config: EduGateConfig, logger?: Logger): ModelRouter {
  return new ModelRouter({
    apiKey: requireEnvVar(config.chat.apiKeyEnv),
    router: config.router,
    chat: config.chat,
    logger,
  });
}
