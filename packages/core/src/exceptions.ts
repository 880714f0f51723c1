// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/** Typed error hierarchy for EduGate. */

export class EduGateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "EduGateError";
  }
}

export class ProviderError extends EduGateError {
  constructor(
    message: string,
    public readonly provider: string,
  ) {
    super(message);
    this.name = "ProviderError";
  }
}

export class ProviderUnavailableError extends ProviderError {
  constructor(provider: string, cause?: string) {
    super(`Provider '${provider}' is unavailable${cause ? `: ${cause}` : ""}`, provider);
    this.name = "ProviderUnavailableError";
  }
}

export class ClassifierBackendError extends EduGateError {
  constructor(
    public readonly backend: string,
    cause?: string,
  ) {
    super(`Classifier backend '${backend}' failed${cause ? `: ${cause}` : ""}`);
    this.name = "ClassifierBackendError";
  }
}

export class ExtractionError extends EduGateError {
  constructor(
    public readonly kind: string,
    cause?: string,
  ) {
    super(`Text extraction from ${kind} failed${cause ? `: ${cause}` : ""}`);
    this.name = "ExtractionError";
  }
}

export class ConfigurationError extends EduGateError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}
