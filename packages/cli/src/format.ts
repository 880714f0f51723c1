// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import type { ClassificationVerdict } from "@edugate/core";

export function describeVerdict(verdict: ClassificationVerdict): string {
    switch (verdict.stage) {
        case "empty":
            return "empty input";
        case "non_educational_keyword":
            return `matched non-educational keyword '${verdict.matchedKeyword ?? ""}'`;
        case "educational_keyword":
            return `matched educational keyword '${verdict.matchedKeyword ?? ""}'`;
        case "zero_shot":
            return `zero-shot score ${(verdict.score ?? 0).toFixed(3)} for '${verdict.label ?? ""}'`;
        case "backend_error":
            return "classifier backend unavailable, text admitted";
    }
}
