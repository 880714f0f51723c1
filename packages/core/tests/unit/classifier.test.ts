// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import { describe, it, expect, vi } from "vitest";
import { EducationalClassifier } from "../../src/classifier/educational.js";
import { ZeroShotBackend } from "../../src/classifier/zero-shot/base.js";
import { EDUCATIONAL_LABEL, NON_EDUCATIONAL_LABEL } from "../../src/config/defaults.js";
import { defaultConfig } from "../../src/config/config.js";
import { ClassifierBackendError } from "../../src/exceptions.js";
import type { ZeroShotResult } from "../../src/types.js";

// ── Stub backend ─────────────────────────────────────────────────────────────

class StubBackend extends ZeroShotBackend {
  readonly name = "stub";
  calls: { text: string; labels: readonly string[] }[] = [];

  constructor(private readonly answer: () => ZeroShotResult) {
    super();
  }

  async classify(text: string, candidateLabels: readonly string[]): Promise<ZeroShotResult> {
    this.calls.push({ text, labels: candidateLabels });
    return this.answer();
  }
}

const topEducational = (score: number) => (): ZeroShotResult => ({
  labels: [EDUCATIONAL_LABEL, NON_EDUCATIONAL_LABEL],
  scores: [score, 1 - score],
});

const makeClassifier = (backend: ZeroShotBackend) => new EducationalClassifier({ backend });

// Contains no keyword from either default list.
const INCONCLUSIVE = "What is photosynthesis?";

describe("EducationalClassifier", () => {
  describe("keyword stages", () => {
    it("non-educational keyword wins over an educational one", async () => {
      const backend = new StubBackend(topEducational(0.99));
      const verdict = await makeClassifier(backend).classify("explain the price of a new phone");
      expect(verdict).toEqual({
        educational: false,
        stage: "non_educational_keyword",
        matchedKeyword: "price of",
      });
      expect(backend.calls).toHaveLength(0);
    });

    it("educational keyword admits the text without calling the model", async () => {
      const backend = new StubBackend(topEducational(0.1));
      const classifier = makeClassifier(backend);
      expect(await classifier.isEducational("explain photosynthesis")).toBe(true);
      expect(backend.calls).toHaveLength(0);
    });

    it("matches substrings, not whole words", async () => {
      const classifier = makeClassifier(new StubBackend(topEducational(0.99)));
      const verdict = await classifier.classify("I was watching a documentary about history");
      expect(verdict.stage).toBe("non_educational_keyword");
      expect(verdict.matchedKeyword).toBe("watch");
    });

    it("is case-insensitive on the input text", async () => {
      const classifier = makeClassifier(new StubBackend(topEducational(0.99)));
      expect(await classifier.isEducational("Which Brand of laptop?")).toBe(false);
      expect(await classifier.isEducational("DEFINE entropy")).toBe(true);
    });

    it("lowercases configured keywords", async () => {
      const classifier = new EducationalClassifier({
        backend: new StubBackend(topEducational(0.99)),
        settings: {
          ...defaultConfig.classifier,
          nonEducationalKeywords: ["Should I Buy"],
          educationalKeywords: [],
        },
      });
      const verdict = await classifier.classify("should i buy a telescope?");
      expect(verdict).toEqual({
        educational: false,
        stage: "non_educational_keyword",
        matchedKeyword: "should i buy",
      });
    });
  });

  describe("empty input", () => {
    it.each([[""], [null], [undefined]])("%s → false", async (text) => {
      const backend = new StubBackend(topEducational(0.99));
      const verdict = await makeClassifier(backend).classify(text);
      expect(verdict).toEqual({ educational: false, stage: "empty" });
      expect(backend.calls).toHaveLength(0);
    });
  });

  describe("zero-shot stage", () => {
    it("passes the text and both labels to the backend", async () => {
      const backend = new StubBackend(topEducational(0.9));
      await makeClassifier(backend).classify(INCONCLUSIVE);
      expect(backend.calls).toEqual([
        { text: INCONCLUSIVE, labels: [EDUCATIONAL_LABEL, NON_EDUCATIONAL_LABEL] },
      ]);
    });

    it("educational label at 0.90 → true", async () => {
      const verdict = await makeClassifier(new StubBackend(topEducational(0.9))).classify(INCONCLUSIVE);
      expect(verdict).toEqual({
        educational: true,
        stage: "zero_shot",
        label: EDUCATIONAL_LABEL,
        score: 0.9,
      });
    });

    it("educational label at 0.80 → false", async () => {
      const classifier = makeClassifier(new StubBackend(topEducational(0.8)));
      expect(await classifier.isEducational(INCONCLUSIVE)).toBe(false);
    });

    it("score exactly at the threshold → false", async () => {
      const classifier = makeClassifier(new StubBackend(topEducational(0.85)));
      expect(await classifier.isEducational(INCONCLUSIVE)).toBe(false);
    });

    it("non-educational label on top → false even with high confidence", async () => {
      const backend = new StubBackend(() => ({
        labels: [NON_EDUCATIONAL_LABEL, EDUCATIONAL_LABEL],
        scores: [0.97, 0.03],
      }));
      const verdict = await makeClassifier(backend).classify(INCONCLUSIVE);
      expect(verdict.educational).toBe(false);
      expect(verdict.label).toBe(NON_EDUCATIONAL_LABEL);
    });
  });

  describe("fail open", () => {
    it("backend error → true", async () => {
      const backend = new StubBackend(() => {
        throw new ClassifierBackendError("stub", "HTTP 503");
      });
      const verdict = await makeClassifier(backend).classify(INCONCLUSIVE);
      expect(verdict).toEqual({ educational: true, stage: "backend_error" });
    });

    it("empty backend result → true", async () => {
      const classifier = makeClassifier(new StubBackend(() => ({ labels: [], scores: [] })));
      expect(await classifier.isEducational(INCONCLUSIVE)).toBe(true);
    });

    it("init failure → true", async () => {
      const backend = new StubBackend(topEducational(0.1));
      vi.spyOn(backend, "init").mockRejectedValue(new Error("model download refused"));
      const verdict = await makeClassifier(backend).classify(INCONCLUSIVE);
      expect(verdict.stage).toBe("backend_error");
      expect(backend.calls).toHaveLength(0);
    });
  });

  describe("lifecycle", () => {
    it("initialises the backend once across calls", async () => {
      const backend = new StubBackend(topEducational(0.9));
      const init = vi.spyOn(backend, "init");
      const classifier = makeClassifier(backend);
      await Promise.all([classifier.classify(INCONCLUSIVE), classifier.classify(INCONCLUSIVE)]);
      await classifier.init();
      expect(init).toHaveBeenCalledTimes(1);
    });

    it("retries init after a failure", async () => {
      const backend = new StubBackend(topEducational(0.9));
      const init = vi
        .spyOn(backend, "init")
        .mockRejectedValueOnce(new Error("boom"))
        .mockResolvedValue(undefined);
      const classifier = makeClassifier(backend);
      await expect(classifier.init()).rejects.toThrow("boom");
      await classifier.init();
      expect(init).toHaveBeenCalledTimes(2);
    });

    it("close() tears down only an initialised backend", async () => {
      const backend = new StubBackend(topEducational(0.9));
      const close = vi.spyOn(backend, "close");
      const classifier = makeClassifier(backend);
      await classifier.close();
      expect(close).not.toHaveBeenCalled();
      await classifier.init();
      await classifier.close();
      expect(close).toHaveBeenCalledTimes(1);
    });

    it("close() waits for a pending init before tearing down", async () => {
      const backend = new StubBackend(topEducational(0.9));
      const order: string[] = [];
      let finishInit = (): void => {};
      vi.spyOn(backend, "init").mockImplementation(
        () =>
          new Promise<void>((resolve) => {
            finishInit = () => {
              order.push("init");
              resolve();
            };
          }),
      );
      vi.spyOn(backend, "close").mockImplementation(async () => {
        order.push("close");
      });
      const classifier = makeClassifier(backend);

      const starting = classifier.init();
      const closing = classifier.close();
      await Promise.resolve();
      expect(order).toEqual([]);

      finishInit();
      await Promise.all([starting, closing]);
      expect(order).toEqual(["init", "close"]);
    });

    it("close() skips teardown when the pending init fails", async () => {
      const backend = new StubBackend(topEducational(0.9));
      let failInit = (): void => {};
      vi.spyOn(backend, "init").mockImplementation(
        () =>
          new Promise<void>((_resolve, reject) => {
            failInit = () => reject(new Error("model download refused"));
          }),
      );
      const close = vi.spyOn(backend, "close");
      const classifier = makeClassifier(backend);

      const starting = classifier.init();
      const closing = classifier.close();
      failInit();

      await expect(starting).rejects.toThrow("model download refused");
      await closing;
      expect(close).not.toHaveBeenCalled();
    });
  });
});
