// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import { describe, it, expect } from "vitest";
import { ModelRouter, buildMessages } from "../../src/router/router.js";
import { APOLOGY_MESSAGE } from "../../src/config/defaults.js";
import { ConfigurationError, ProviderUnavailableError } from "../../src/exceptions.js";
import type { CompletionOptions, LLMResponse, Message } from "../../src/types.js";
import { BaseProvider } from "../../src/providers/base.js";

// ── Mock provider ────────────────────────────────────────────────────────────

type Behaviour = "ok" | "throw" | "empty";

interface Call {
  model: string | undefined;
  messages: Message[];
  options: CompletionOptions;
}

class MockProvider extends BaseProvider {
  readonly name = "mock";
  readonly calls: Call[] = [];

  constructor(private readonly behaviour: Record<string, Behaviour> = {}) {
    super();
  }

  async complete(messages: Message[], options: CompletionOptions = {}): Promise<LLMResponse> {
    const model = options.model;
    this.calls.push({ model, messages, options });
    const mode = (model && this.behaviour[model]) ?? "ok";
    if (mode === "throw") throw new ProviderUnavailableError(this.name, "HTTP 502");
    return {
      content: mode === "empty" ? "" : `answer from ${model}`,
      model: model ?? "unknown",
      inputTokens: 10,
      outputTokens: 20,
      latencyMs: 5,
    };
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }

  get models(): (string | undefined)[] {
    return this.calls.map((c) => c.model);
  }
}

// ── Fixtures ─────────────────────────────────────────────────────────────────

const FREE = "gpt-3.5-turbo";
const PAID = "gpt-4o-mini";
const REASON = "gpt-4o";

const makeRouter = (behaviour: Record<string, Behaviour> = {}) => {
  const provider = new MockProvider(behaviour);
  const router = new ModelRouter({ apiKey: "test-secret", provider });
  return { router, provider };
};

const words = (n: number) => Array.from({ length: n }, (_, i) => `word${i}`).join(" ");

// ── Tests ─────────────────────────────────────────────────────────────────────

describe("ModelRouter", () => {
  describe("construction", () => {
    it.each([[undefined], [""], ["   "]])("rejects credential %j", (apiKey) => {
      expect(() => new ModelRouter({ apiKey, provider: new MockProvider() })).toThrow(
        ConfigurationError,
      );
    });

    it("builds an OpenAI provider when none is injected", () => {
      const router = new ModelRouter({ apiKey: "test-secret" });
      expect(router.provider.name).toBe("openai");
    });
  });

  describe("needsPaidModel()", () => {
    const { router } = makeRouter();

    it("short plain question → false", () => {
      expect(router.needsPaidModel("What is an atom?")).toBe(false);
    });

    it("exactly 15 words → false", () => {
      expect(router.needsPaidModel(words(15))).toBe(false);
    });

    it("16 words → true", () => {
      expect(router.needsPaidModel(words(16))).toBe(true);
    });

    it("dissatisfaction in previous response → true, case-insensitive", () => {
      expect(router.needsPaidModel("What is an atom?", "I am NOT SATISFIED with that")).toBe(true);
    });

    it("technical phrase → true", () => {
      expect(router.needsPaidModel("Prove that root two is irrational")).toBe(true);
    });

    it("reports the reason and trigger", () => {
      expect(router.explainEscalation("Please go step-by-step", "")).toEqual({
        escalate: true,
        reason: "technical",
        trigger: "step-by-step",
      });
      expect(router.explainEscalation("hi", "needs more detail")).toEqual({
        escalate: true,
        reason: "dissatisfaction",
        trigger: "more detail",
      });
      expect(router.explainEscalation(words(20))).toEqual({ escalate: true, reason: "complexity" });
    });
  });

  describe("getResponse()", () => {
    it("simple question calls only the free tier", async () => {
      const { router, provider } = makeRouter();
      const answer = await router.getResponse("What is an atom?");
      expect(answer).toBe(`answer from ${FREE}`);
      expect(provider.models).toEqual([FREE]);
    });

    it("long question calls the paid tier, not free", async () => {
      const { router, provider } = makeRouter();
      const answer = await router.getResponse(words(16));
      expect(answer).toBe(`answer from ${PAID}`);
      expect(provider.models).toEqual([PAID]);
    });

    it("'not satisfied' in the previous response escalates a short question", async () => {
      const { router, provider } = makeRouter();
      await router.getResponse("What is an atom?", "User: not satisfied");
      expect(provider.models).toEqual([PAID]);
    });

    it("paid failure falls back to reason with the same messages", async () => {
      const { router, provider } = makeRouter({ [PAID]: "throw" });
      const answer = await router.getResponse(words(16), "", "Be concise.");
      expect(answer).toBe(`answer from ${REASON}`);
      expect(provider.models).toEqual([PAID, REASON]);
      const expected: Message[] = [
        { role: "system", content: "Be concise." },
        { role: "user", content: words(16) },
      ];
      expect(provider.calls[0]?.messages).toEqual(expected);
      expect(provider.calls[1]?.messages).toEqual(expected);
    });

    it("empty paid answer also falls back to reason", async () => {
      const { router, provider } = makeRouter({ [PAID]: "empty" });
      const answer = await router.getResponse("compare and contrast mitosis and meiosis");
      expect(answer).toBe(`answer from ${REASON}`);
      expect(provider.models).toEqual([PAID, REASON]);
    });

    it("paid and reason both failing → apology, no throw", async () => {
      const { router } = makeRouter({ [PAID]: "throw", [REASON]: "throw" });
      await expect(router.getResponse(words(30))).resolves.toBe(
        "I apologize, but I encountered an error while generating a response.",
      );
    });

    it("free failure goes straight to the apology", async () => {
      const { router, provider } = makeRouter({ [FREE]: "throw" });
      const answer = await router.getResponse("What is an atom?");
      expect(answer).toBe(APOLOGY_MESSAGE);
      expect(provider.models).toEqual([FREE]);
    });

    it("uses temperature 0.5 and a 2000 token cap", async () => {
      const { router, provider } = makeRouter();
      await router.getResponse("What is an atom?");
      expect(provider.calls[0]?.options).toEqual({ model: FREE, temperature: 0.5, maxTokens: 2000 });
    });

    it("omits the system message when no prompt is given", async () => {
      const { router, provider } = makeRouter();
      await router.getResponse("What is an atom?");
      expect(provider.calls[0]?.messages).toEqual([{ role: "user", content: "What is an atom?" }]);
    });
  });

  describe("respond()", () => {
    it("records every attempt and the tier that answered", async () => {
      const { router } = makeRouter({ [PAID]: "throw" });
      const result = await router.respond(words(16));
      expect(result.tier).toBe("reason");
      expect(result.model).toBe(REASON);
      expect(result.escalated).toBe(true);
      expect(result.reason).toBe("complexity");
      expect(result.attempts.map((a) => [a.tier, a.ok])).toEqual([
        ["paid", false],
        ["reason", true],
      ]);
      expect(result.attempts[0]?.error).toBe(
        "ProviderUnavailableError: Provider 'mock' is unavailable: HTTP 502",
      );
    });

    it("leaves tier and model unset when every attempt fails", async () => {
      const { router } = makeRouter({ [FREE]: "empty" });
      const result = await router.respond("What is an atom?");
      expect(result.content).toBe(APOLOGY_MESSAGE);
      expect(result.tier).toBeUndefined();
      expect(result.model).toBeUndefined();
      expect(result.trace[result.trace.length - 1]).toBe("all tiers failed → apology");
    });

    it("honours configured model names", async () => {
      const provider = new MockProvider();
      const router = new ModelRouter({
        apiKey: "test-secret",
        provider,
        router: {
          models: { free: "small", paid: "large", reason: "largest" },
          complexityThreshold: 3,
          dissatisfactionTriggers: [],
          technicalTriggers: [],
          temperature: 0.2,
          maxTokens: 500,
          apologyMessage: "sorry",
        },
      });
      await router.getResponse("one two three four");
      expect(provider.calls[0]?.options).toEqual({ model: "large", temperature: 0.2, maxTokens: 500 });
    });
  });
});

describe("buildMessages()", () => {
  it("puts the system prompt first", () => {
    expect(buildMessages("q", "sys")).toEqual([
      { role: "system", content: "sys" },
      { role: "user", content: "q" },
    ]);
  });
});
