import { describe, it, expect, vi } from "vitest";
import { createValidationService } from "./validation.js";
import type { Summarizer } from "../summarizer/types.js";
import { InvalidInputError, SummarizerError } from "../infra/errors.js";
import { countWords } from "../speech/duration.js";
import { trimToBudget } from "../speech/trim.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const SETTINGS = { budgetSeconds: 60, wordsPerMinute: 150 };

function words(n: number, prefix = "w"): string {
  return Array.from({ length: n }, (_, i) => `${prefix}${i + 1}`).join(" ");
}

function fakeSummarizer(impl: (text: string, signal?: AbortSignal) => Promise<string>) {
  const summarizer = { providerId: "fake", summarize: vi.fn(impl) };
  return summarizer satisfies Summarizer;
}

function failingSummarizer(reason: "unavailable" | "timeout" | "invalid_input" = "unavailable") {
  return fakeSummarizer(async () => {
    throw new SummarizerError("model down", reason);
  });
}

// ---------------------------------------------------------------------------
// PASS
// ---------------------------------------------------------------------------

describe("validate: within budget", () => {
  it("returns a short greeting unmodified", async () => {
    const summarizer = fakeSummarizer(async () => "unused");
    const service = createValidationService({ settings: SETTINGS, summarizer });

    const result = await service.validate("Hello, how can I help you today?");

    expect(result.finalText).toBe("Hello, how can I help you today?");
    expect(result.estimatedSeconds).toBeCloseTo(2.8, 10);
    expect(result.wasModified).toBe(false);
    expect(result.outcome).toBe("pass");
    expect(summarizer.summarize).not.toHaveBeenCalled();
  });

  it("passes text exactly at the budget", async () => {
    const service = createValidationService({ settings: SETTINGS, summarizer: failingSummarizer() });
    const result = await service.validate(words(150));
    expect(result).toEqual({ finalText: words(150), estimatedSeconds: 60, wasModified: false, outcome: "pass" });
  });

  it("passes empty text with a zero estimate", async () => {
    const service = createValidationService({ settings: SETTINGS, summarizer: failingSummarizer() });
    expect(await service.validate("")).toEqual({
      finalText: "",
      estimatedSeconds: 0,
      wasModified: false,
      outcome: "pass",
    });
  });

  it("is idempotent on its own passing output", async () => {
    const service = createValidationService({ settings: SETTINGS, summarizer: failingSummarizer() });
    const first = await service.validate("  Sure,\nI can do that. ");
    const second = await service.validate(first.finalText);
    expect(second.finalText).toBe(first.finalText);
  });
});

// ---------------------------------------------------------------------------
// REWRITTEN
// ---------------------------------------------------------------------------

describe("validate: over budget", () => {
  it("summarizes the trimmed text and re-estimates", async () => {
    const summary = words(40, "s");
    const summarizer = fakeSummarizer(async () => summary);
    const service = createValidationService({ settings: SETTINGS, summarizer });
    const input = words(300);

    const result = await service.validate(input);

    expect(result).toEqual({ finalText: summary, estimatedSeconds: 16, wasModified: true, outcome: "rewritten" });
    expect(summarizer.summarize).toHaveBeenCalledOnce();
    expect(summarizer.summarize.mock.calls[0]![0]).toBe(trimToBudget(input, 60, 150));
  });

  it("passes the caller's signal to the summarizer", async () => {
    const summarizer = fakeSummarizer(async () => "short");
    const service = createValidationService({ settings: SETTINGS, summarizer });
    const controller = new AbortController();

    await service.validate(words(200), controller.signal);

    expect(summarizer.summarize.mock.calls[0]![1]).toBe(controller.signal);
  });

  it("reports a summary that is still over budget without looping", async () => {
    const summarizer = fakeSummarizer(async () => words(160, "s"));
    const service = createValidationService({ settings: SETTINGS, summarizer });

    const result = await service.validate(words(400));

    expect(result.outcome).toBe("rewritten");
    expect(result.estimatedSeconds).toBe(64);
    expect(result.wasModified).toBe(true);
    expect(summarizer.summarize).toHaveBeenCalledOnce();
  });

  it("falls back to the trimmed text when the summary outgrows the input", async () => {
    const summarizer = fakeSummarizer(async () => words(200, "s"));
    const service = createValidationService({ settings: SETTINGS, summarizer });
    const input = words(151);

    const result = await service.validate(input);

    expect(result.outcome).toBe("degraded");
    expect(result.finalText).toBe(trimToBudget(input, 60, 150));
    expect(countWords(result.finalText)).toBeLessThanOrEqual(151);
  });

  it("never returns more words than it was given", async () => {
    const summarizer = fakeSummarizer(async (text) => `${text} and then some more words`);
    const service = createValidationService({ settings: SETTINGS, summarizer });

    for (const n of [151, 155, 300]) {
      const result = await service.validate(words(n));
      expect(result.wasModified).toBe(true);
      expect(countWords(result.finalText)).toBeLessThanOrEqual(n);
    }
  });
});

// ---------------------------------------------------------------------------
// DEGRADED
// ---------------------------------------------------------------------------

describe("validate: summarizer failure", () => {
  it.each(["unavailable", "timeout", "invalid_input"] as const)(
    "returns the trimmed text when the summarizer fails with %s",
    async (reason) => {
      const service = createValidationService({ settings: SETTINGS, summarizer: failingSummarizer(reason) });
      const input = words(300);

      const result = await service.validate(input);

      expect(result).toEqual({
        finalText: trimToBudget(input, 60, 150),
        estimatedSeconds: 60,
        wasModified: true,
        outcome: "degraded",
      });
      expect(result.finalText).not.toBe("");
    },
  );

  it("propagates errors that are not summarizer failures", async () => {
    const summarizer = fakeSummarizer(async () => {
      throw new DOMException("client went away", "AbortError");
    });
    const service = createValidationService({ settings: SETTINGS, summarizer });

    await expect(service.validate(words(300))).rejects.toMatchObject({ name: "AbortError" });
  });
});

// ---------------------------------------------------------------------------
// Input contract
// ---------------------------------------------------------------------------

describe("validate: input contract", () => {
  it.each([undefined, null, 42, { text: "hi" }])("rejects %s as invalid input", async (value) => {
    const summarizer = fakeSummarizer(async () => "unused");
    const service = createValidationService({ settings: SETTINGS, summarizer });

    await expect(service.validate(value)).rejects.toBeInstanceOf(InvalidInputError);
    expect(summarizer.summarize).not.toHaveBeenCalled();
  });

  it("rejects an already-aborted request", async () => {
    const service = createValidationService({ settings: SETTINGS, summarizer: failingSummarizer() });
    const controller = new AbortController();
    controller.abort(new DOMException("cancelled", "AbortError"));

    await expect(service.validate("hello", controller.signal)).rejects.toMatchObject({ name: "AbortError" });
  });

  it("rejects with an AbortError when the request was aborted with a string reason", async () => {
    const summarizer = fakeSummarizer(async () => "unused");
    const service = createValidationService({ settings: SETTINGS, summarizer });
    const controller = new AbortController();
    controller.abort("Client connection prematurely closed.");

    await expect(service.validate(words(300), controller.signal)).rejects.toMatchObject({
      name: "AbortError",
      message: "Client connection prematurely closed.",
    });
    expect(summarizer.summarize).not.toHaveBeenCalled();
  });

  it("exposes the configured budget", () => {
    const service = createValidationService({
      settings: { budgetSeconds: 30, wordsPerMinute: 150 },
      summarizer: failingSummarizer(),
    });
    expect(service.budgetSeconds).toBe(30);
  });
});
