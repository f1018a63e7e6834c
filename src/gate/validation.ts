import type { GateSettings } from "../config/types.js";
import type { Summarizer } from "../summarizer/types.js";
import type { ValidationResult, ValidationService } from "./types.js";
import { assertText, countWords, createDurationEstimator } from "../speech/duration.js";
import { createTrimmer } from "../speech/trim.js";
import { SummarizerError, toAbortError } from "../infra/errors.js";
import { createLogger } from "../logging.js";

const log = createLogger("gate");

export type ValidationServiceDeps = {
  settings: Pick<GateSettings, "budgetSeconds" | "wordsPerMinute">;
  summarizer: Summarizer;
};

/**
 * Estimate, then trim and summarize only when over budget.
 *
 * - PASS: estimate within budget, text returned untouched.
 * - REWRITTEN: trimmed text summarized; the summary's own estimate is
 *   reported even if it is still over budget (one pass, no loop).
 * - DEGRADED: summarizer failed, or produced more words than the input,
 *   so the trimmed text is returned instead.
 *
 * Cancellation through `signal` rejects with an AbortError.
 */
export function createValidationService(deps: ValidationServiceDeps): ValidationService {
  const { budgetSeconds } = deps.settings;
  const estimator = createDurationEstimator(deps.settings);
  const trimmer = createTrimmer(deps.settings);

  function degraded(trimmed: string): ValidationResult {
    return {
      finalText: trimmed,
      estimatedSeconds: estimator.estimate(trimmed),
      wasModified: true,
      outcome: "degraded",
    };
  }

  return {
    budgetSeconds,
    async validate(text: unknown, signal?: AbortSignal): Promise<ValidationResult> {
      assertText(text);
      if (signal?.aborted) {
        throw toAbortError(signal.reason);
      }

      log.debug(`Text before validation: ${text}`);
      const estimate = estimator.estimate(text);
      if (estimate <= budgetSeconds) {
        log.debug(`pass: ${estimate.toFixed(1)}s within ${budgetSeconds}s budget`);
        return { finalText: text, estimatedSeconds: estimate, wasModified: false, outcome: "pass" };
      }

      const trimmed = trimmer.trim(text, budgetSeconds);

      let summary: string;
      try {
        summary = await deps.summarizer.summarize(trimmed, signal);
      } catch (err) {
        if (!(err instanceof SummarizerError)) {
          throw err;
        }
        log.warn(`Summarizer ${err.reason}, returning trimmed text: ${err.message}`);
        return degraded(trimmed);
      }

      if (countWords(summary) > countWords(text)) {
        log.warn("Summary is longer than the original text, returning trimmed text");
        return degraded(trimmed);
      }

      const finalEstimate = estimator.estimate(summary);
      if (finalEstimate > budgetSeconds) {
        log.warn(`Summary still estimates ${finalEstimate.toFixed(1)}s, over the ${budgetSeconds}s budget`);
      }
      log.debug(`rewritten: ${estimate.toFixed(1)}s -> ${finalEstimate.toFixed(1)}s. Text after validation: ${summary}`);
      return { finalText: summary, estimatedSeconds: finalEstimate, wasModified: true, outcome: "rewritten" };
    },
  };
}
