import type { ResolvedSummarizerSettings } from "../config/types.js";
import type { SummarizationProvider, Summarizer } from "./types.js";
import { SummarizerError, errorMessage, toAbortError } from "../infra/errors.js";
import { countWords } from "../speech/duration.js";
import { createLogger } from "../logging.js";

const log = createLogger("summarizer");

export type SummarizerOptions = Pick<
  ResolvedSummarizerSettings,
  "timeoutMs" | "maxLength" | "minLength" | "maxInputWords"
>;

export function normalizeWhitespace(text: string): string {
  return text.trim().replace(/\s+/g, " ");
}

/**
 * Races `promise` against `signal` so a provider that ignores its signal
 * still cannot hold the caller past the deadline.
 */
function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      },
    );
  });
}

/**
 * Wraps a provider with the gate's single-attempt contract: bounded input,
 * a hard timeout, and every failure surfaced as a SummarizerError. An abort
 * from the caller's `signal` rejects with an AbortError.
 */
export function createSummarizer(
  provider: SummarizationProvider,
  options: SummarizerOptions,
): Summarizer {
  return {
    providerId: provider.id,
    async summarize(text: string, signal?: AbortSignal): Promise<string> {
      if (signal?.aborted) {
        throw toAbortError(signal.reason);
      }

      const input = normalizeWhitespace(text);
      if (input === "") {
        throw new SummarizerError("Nothing to summarize", "invalid_input");
      }
      const inputWords = countWords(input);
      if (inputWords > options.maxInputWords) {
        throw new SummarizerError(
          `Input too long for summarizer (${inputWords} words, max ${options.maxInputWords})`,
          "invalid_input",
        );
      }

      const controller = new AbortController();
      let timedOut = false;
      const timer = setTimeout(() => {
        timedOut = true;
        controller.abort(new DOMException(`Timed out after ${options.timeoutMs}ms`, "TimeoutError"));
      }, options.timeoutMs);
      const forwardAbort = () => controller.abort(signal?.reason);
      signal?.addEventListener("abort", forwardAbort, { once: true });

      const startTime = Date.now();
      try {
        const output = await raceAbort(
          provider.summarize(input, {
            maxLength: options.maxLength,
            minLength: options.minLength,
            signal: controller.signal,
          }),
          controller.signal,
        );
        const summary = normalizeWhitespace(output);
        if (summary === "") {
          throw new SummarizerError(`Summarizer (${provider.id}) returned an empty summary`, "unavailable");
        }
        log.debug(`Summarized ${inputWords} -> ${countWords(summary)} words in ${Date.now() - startTime}ms`);
        return summary;
      } catch (err) {
        if (signal?.aborted) {
          throw toAbortError(signal.reason);
        }
        if (err instanceof SummarizerError) {
          throw err;
        }
        if (timedOut) {
          throw new SummarizerError(
            `Summarizer (${provider.id}) timed out after ${options.timeoutMs}ms`,
            "timeout",
            { cause: err },
          );
        }
        throw new SummarizerError(
          `Summarizer (${provider.id}) failed: ${errorMessage(err)}`,
          "unavailable",
          { cause: err },
        );
      } finally {
        clearTimeout(timer);
        signal?.removeEventListener("abort", forwardAbort);
      }
    },
  };
}
