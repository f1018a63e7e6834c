import { InvalidInputError } from "../infra/errors.js";

const WHITESPACE = /\s+/;

export type DurationEstimator = {
  readonly wordsPerMinute: number;
  estimate: (text: string) => number;
};

export function assertText(text: unknown): asserts text is string {
  if (typeof text !== "string") {
    throw new InvalidInputError(`text must be a string, got ${text === null ? "null" : typeof text}`);
  }
}

/** Whitespace-delimited tokens; leading, trailing and repeated whitespace produce no empty tokens. */
export function splitWords(text: string): string[] {
  const trimmed = text.trim();
  return trimmed === "" ? [] : trimmed.split(WHITESPACE);
}

export function countWords(text: string): number {
  return splitWords(text).length;
}

export function wordsToSeconds(wordCount: number, wordsPerMinute: number): number {
  return (wordCount * 60) / wordsPerMinute;
}

/** Largest word count whose estimate stays within `seconds`. */
export function wordBudgetFor(seconds: number, wordsPerMinute: number): number {
  if (!(seconds > 0)) {
    return 0;
  }
  return Math.floor((seconds * wordsPerMinute) / 60);
}

export function estimateDuration(text: unknown, wordsPerMinute: number): number {
  assertText(text);
  return wordsToSeconds(countWords(text), wordsPerMinute);
}

export function createDurationEstimator(settings: { wordsPerMinute: number }): DurationEstimator {
  const { wordsPerMinute } = settings;
  return {
    wordsPerMinute,
    estimate: (text) => estimateDuration(text, wordsPerMinute),
  };
}
