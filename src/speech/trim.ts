import { assertText, splitWords, wordBudgetFor } from "./duration.js";

export type Trimmer = {
  trim: (text: string, targetSeconds?: number) => string;
};

/**
 * Keeps the opening and closing words of `text` and drops the middle so the
 * result fits `targetSeconds` at the given rate. The head takes the extra word
 * when the budget is odd.
 *
 * Returns `text` untouched when it already fits, and `""` when the budget is
 * too small to keep both a head and a tail.
 */
export function trimToBudget(text: unknown, targetSeconds: number, wordsPerMinute: number): string {
  assertText(text);
  const target = wordBudgetFor(targetSeconds, wordsPerMinute);
  if (target < 2) {
    return "";
  }

  const words = splitWords(text);
  if (words.length <= target) {
    return text;
  }

  const headCount = Math.ceil(target / 2);
  const tailCount = target - headCount;
  return [...words.slice(0, headCount), ...words.slice(words.length - tailCount)].join(" ");
}

export function createTrimmer(settings: { budgetSeconds: number; wordsPerMinute: number }): Trimmer {
  return {
    trim: (text, targetSeconds = settings.budgetSeconds) =>
      trimToBudget(text, targetSeconds, settings.wordsPerMinute),
  };
}
