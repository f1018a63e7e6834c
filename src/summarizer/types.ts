export type SummarizeOptions = {
  /** Upper bound on summary length, in model tokens (words for chat models). */
  maxLength: number;
  minLength: number;
  signal: AbortSignal;
};

/**
 * A summarization backend. Implementations make one attempt, honour
 * `signal`, and reject on any failure; they never return partial output.
 */
export type SummarizationProvider = {
  readonly id: string;
  summarize: (text: string, options: SummarizeOptions) => Promise<string>;
};

export type Summarizer = {
  readonly providerId: string;
  summarize: (text: string, signal?: AbortSignal) => Promise<string>;
};
