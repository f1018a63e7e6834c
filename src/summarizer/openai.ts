import OpenAI from "openai";
import type { ResolvedSummarizerSettings } from "../config/types.js";
import type { SummarizationProvider, SummarizeOptions } from "./types.js";

export type OpenAiProviderOptions = Pick<ResolvedSummarizerSettings, "endpoint" | "model"> & {
  apiKey: string;
};

export function buildSystemPrompt(options: Pick<SummarizeOptions, "maxLength" | "minLength">): string {
  return [
    "You shorten text that a voice assistant is about to read aloud.",
    `Rewrite the user's text as a faithful summary of at most ${options.maxLength} words`,
    options.minLength > 0 ? `and at least ${options.minLength} words when the text allows it.` : "",
    "Keep the key facts, numbers and any question addressed to the listener.",
    "Reply with plain spoken sentences only: no lists, markup, or preamble.",
  ].filter(Boolean).join(" ");
}

/** Summarizes through any OpenAI-compatible chat completions endpoint. */
export function createOpenAiProvider(options: OpenAiProviderOptions): SummarizationProvider {
  const client = new OpenAI({
    apiKey: options.apiKey,
    baseURL: options.endpoint,
    // Retries and timeouts belong to the Summarizer wrapper.
    maxRetries: 0,
  });

  return {
    id: "openai",
    async summarize(text: string, summarizeOptions: SummarizeOptions): Promise<string> {
      let response: OpenAI.ChatCompletion;
      try {
        response = await client.chat.completions.create(
          {
            model: options.model,
            temperature: 0,
            max_tokens: summarizeOptions.maxLength * 2,
            messages: [
              { role: "system", content: buildSystemPrompt(summarizeOptions) },
              { role: "user", content: text },
            ],
          },
          { signal: summarizeOptions.signal },
        );
      } catch (error) {
        const detail = error instanceof Error ? error.message : String(error);
        throw new Error(`OpenAI summarization call failed: ${detail}`, { cause: error });
      }

      const choice = response.choices[0];
      if (!choice) {
        throw new Error("OpenAI returned no choices in response");
      }
      return choice.message.content ?? "";
    },
  };
}
