import { z } from "zod";
import type { ResolvedSummarizerSettings } from "../config/types.js";
import type { SummarizationProvider, SummarizeOptions } from "./types.js";
import { createLogger } from "../logging.js";

const log = createLogger("summarizer-hf");

const SummaryItemSchema = z.object({ summary_text: z.string() });

// The hosted pipeline answers with a one-element list; self-hosted
// inference servers often return the bare object.
const HuggingFaceResponseSchema = z.union([
  z.array(SummaryItemSchema).min(1),
  SummaryItemSchema,
]);

function buildHeaders(apiKey: string | undefined): Record<string, string> {
  const headers: Record<string, string> = {
    "Content-Type": "application/json",
    Accept: "application/json",
  };
  if (apiKey) {
    headers.Authorization = `Bearer ${apiKey}`;
  }
  return headers;
}

export function createHuggingFaceProvider(
  settings: Pick<ResolvedSummarizerSettings, "endpoint" | "apiKey">,
): SummarizationProvider {
  const { endpoint, apiKey } = settings;

  return {
    id: "huggingface",
    async summarize(text: string, options: SummarizeOptions): Promise<string> {
      const response = await fetch(endpoint, {
        method: "POST",
        headers: buildHeaders(apiKey),
        body: JSON.stringify({
          inputs: text,
          parameters: {
            max_length: options.maxLength,
            min_length: options.minLength,
            do_sample: false,
          },
        }),
        signal: options.signal,
      });

      if (!response.ok) {
        const isAuthError = response.status === 401 || response.status === 403;
        if (!isAuthError) {
          log.error(`Summarization API error: HTTP ${response.status}`);
        }
        throw new Error(
          `Summarization API error (${response.status}): ${isAuthError ? "Authentication failed" : "Request failed"}`,
        );
      }

      const parsed = HuggingFaceResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new Error("Summarization API returned an unexpected response shape");
      }
      const item = Array.isArray(parsed.data) ? parsed.data[0] : parsed.data;
      return item?.summary_text ?? "";
    },
  };
}
