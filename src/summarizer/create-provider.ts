import type { ResolvedSummarizerSettings } from "../config/types.js";
import type { SummarizationProvider } from "./types.js";
import { createHuggingFaceProvider } from "./huggingface.js";
import { createOpenAiProvider } from "./openai.js";
import { ConfigError } from "../infra/errors.js";

export function createSummarizationProvider(settings: ResolvedSummarizerSettings): SummarizationProvider {
  switch (settings.provider) {
    case "huggingface":
      return createHuggingFaceProvider(settings);
    case "openai": {
      if (!settings.apiKey) {
        throw new ConfigError(
          "No API key configured for the openai summarizer (set SUMMARIZER_API_KEY or OPENAI_API_KEY)",
        );
      }
      return createOpenAiProvider({
        apiKey: settings.apiKey,
        endpoint: settings.endpoint,
        model: settings.model,
      });
    }
  }
}
