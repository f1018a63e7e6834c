import { z } from "zod";

export const SUMMARIZER_PROVIDERS = ["huggingface", "openai"] as const;

export const SummarizerProviderIdSchema = z.enum(SUMMARIZER_PROVIDERS);

export type SummarizerProviderId = z.infer<typeof SummarizerProviderIdSchema>;

export const SummarizerConfigSchema = z.object({
  provider: SummarizerProviderIdSchema.optional(),
  endpoint: z.string().url().optional(),
  model: z.string().min(1).optional(),
  apiKey: z.string().min(1).optional(),
  timeoutMs: z.number().int().positive().optional(),
  maxLength: z.number().int().positive().optional(),
  minLength: z.number().int().nonnegative().optional(),
  maxInputWords: z.number().int().positive().optional(),
});

export type SummarizerConfig = z.infer<typeof SummarizerConfigSchema>;

export const WebConfigSchema = z.object({
  port: z.number().int().min(1).max(65535).optional(),
  host: z.string().min(1).optional(),
});

export type WebConfig = z.infer<typeof WebConfigSchema>;

/** Shape of `utterance-gate.config.{yaml,yml,json}`. Every field is optional. */
export const GateConfigSchema = z.object({
  budgetSeconds: z.number().positive().optional(),
  wordsPerMinute: z.number().positive().optional(),
  summarizer: SummarizerConfigSchema.optional(),
  web: WebConfigSchema.optional(),
});

export type GateConfig = z.infer<typeof GateConfigSchema>;

export type ResolvedSummarizerSettings = {
  readonly provider: SummarizerProviderId;
  readonly endpoint: string;
  readonly model: string;
  readonly apiKey?: string;
  readonly timeoutMs: number;
  readonly maxLength: number;
  readonly minLength: number;
  readonly maxInputWords: number;
};

/** Immutable, fully resolved settings built once at startup. */
export type GateSettings = {
  readonly budgetSeconds: number;
  readonly wordsPerMinute: number;
  readonly summarizer: ResolvedSummarizerSettings;
  readonly web: {
    readonly port: number;
    readonly host: string;
  };
};
