import { readFileSync, existsSync } from "node:fs";
import { resolve } from "node:path";
import { parse as parseYaml } from "yaml";
import type { ZodError } from "zod";
import { ConfigError, errorMessage } from "../infra/errors.js";
import { wordBudgetFor } from "../speech/duration.js";
import {
  GateConfigSchema,
  SummarizerProviderIdSchema,
  type GateConfig,
  type GateSettings,
  type ResolvedSummarizerSettings,
  type SummarizerConfig,
  type SummarizerProviderId,
} from "./types.js";

const CONFIG_FILENAMES = [
  "utterance-gate.config.yaml",
  "utterance-gate.config.yml",
  "utterance-gate.config.json",
];

export const DEFAULT_BUDGET_SECONDS = 60;
export const DEFAULT_WORDS_PER_MINUTE = 150;
export const DEFAULT_PORT = 5000;
export const DEFAULT_HOST = "localhost";

const SUMMARIZER_DEFAULTS = {
  timeoutMs: 5_000,
  maxLength: 100,
  minLength: 50,
  maxInputWords: 1024,
} as const;

const PROVIDER_DEFAULTS: Record<SummarizerProviderId, { model: string; endpoint: (model: string) => string }> = {
  huggingface: {
    model: "t5-small",
    endpoint: (model) => `https://router.huggingface.co/hf-inference/models/${model}`,
  },
  openai: {
    model: "gpt-4o-mini",
    endpoint: () => "https://api.openai.com/v1",
  },
};

function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}

export function validateConfig(value: unknown, source = "config"): GateConfig {
  if (value === null || value === undefined) {
    return {};
  }
  const result = GateConfigSchema.safeParse(value);
  if (!result.success) {
    throw new ConfigError(`Invalid ${source}: ${formatIssues(result.error)}`);
  }
  return result.data;
}

export function loadConfig(dir?: string): GateConfig {
  const baseDir = dir ?? process.cwd();

  for (const filename of CONFIG_FILENAMES) {
    const filepath = resolve(baseDir, filename);
    if (existsSync(filepath)) {
      let raw: string;
      try {
        raw = readFileSync(filepath, "utf-8");
      } catch (err) {
        throw new ConfigError(`Failed to read config file ${filepath}: ${errorMessage(err)}`);
      }
      let parsed: unknown;
      try {
        parsed = filename.endsWith(".json")
          ? JSON.parse(raw)
          : parseYaml(raw);
      } catch (err) {
        throw new ConfigError(`Failed to parse config file ${filepath}: ${errorMessage(err)}`);
      }
      return validateConfig(parsed, `config file ${filepath}`);
    }
  }

  return {};
}

// ---------------------------------------------------------------------------
// Environment overrides
// ---------------------------------------------------------------------------

type Env = Record<string, string | undefined>;

function envString(env: Env, key: string): string | undefined {
  const trimmed = env[key]?.trim();
  return trimmed ? trimmed : undefined;
}

function envNumber(env: Env, key: string): number | undefined {
  const raw = envString(env, key);
  if (raw === undefined) {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigError(`${key} must be a number, got "${raw}"`);
  }
  return value;
}

function envProvider(env: Env): SummarizerProviderId | undefined {
  const raw = envString(env, "SUMMARIZER_PROVIDER");
  if (raw === undefined) {
    return undefined;
  }
  const parsed = SummarizerProviderIdSchema.safeParse(raw.toLowerCase());
  if (!parsed.success) {
    throw new ConfigError(
      `SUMMARIZER_PROVIDER must be one of ${SummarizerProviderIdSchema.options.join(", ")}, got "${raw}"`,
    );
  }
  return parsed.data;
}

/** Reads the recognised environment variables into a config overlay. */
export function readEnvConfig(env: Env = process.env): GateConfig {
  return validateConfig(
    {
      budgetSeconds: envNumber(env, "BUDGET_SECONDS"),
      wordsPerMinute: envNumber(env, "WORDS_PER_MINUTE"),
      summarizer: {
        provider: envProvider(env),
        endpoint: envString(env, "SUMMARIZER_ENDPOINT"),
        model: envString(env, "SUMMARIZER_MODEL"),
        apiKey: envString(env, "SUMMARIZER_API_KEY"),
        timeoutMs: envNumber(env, "SUMMARIZER_TIMEOUT_MS"),
        maxLength: envNumber(env, "SUMMARIZER_MAX_LENGTH"),
        minLength: envNumber(env, "SUMMARIZER_MIN_LENGTH"),
      },
      web: {
        port: envNumber(env, "PORT"),
        host: envString(env, "HOST"),
      },
    },
    "environment",
  );
}

/** Field-wise overlay; an undefined value in `override` keeps the base value. */
export function mergeConfig(base: GateConfig, override: GateConfig): GateConfig {
  const s = override.summarizer;
  const b = base.summarizer;
  return {
    budgetSeconds: override.budgetSeconds ?? base.budgetSeconds,
    wordsPerMinute: override.wordsPerMinute ?? base.wordsPerMinute,
    summarizer: {
      provider: s?.provider ?? b?.provider,
      endpoint: s?.endpoint ?? b?.endpoint,
      model: s?.model ?? b?.model,
      apiKey: s?.apiKey ?? b?.apiKey,
      timeoutMs: s?.timeoutMs ?? b?.timeoutMs,
      maxLength: s?.maxLength ?? b?.maxLength,
      minLength: s?.minLength ?? b?.minLength,
      maxInputWords: s?.maxInputWords ?? b?.maxInputWords,
    },
    web: {
      port: override.web?.port ?? base.web?.port,
      host: override.web?.host ?? base.web?.host,
    },
  };
}

// ---------------------------------------------------------------------------
// Resolution
// ---------------------------------------------------------------------------

function resolveApiKey(provider: SummarizerProviderId, configured: string | undefined, env: Env): string | undefined {
  if (configured) {
    return configured;
  }
  return provider === "huggingface"
    ? envString(env, "HF_API_TOKEN")
    : envString(env, "OPENAI_API_KEY");
}

function resolveSummarizer(raw: SummarizerConfig, env: Env): ResolvedSummarizerSettings {
  const provider = raw.provider ?? "huggingface";
  const defaults = PROVIDER_DEFAULTS[provider];
  const model = raw.model ?? defaults.model;
  const maxLength = raw.maxLength ?? SUMMARIZER_DEFAULTS.maxLength;
  const minLength = raw.minLength ?? Math.min(SUMMARIZER_DEFAULTS.minLength, maxLength);

  if (minLength > maxLength) {
    throw new ConfigError(`summarizer.minLength (${minLength}) must not exceed summarizer.maxLength (${maxLength})`);
  }

  const apiKey = resolveApiKey(provider, raw.apiKey, env);
  return Object.freeze({
    provider,
    endpoint: (raw.endpoint ?? defaults.endpoint(model)).replace(/\/+$/, ""),
    model,
    apiKey,
    timeoutMs: raw.timeoutMs ?? SUMMARIZER_DEFAULTS.timeoutMs,
    maxLength,
    minLength,
    maxInputWords: raw.maxInputWords ?? SUMMARIZER_DEFAULTS.maxInputWords,
  });
}

/**
 * Builds the frozen settings every component receives. Throws ConfigError
 * for any value the gate cannot run with.
 */
export function resolveSettings(config: GateConfig, env: Env = process.env): GateSettings {
  const validated = validateConfig(config);
  const budgetSeconds = validated.budgetSeconds ?? DEFAULT_BUDGET_SECONDS;
  const wordsPerMinute = validated.wordsPerMinute ?? DEFAULT_WORDS_PER_MINUTE;

  const wordBudget = wordBudgetFor(budgetSeconds, wordsPerMinute);
  if (wordBudget < 2) {
    throw new ConfigError(
      `budgetSeconds (${budgetSeconds}) at ${wordsPerMinute} words per minute leaves fewer than 2 words`,
    );
  }

  // Over-budget text is trimmed to the word budget before it is summarized.
  const summarizer = resolveSummarizer(validated.summarizer ?? {}, env);
  if (wordBudget > summarizer.maxInputWords) {
    throw new ConfigError(
      `budgetSeconds (${budgetSeconds}) at ${wordsPerMinute} words per minute allows ${wordBudget} words, ` +
        `more than summarizer.maxInputWords (${summarizer.maxInputWords})`,
    );
  }

  return Object.freeze({
    budgetSeconds,
    wordsPerMinute,
    summarizer,
    web: Object.freeze({
      port: validated.web?.port ?? DEFAULT_PORT,
      host: validated.web?.host ?? DEFAULT_HOST,
    }),
  });
}

/** Defaults, then the config file in `dir`, then environment variables. */
export function loadSettings(params: { dir?: string; env?: Env } = {}): GateSettings {
  const env = params.env ?? process.env;
  const merged = mergeConfig(loadConfig(params.dir), readEnvConfig(env));
  return resolveSettings(merged, env);
}
