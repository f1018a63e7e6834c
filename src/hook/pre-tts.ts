import { z } from "zod";
import type { ValidationService } from "../gate/types.js";
import { errorMessage } from "../infra/errors.js";
import { createLogger } from "../logging.js";

const log = createLogger("pre-tts");

const DEFAULT_TIMEOUT_MS = 10_000;

/** A reply as the agent hands it to TTS: complete, or still streaming. */
export type PreTtsInput = string | AsyncIterable<string>;

export type PreTtsHook = (input: PreTtsInput) => Promise<string>;

export type PreTtsHookOptions = {
  /** Base URL of the gate, e.g. `http://localhost:5000`. */
  endpoint: string;
  timeoutMs?: number;
};

const ValidateResponseSchema = z.object({
  success: z.literal(true),
  data: z.object({
    finalText: z.string(),
    estimatedSeconds: z.number(),
    wasModified: z.boolean(),
  }),
});

export async function collectText(input: PreTtsInput): Promise<string> {
  if (typeof input === "string") {
    return input;
  }
  let text = "";
  for await (const chunk of input) {
    text += chunk;
  }
  return text;
}

/**
 * Hook that sends each reply through the gate over HTTP. Whatever goes wrong
 * on the way, the agent still speaks: the original text is returned.
 */
export function createPreTtsHook(options: PreTtsHookOptions): PreTtsHook {
  const url = `${options.endpoint.replace(/\/+$/, "")}/api/validate`;
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;

  return async (input) => {
    const text = await collectText(input);
    log.debug(`Text before validation: ${text}`);

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);
    try {
      const response = await fetch(url, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ text }),
        signal: controller.signal,
      });
      if (!response.ok) {
        log.warn(`Gate answered HTTP ${response.status}, speaking original text`);
        return text;
      }
      const parsed = ValidateResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        log.warn("Gate returned an unexpected response, speaking original text");
        return text;
      }
      log.debug(`Text after validation: ${parsed.data.data.finalText}`);
      return parsed.data.data.finalText;
    } catch (err) {
      const reason = controller.signal.aborted ? `timed out after ${timeoutMs}ms` : errorMessage(err);
      log.warn(`Gate unreachable (${reason}), speaking original text`);
      return text;
    } finally {
      clearTimeout(timeout);
    }
  };
}

/** Same contract as {@link createPreTtsHook}, calling a service in this process. */
export function createInProcessHook(service: ValidationService): PreTtsHook {
  return async (input) => {
    const text = await collectText(input);
    try {
      const result = await service.validate(text);
      return result.finalText;
    } catch (err) {
      log.warn(`Validation failed (${errorMessage(err)}), speaking original text`);
      return text;
    }
  };
}
