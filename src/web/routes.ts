import { Hono } from "hono";
import { z } from "zod";
import type { GateSettings } from "../config/types.js";
import type { ValidationService } from "../gate/types.js";
import { InvalidInputError, errorMessage, isAbortError } from "../infra/errors.js";
import { createLogger } from "../logging.js";

const log = createLogger("web-routes");

export const ValidateRequestSchema = z.object({
  text: z.string({
    required_error: "text is required",
    invalid_type_error: "text must be a string",
  }),
});

// Agents written against the first version of the gate also send their own
// `length` estimate; it is accepted and ignored.
const LegacyValidateRequestSchema = z.object({
  text: z.string().min(1),
  length: z.unknown().optional(),
});

export type WebAppDeps = {
  settings: Pick<GateSettings, "budgetSeconds" | "wordsPerMinute">;
  service: ValidationService;
  summarizerId: string;
};

export function createWebRoutes(deps: WebAppDeps): Hono {
  const app = new Hono();

  app.get("/api/health", (c) => {
    return c.json({
      success: true,
      data: {
        status: "ok",
        budgetSeconds: deps.settings.budgetSeconds,
        wordsPerMinute: deps.settings.wordsPerMinute,
        summarizer: deps.summarizerId,
      },
    });
  });

  app.post("/api/validate", async (c) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return c.json({ success: false, code: "INVALID_INPUT", error: "Invalid JSON body" }, 400);
    }
    const parsed = ValidateRequestSchema.safeParse(body);
    if (!parsed.success) {
      const error = parsed.error.issues[0]?.message ?? "Invalid request body";
      return c.json({ success: false, code: "INVALID_INPUT", error }, 400);
    }

    try {
      const result = await deps.service.validate(parsed.data.text, c.req.raw.signal);
      return c.json({ success: true, data: result });
    } catch (err) {
      if (err instanceof InvalidInputError) {
        return c.json({ success: false, code: err.code, error: err.message }, 400);
      }
      if (c.req.raw.signal.aborted || isAbortError(err)) {
        log.info("Validation cancelled by client");
        return c.json({ success: false, code: "CANCELLED", error: "Request cancelled" }, 503);
      }
      log.error(`Validation failed: ${errorMessage(err)}`);
      return c.json({ success: false, code: "INTERNAL_ERROR", error: "Validation failed" }, 500);
    }
  });

  app.post("/validate_audio", async (c) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      body = {};
    }
    const parsed = LegacyValidateRequestSchema.safeParse(body);
    if (!parsed.success) {
      return c.json({ error: "The 'text' field is missing." }, 400);
    }

    try {
      const result = await deps.service.validate(parsed.data.text, c.req.raw.signal);
      return c.json({ message: result.finalText });
    } catch (err) {
      log.error(`Legacy validation failed: ${errorMessage(err)}`);
      return c.json({ error: "Validation failed" }, 500);
    }
  });

  return app;
}
