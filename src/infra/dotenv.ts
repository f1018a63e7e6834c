import { config } from "dotenv";
import { resolve } from "node:path";
import { existsSync } from "node:fs";
import { createLogger } from "../logging.js";

const log = createLogger("dotenv");

/** Loads `.env` from `dir` (default cwd) without overriding variables already set. */
export function loadDotenv(dir?: string): boolean {
  const envPath = resolve(dir ?? process.cwd(), ".env");
  if (!existsSync(envPath)) {
    return false;
  }
  const result = config({ path: envPath });
  if (result.error) {
    log.warn("Failed to parse .env file:", result.error);
    return false;
  }
  return true;
}
