import { serve } from "@hono/node-server";
import { loadDotenv } from "./infra/dotenv.js";
import { isDev } from "./infra/env.js";
import { formatError } from "./infra/errors.js";
import { createLogger } from "./logging.js";
import { loadSettings } from "./config/config.js";
import { createSummarizationProvider, createSummarizer } from "./summarizer/index.js";
import { createValidationService } from "./gate/validation.js";
import { createWebRoutes } from "./web/routes.js";

const log = createLogger("main");

async function main(): Promise<void> {

  // 1. Load environment
  if (loadDotenv()) {
    log.debug("Loaded .env");
  }

  log.info("Starting utterance gate...");

  // 2. Resolve settings once; any ConfigError stops startup here
  const settings = loadSettings();
  const { host, port } = settings.web;

  // 3. Summarization backend
  const provider = createSummarizationProvider(settings.summarizer);
  const summarizer = createSummarizer(provider, settings.summarizer);
  log.info(
    `Summarizer: ${provider.id} (${settings.summarizer.model}), timeout ${settings.summarizer.timeoutMs}ms`,
  );

  // 4. Gate and routes
  const service = createValidationService({ settings, summarizer });
  const app = createWebRoutes({ settings, service, summarizerId: provider.id });

  // 5. Start server
  const server = serve({
    fetch: app.fetch,
    port,
    hostname: host,
  });

  let shuttingDown = false;
  const shutdown = () => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info("Shutting down...");

    setTimeout(() => {
      log.warn("Forced shutdown after timeout");
      process.exit(1);
    }, 5000).unref();

    server.close((err) => {
      if (err) {
        log.error(`Failed to close server: ${formatError(err)}`);
        process.exit(1);
      }
      process.exit(0);
    });
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);

  log.info(
    `Utterance gate running at http://${host}:${port} ` +
    `(budget ${settings.budgetSeconds}s at ${settings.wordsPerMinute} wpm)`,
  );

  if (isDev()) {
    log.info("Development mode enabled");
  }
}

process.on("unhandledRejection", (err) => {
  log.error(`Unhandled rejection: ${formatError(err)}`);
});

main().catch((err: unknown) => {
  log.fatal(`Fatal error: ${formatError(err)}`);
  process.exit(1);
});
