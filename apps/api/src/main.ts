import { parseEnv } from "@docdigest/config";
import { createLogger } from "@docdigest/logger";
import { WindowChunker } from "@docdigest/chunker";
import { OllamaGenerationClient } from "@docdigest/generation";
import { Summarizer } from "@docdigest/core";
import { createApp } from "./app.js";
import { SERVICE_NAME } from "./service-info.js";

async function main(): Promise<void> {
  const config = parseEnv();
  const logger = createLogger({
    level: config.logLevel,
    nodeEnv: config.nodeEnv,
    service: "docdigest-api",
  });

  const generator = new OllamaGenerationClient({
    baseUrl: config.ollama.baseUrl,
    model: config.ollama.model,
    timeoutMs: config.ollama.timeoutMs,
    logger,
    sampling: { temperature: config.generation.temperature },
    maxRetries: config.generation.maxRetries,
    retryBaseDelayMs: config.generation.retryBaseDelayMs,
    retryMaxDelayMs: config.generation.retryMaxDelayMs,
  });

  const summarizer = new Summarizer({
    chunker: new WindowChunker(config.chunking),
    generator,
    logger,
    concurrency: config.summarizer.concurrency,
  });

  logger.info(
    {
      ollamaUrl: config.ollama.baseUrl,
      model: config.ollama.model,
      chunking: config.chunking,
      maxUploadMb: config.upload.maxUploadMb,
    },
    `Starting ${SERVICE_NAME}`,
  );

  if (await generator.healthCheck()) {
    const models = await generator.listModels();
    logger.info({ models }, "Generation endpoint reachable");
    if (!models.includes(config.ollama.model)) {
      logger.warn(
        { model: config.ollama.model },
        `Model not found on the endpoint; pull it with: ollama pull ${config.ollama.model}`,
      );
    }
  } else {
    logger.warn({ ollamaUrl: config.ollama.baseUrl }, "Generation endpoint is not reachable");
  }

  const app = createApp({ config, logger, generator, summarizer });
  const server = app.listen(config.port, () => {
    logger.info({ port: config.port }, "HTTP server listening");
  });

  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutting down");
    server.close((err) => {
      if (err) {
        logger.error({ err }, "Error while closing HTTP server");
        process.exit(1);
      }
      logger.info("HTTP server closed");
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  console.error("[api] Fatal error:", err);
  process.exit(1);
});
