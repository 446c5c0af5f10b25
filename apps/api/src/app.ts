import express from "express";
import type { Express } from "express";
import type { AppConfig } from "@docdigest/types";
import type { Summarizer } from "@docdigest/core";
import type { IGenerationClient } from "@docdigest/generation";
import type { Logger } from "@docdigest/logger";
import { createRequestIdMiddleware } from "./middleware/request-id.js";
import { createErrorHandler, notFoundHandler } from "./middleware/error-handler.js";
import { createHealthRouter } from "./routes/health.js";
import { createSummarizeRouter } from "./routes/summarize.js";

export interface AppDependencies {
  config: Pick<AppConfig, "upload">;
  logger: Logger;
  generator: IGenerationClient;
  summarizer: Summarizer;
}

export function createApp({ config, logger, generator, summarizer }: AppDependencies): Express {
  const app = express();

  app.disable("x-powered-by");
  app.use(createRequestIdMiddleware(logger));
  app.use(express.json({ limit: `${String(config.upload.maxUploadMb)}mb` }));

  app.use(createHealthRouter(generator));
  app.use(
    createSummarizeRouter({
      summarizer,
      model: generator.model,
      minTextLength: config.upload.minTextLength,
      maxUploadMb: config.upload.maxUploadMb,
      allowedExtensions: config.upload.allowedExtensions,
    }),
  );

  app.use(notFoundHandler);
  app.use(createErrorHandler(logger));

  return app;
}
