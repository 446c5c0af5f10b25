import { Router } from "express";
import type { HealthResponse } from "@docdigest/types";
import type { IGenerationClient } from "@docdigest/generation";
import { SERVICE_NAME, SERVICE_VERSION } from "../service-info.js";
import { asyncHandler } from "../middleware/async-handler.js";

export function createHealthRouter(generator: IGenerationClient): Router {
  const router = Router();

  router.get("/", (_req, res) => {
    res.json({
      service: SERVICE_NAME,
      status: "running",
      version: SERVICE_VERSION,
      model: generator.model,
      endpoints: {
        summarize: "/summarize",
        health: "/health",
      },
    });
  });

  router.get(
    "/health",
    asyncHandler(async (_req, res) => {
      const healthy = await generator.healthCheck();
      const body: HealthResponse = {
        server: "healthy",
        ollama: healthy ? "healthy" : "unhealthy",
        ollamaUrl: generator.baseUrl,
        model: generator.model,
      };
      res.json(body);
    }),
  );

  return router;
}
