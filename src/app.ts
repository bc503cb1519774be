/**
 * Express 앱 구성
 * 의존성(ScrapeJobService)은 호출 측에서 주입
 */

import express, { type Express } from "express";
import cors from "cors";
import type { ScrapeJobService } from "@/services/ScrapeJobService";
import { createV1Router } from "@/routes/v1";
import { createLegacyScrapeRouter } from "@/routes/legacy/scrape.router";
import { errorHandler, notFoundHandler } from "@/middleware/errorHandler";
import { requestLogger } from "@/middleware/requestLogger";
import { APP_METADATA } from "@/config/constants";

export interface AppDependencies {
  jobService: ScrapeJobService;
}

export function createApp({ jobService }: AppDependencies): Express {
  const app = express();

  app.use(cors());
  app.use(express.json());
  app.use(requestLogger);

  app.get("/health", (_req, res) => {
    res.json({
      status: "healthy",
      service: APP_METADATA.SERVICE,
      version: APP_METADATA.VERSION,
    });
  });

  app.use("/api/v1", createV1Router(jobService));

  // Deprecated: /api/v1/jobs 로 이전
  app.use("/scrape", createLegacyScrapeRouter(jobService));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
