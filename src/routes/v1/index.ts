/**
 * API v1 Router
 */

import { Router } from "express";
import type { ScrapeJobService } from "@/services/ScrapeJobService";
import { createJobsRouter } from "./jobs.router";

export function createV1Router(jobService: ScrapeJobService): Router {
  const router = Router();
  router.use("/jobs", createJobsRouter(jobService));
  return router;
}
