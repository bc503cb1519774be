/**
 * Legacy Scrape API (Deprecated)
 *
 * 기존 클라이언트 호환용 - /api/v1/jobs 사용 권장
 * 응답은 envelope 없는 기존 형식 유지
 *
 * - POST /scrape/search
 * - GET /scrape/status/:jobId
 * - GET /scrape/results/:jobId (완료 전 400)
 * - GET /scrape/jobs
 * - DELETE /scrape/jobs/:jobId
 */

import { Router, type NextFunction, type Request, type Response } from "express";
import { ScrapeJobRequestSchema, ScrapeJobStatus } from "@/core/domain/search/ScrapeJob";
import { toJobParameters, type ScrapeJobService } from "@/services/ScrapeJobService";
import { mergeQueryAndBody, parseOrRespond } from "@/middleware/validation";
import { ListJobsQuerySchema } from "@/routes/schemas";
import { logger } from "@/config/logger";

function warnDeprecated(req: Request, replacement: string): void {
  (req.log ?? logger).warn(
    { path: req.originalUrl, replacement },
    `[DEPRECATED] ${req.method} ${req.baseUrl}${req.path} → ${replacement}`,
  );
}

export function createLegacyScrapeRouter(jobService: ScrapeJobService): Router {
  const router = Router();

  router.post("/search", async (req: Request, res: Response, next: NextFunction) => {
    warnDeprecated(req, "POST /api/v1/jobs");
    try {
      const request = parseOrRespond(
        ScrapeJobRequestSchema,
        mergeQueryAndBody(req.query, req.body),
        res,
      );
      if (!request) return;

      const job = await jobService.submit(toJobParameters(request));
      res.status(202).json({
        job_id: job.job_id,
        status: job.status,
        message: `Scraping job started for query: ${request.query}`,
        created_at: job.created_at,
      });
    } catch (error) {
      next(error);
    }
  });

  router.get("/status/:jobId", async (req: Request, res: Response, next: NextFunction) => {
    warnDeprecated(req, "GET /api/v1/jobs/:jobId");
    try {
      res.json(await jobService.getJob(req.params.jobId));
    } catch (error) {
      next(error);
    }
  });

  router.get("/results/:jobId", async (req: Request, res: Response, next: NextFunction) => {
    warnDeprecated(req, "GET /api/v1/jobs/:jobId/results");
    try {
      const jobId = req.params.jobId;
      const job = await jobService.getJob(jobId);
      if (job.status !== ScrapeJobStatus.COMPLETED) {
        res.status(400).json({
          success: false,
          error: "Bad Request",
          message: `Job ${jobId} is not completed yet (status: ${job.status})`,
        });
        return;
      }

      const results = await jobService.getResults(jobId, 1, Math.max(1, job.result?.total_products ?? 1));
      res.json({
        job_id: jobId,
        status: job.status,
        result_count: results.total,
        results: results.items,
      });
    } catch (error) {
      next(error);
    }
  });

  router.get("/jobs", async (req: Request, res: Response, next: NextFunction) => {
    warnDeprecated(req, "GET /api/v1/jobs");
    try {
      const query = parseOrRespond(ListJobsQuerySchema, req.query, res);
      if (!query) return;

      const slice = await jobService.listJobs({
        status: query.status,
        page: query.page,
        pageSize: query.page_size,
      });
      res.json({ total_jobs: slice.total, jobs: slice.items });
    } catch (error) {
      next(error);
    }
  });

  router.delete("/jobs/:jobId", async (req: Request, res: Response, next: NextFunction) => {
    warnDeprecated(req, "DELETE /api/v1/jobs/:jobId");
    try {
      const jobId = req.params.jobId;
      await jobService.deleteJob(jobId);
      res.json({ message: `Job ${jobId} deleted successfully` });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
