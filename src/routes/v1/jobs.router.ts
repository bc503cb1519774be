/**
 * Jobs API Router
 *
 * 스크래핑 Job 비동기 처리 API
 * - POST / - Job 생성 (body 또는 query string)
 * - GET / - Job 목록 (status 필터, 페이지네이션)
 * - GET /:jobId - Job 상태
 * - GET /:jobId/results - 결과 (페이지네이션)
 * - GET /:jobId/download - 결과 파일 (json | csv)
 * - DELETE /:jobId - Job 및 결과 파일 삭제
 */

import { Router, type NextFunction, type Request, type Response } from "express";
import { ScrapeJobRequestSchema } from "@/core/domain/search/ScrapeJob";
import { toJobParameters, type ScrapeJobService } from "@/services/ScrapeJobService";
import { mergeQueryAndBody, parseOrRespond } from "@/middleware/validation";
import { DownloadQuerySchema, ListJobsQuerySchema, ResultsQuerySchema } from "@/routes/schemas";
import { logger } from "@/config/logger";

export function createJobsRouter(jobService: ScrapeJobService): Router {
  const router = Router();

  /**
   * POST /api/v1/jobs
   *
   * Body (또는 query string):
   * { "query": "iphone 15", "brand": "Apple", "max_products": 100, "pages": 2 }
   *
   * Response 202:
   * { "success": true, "data": { "job_id": "uuid", "status": "pending", "message": "..." } }
   */
  router.post("/", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const request = parseOrRespond(
        ScrapeJobRequestSchema,
        mergeQueryAndBody(req.query, req.body),
        res,
      );
      if (!request) return;

      const job = await jobService.submit(toJobParameters(request));

      logger.info(
        { job_id: job.job_id, query: request.query, brand: request.brand },
        "[JobsRouter] Scrape Job 생성",
      );

      res.status(202).json({
        success: true,
        data: {
          job_id: job.job_id,
          status: job.status,
          message: `Scraping job started for query: ${request.query}`,
        },
      });
    } catch (error) {
      next(error);
    }
  });

  router.get("/", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = parseOrRespond(ListJobsQuerySchema, req.query, res);
      if (!query) return;

      const slice = await jobService.listJobs({
        status: query.status,
        page: query.page,
        pageSize: query.page_size,
      });

      res.json({
        success: true,
        data: {
          total_jobs: slice.total,
          page: slice.page,
          page_size: slice.page_size,
          total_pages: slice.total_pages,
          jobs: slice.items,
        },
      });
    } catch (error) {
      next(error);
    }
  });

  router.get("/:jobId", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const job = await jobService.getJob(req.params.jobId);
      res.json({ success: true, data: job });
    } catch (error) {
      next(error);
    }
  });

  router.get("/:jobId/results", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = parseOrRespond(ResultsQuerySchema, req.query, res);
      if (!query) return;

      const results = await jobService.getResults(req.params.jobId, query.page, query.page_size);

      res.json({
        success: true,
        data: {
          job_id: results.job.job_id,
          status: results.job.status,
          total_items: results.total,
          page: results.page,
          page_size: results.page_size,
          total_pages: results.total_pages,
          items: results.items,
        },
      });
    } catch (error) {
      next(error);
    }
  });

  router.get("/:jobId/download", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = parseOrRespond(DownloadQuerySchema, req.query, res);
      if (!query) return;

      const jobId = req.params.jobId;
      const file = await jobService.getResultFile(jobId, query.format);
      res.download(file.path, `tokopedia_${jobId}.${file.format}`, (error) => {
        if (error) {
          next(error);
        }
      });
    } catch (error) {
      next(error);
    }
  });

  router.delete("/:jobId", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const jobId = req.params.jobId;
      await jobService.deleteJob(jobId);
      res.json({
        success: true,
        data: { job_id: jobId, message: `Job ${jobId} deleted successfully` },
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
