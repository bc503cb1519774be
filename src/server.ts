/**
 * Tokopedia Scraper API 서버
 */

import "dotenv/config";
import { createApp } from "@/app";
import { createJobService } from "@/services/createJobService";
import { logger } from "@/config/logger";
import { logImportant } from "@/utils/LoggerContext";
import { API_CONFIG, APP_METADATA, JOB_CONFIG, OUTPUT_CONFIG, SERVICE_NAMES } from "@/config/constants";

const log = logger.child({ service_name: SERVICE_NAMES.SERVER });
const jobService = createJobService();
const app = createApp({ jobService });
const BASE_URL = `http://localhost:${API_CONFIG.PORT}`;

const server = app.listen(API_CONFIG.PORT, API_CONFIG.HOST, () => {
  logImportant(log, `${APP_METADATA.NAME} 서버 시작`, {
    port: API_CONFIG.PORT,
    env: process.env.NODE_ENV || "development",
    version: APP_METADATA.VERSION,
    jobStore: JOB_CONFIG.STORE,
    resultDir: OUTPUT_CONFIG.RESULT_DIR,
  });

  log.info(
    {
      baseUrl: BASE_URL,
      endpoints: {
        health: `${BASE_URL}/health`,
        create: "POST /api/v1/jobs",
        list: "GET /api/v1/jobs",
        status: "GET /api/v1/jobs/:jobId",
        results: "GET /api/v1/jobs/:jobId/results",
        download: "GET /api/v1/jobs/:jobId/download",
        delete: "DELETE /api/v1/jobs/:jobId",
        legacy: "/scrape/* (deprecated)",
      },
    },
    "API 엔드포인트 등록 완료",
  );
});

function shutdown(signal: string): void {
  log.warn(`${signal} 수신, 서버 종료 중...`);

  server.close(() => {
    log.info({ activeJobs: jobService.activeCount }, "HTTP 서버 종료 - 실행 중인 Job 대기");
    jobService
      .waitForIdle()
      .then(() => {
        logImportant(log, "서버 종료 완료");
        process.exit(0);
      })
      .catch((error: unknown) => {
        log.error({ error: error instanceof Error ? error.message : String(error) }, "종료 처리 실패");
        process.exit(1);
      });
  });
}

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));
