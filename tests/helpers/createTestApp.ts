/**
 * 라우터 테스트용 앱 구성
 * 실제 ScrapeJobService + 스크래퍼 대역 + 임시 결과 디렉토리
 */

import { jest } from "@jest/globals";
import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import type { Express } from "express";
import { createApp } from "@/app";
import { ScrapeJobService, type Scraper } from "@/services/ScrapeJobService";
import { JobStore } from "@/services/JobStore";
import { InMemoryJobRepository } from "@/repositories/InMemoryJobRepository";
import { JobOutputWriter } from "@/utils/JobOutputWriter";
import type { ScrapeOutcome } from "@/core/domain/search/ScrapeResult";
import { createProductRecord } from "./fixtures";

export type ScrapeFn = Scraper["scrape"];

export interface TestApp {
  app: Express;
  service: ScrapeJobService;
  scrape: jest.Mock<ScrapeFn>;
  writer: JobOutputWriter;
  close(): Promise<void>;
}

export function successfulOutcome(): ScrapeOutcome {
  return {
    products: [createProductRecord(), createProductRecord({ id: "2100000002", title: "Wardah Toner" })],
    pagesFetched: 1,
    stopReason: "end_of_results",
    searchId: null,
    strategy: "graphql",
    error: null,
  };
}

export async function createTestApp(): Promise<TestApp> {
  const baseDir = await fs.mkdtemp(path.join(os.tmpdir(), "scraper-api-"));
  const writer = new JobOutputWriter(baseDir);
  const scrape = jest.fn<ScrapeFn>().mockResolvedValue(successfulOutcome());
  const store = new JobStore(new InMemoryJobRepository(), {
    onJobUpdated: (job) => writer.writeMetadata(job),
    onJobDeleted: (jobId) => writer.removeJob(jobId),
  });
  const service = new ScrapeJobService({ store, scraper: { scrape }, writer });

  return {
    app: createApp({ jobService: service }),
    service,
    scrape,
    writer,
    close: async () => {
      await service.waitForIdle();
      await fs.rm(baseDir, { recursive: true, force: true });
    },
  };
}
