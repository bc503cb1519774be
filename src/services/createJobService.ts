/**
 * 기본 구성의 ScrapeJobService 생성
 * 저장소(JOB_STORE) + 결과 파일 + 메타데이터 동기화
 */

import { createJobRepository } from "@/repositories";
import { ProductScraper } from "@/searchers/ProductScraper";
import { JobOutputWriter } from "@/utils/JobOutputWriter";
import { JobStore } from "./JobStore";
import { ScrapeJobService } from "./ScrapeJobService";

export function createJobService(writer: JobOutputWriter = new JobOutputWriter()): ScrapeJobService {
  const store = new JobStore(createJobRepository(), {
    onJobUpdated: (job) => writer.writeMetadata(job),
    onJobDeleted: (jobId) => writer.removeJob(jobId),
  });

  return new ScrapeJobService({
    store,
    scraper: new ProductScraper(),
    writer,
  });
}
