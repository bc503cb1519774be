/**
 * IJobRepository - Job 저장소
 * 동시성 제어는 JobStore 담당 (저장소는 단순 읽기/쓰기)
 */

import type { ScrapeJob } from "@/core/domain/search/ScrapeJob";

export interface IJobRepository {
  create(job: ScrapeJob): Promise<void>;

  get(jobId: string): Promise<ScrapeJob | null>;

  update(job: ScrapeJob): Promise<void>;

  /**
   * @returns 삭제 여부 (없으면 false)
   */
  delete(jobId: string): Promise<boolean>;

  list(): Promise<ScrapeJob[]>;
}
