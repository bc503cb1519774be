/**
 * Job 관련 에러
 */

import type { ScrapeJobStatus } from "@/core/domain/search/ScrapeJob";

export class JobNotFoundError extends Error {
  constructor(public readonly jobId: string) {
    super(`Job not found: ${jobId}`);
    this.name = "JobNotFoundError";
  }
}

export class InvalidJobTransitionError extends Error {
  constructor(
    public readonly jobId: string,
    public readonly from: ScrapeJobStatus,
    public readonly to: ScrapeJobStatus,
  ) {
    super(`Invalid job transition for ${jobId}: ${from} → ${to}`);
    this.name = "InvalidJobTransitionError";
  }
}

/**
 * 완료되지 않은 Job의 결과 요청
 */
export class JobNotCompletedError extends Error {
  constructor(
    public readonly jobId: string,
    public readonly status: ScrapeJobStatus,
  ) {
    super(`Job ${jobId} is not completed yet (status: ${status})`);
    this.name = "JobNotCompletedError";
  }
}
