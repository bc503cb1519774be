/**
 * JobStore - Job 상태 관리
 *
 * 역할:
 * - Job 생성 / 조회 / 목록 / 삭제
 * - 상태 전이 검증 (pending → running → completed | failed)
 * - Job ID 단위 직렬화 (KeyedMutex)
 * - 변경 / 삭제 Hook 실행 (락 안에서, 메타데이터 파일 동기화용)
 *   생성 Hook 실패 → 등록 취소 후 예외, 변경 Hook 실패 → 로그만
 */

import { v4 as uuidv4 } from "uuid";
import type { IJobRepository } from "@/core/interfaces/search/IJobRepository";
import {
  canTransition,
  completeJob,
  createScrapeJob,
  failJob,
  startJob,
  type ScrapeJob,
  type ScrapeJobParameters,
  type ScrapeJobResult,
  type ScrapeJobStatus,
} from "@/core/domain/search/ScrapeJob";
import { InvalidJobTransitionError } from "@/core/errors/JobErrors";
import { KeyedMutex } from "@/utils/KeyedMutex";
import { paginate, type PageSlice } from "@/utils/pagination";
import { logger } from "@/config/logger";

export interface JobStoreHooks {
  /** 생성 / 변경 후 (락 보유 중). 변경 시 예외는 전파되지 않음 */
  onJobUpdated?: (job: ScrapeJob) => Promise<void>;
  /** 삭제 후 (락 보유 중) */
  onJobDeleted?: (jobId: string) => Promise<void>;
}

export interface ListJobsQuery {
  status?: ScrapeJobStatus;
  page: number;
  pageSize: number;
}

export type JobMutation = (job: ScrapeJob) => ScrapeJob | Promise<ScrapeJob>;

export class JobStore {
  private readonly locks = new KeyedMutex();

  constructor(
    private readonly repository: IJobRepository,
    private readonly hooks: JobStoreHooks = {},
    private readonly now: () => Date = () => new Date(),
  ) {}

  async createJob(parameters: ScrapeJobParameters): Promise<ScrapeJob> {
    const job = createScrapeJob(uuidv4(), parameters, this.now());
    return this.locks.runExclusive(job.job_id, async () => {
      await this.repository.create(job);
      try {
        await this.hooks.onJobUpdated?.(job);
      } catch (error) {
        // 생성 Hook 실패 시 등록 취소
        await this.repository.delete(job.job_id);
        throw error;
      }
      logger.info({ job_id: job.job_id, query: parameters.query }, "[JobStore] Job 생성");
      return job;
    });
  }

  async getJob(jobId: string): Promise<ScrapeJob | null> {
    return this.repository.get(jobId);
  }

  /**
   * 상태 필터 + created_at 내림차순 + 페이지네이션
   */
  async listJobs(query: ListJobsQuery): Promise<PageSlice<ScrapeJob>> {
    const jobs = (await this.repository.list())
      .filter((job) => !query.status || job.status === query.status)
      .sort((a, b) => b.created_at.localeCompare(a.created_at));
    return paginate(jobs, query.page, query.pageSize);
  }

  /**
   * Job 변경 (락 안에서 읽기 → 변경 → 저장)
   * 상태가 바뀌면 전이 규칙 검증
   *
   * @returns 변경된 Job (삭제된 Job이면 null, mutate 미실행)
   */
  async updateJob(jobId: string, mutate: JobMutation): Promise<ScrapeJob | null> {
    return this.locks.runExclusive(jobId, async () => {
      const current = await this.repository.get(jobId);
      if (!current) {
        return null;
      }

      const next = await mutate(current);
      if (next.status !== current.status && !canTransition(current.status, next.status)) {
        throw new InvalidJobTransitionError(jobId, current.status, next.status);
      }

      const updated: ScrapeJob = { ...next, updated_at: this.now().toISOString() };
      await this.repository.update(updated);
      await this.notifyUpdated(updated);
      return updated;
    });
  }

  /**
   * 변경 Hook 실행
   * 저장된 상태는 유지하고 Hook 실패는 로그만 남김
   */
  private async notifyUpdated(job: ScrapeJob): Promise<void> {
    try {
      await this.hooks.onJobUpdated?.(job);
    } catch (error) {
      logger.error(
        {
          job_id: job.job_id,
          status: job.status,
          error: error instanceof Error ? error.message : String(error),
        },
        "[JobStore] 변경 Hook 실패",
      );
    }
  }

  async markRunning(jobId: string): Promise<ScrapeJob | null> {
    return this.updateJob(jobId, (job) => startJob(job, this.now()));
  }

  async updateProgress(jobId: string, progress: string): Promise<ScrapeJob | null> {
    return this.updateJob(jobId, (job) => ({ ...job, progress }));
  }

  async markCompleted(jobId: string, result: ScrapeJobResult): Promise<ScrapeJob | null> {
    return this.updateJob(jobId, (job) => completeJob(job, result, this.now()));
  }

  async markFailed(jobId: string, error: string): Promise<ScrapeJob | null> {
    return this.updateJob(jobId, (job) => failJob(job, error, this.now()));
  }

  /**
   * @returns 삭제 여부 (없는 Job이면 false)
   */
  async deleteJob(jobId: string): Promise<boolean> {
    return this.locks.runExclusive(jobId, async () => {
      const deleted = await this.repository.delete(jobId);
      if (deleted) {
        await this.hooks.onJobDeleted?.(jobId);
        logger.info({ job_id: jobId }, "[JobStore] Job 삭제");
      }
      return deleted;
    });
  }
}
