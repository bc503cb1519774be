/**
 * ScrapeJobService - 스크래핑 Job 실행 관리
 *
 * 역할:
 * - Job 생성 후 Job당 워커 1개 실행 (동시 실행 수 제한: Semaphore)
 * - 결과 파일 저장 후 completed, 예외 시 failed
 * - 결과 조회 (페이지네이션), 다운로드 경로, 삭제
 *
 * 실행 중 삭제된 Job: 스크래핑은 끝까지 진행, 결과는 폐기
 */

import { Semaphore } from "async-mutex";
import type { ProductRecord } from "@/core/domain/search/ProductRecord";
import {
  ScrapeJobStatus,
  completeJob,
  type OutputFormat,
  type ScrapeJob,
  type ScrapeJobParameters,
  type ScrapeJobRequest,
} from "@/core/domain/search/ScrapeJob";
import type {
  ScrapeOptions,
  ScrapeOutcome,
  SearchStrategyType,
} from "@/core/domain/search/ScrapeResult";
import { JobNotCompletedError, JobNotFoundError } from "@/core/errors/JobErrors";
import { JOB_CONFIG, SCRAPER_CONFIG } from "@/config/constants";
import { logger, type Logger } from "@/config/logger";
import { createJobLogger, logImportant } from "@/utils/LoggerContext";
import { JobOutputWriter } from "@/utils/JobOutputWriter";
import { paginate, type PageSlice } from "@/utils/pagination";
import { JobStore, type ListJobsQuery } from "./JobStore";

/**
 * 스크래퍼 (ProductScraper 호환)
 */
export interface Scraper {
  scrape(options: ScrapeOptions, strategy: SearchStrategyType, log: Logger): Promise<ScrapeOutcome>;
}

export interface ScrapeJobServiceOptions {
  store: JobStore;
  scraper: Scraper;
  writer: JobOutputWriter;
  maxConcurrentJobs?: number;
  /** Job 로거의 부모 (기본: 전역 logger) */
  logger?: Logger;
}

export interface JobResultsPage extends PageSlice<ProductRecord> {
  job: ScrapeJob;
}

/**
 * REST 요청 → Job 파라미터
 */
export function toJobParameters(request: ScrapeJobRequest): ScrapeJobParameters {
  return {
    query: request.query,
    brand: request.brand,
    max_products: request.max_products,
    max_pages: request.pages ?? null,
    output_format: request.output_format,
    delay_ms: SCRAPER_CONFIG.DELAY_MS,
    strategy: request.strategy,
  };
}

export class ScrapeJobService {
  private readonly store: JobStore;
  private readonly scraper: Scraper;
  private readonly writer: JobOutputWriter;
  private readonly semaphore: Semaphore;
  private readonly log: Logger;
  private readonly activeTasks = new Map<string, Promise<void>>();

  constructor(options: ScrapeJobServiceOptions) {
    this.store = options.store;
    this.scraper = options.scraper;
    this.writer = options.writer;
    this.semaphore = new Semaphore(Math.max(1, options.maxConcurrentJobs ?? JOB_CONFIG.MAX_CONCURRENT_JOBS));
    this.log = options.logger ?? logger;
  }

  /**
   * Job 생성 + 워커 시작 (결과를 기다리지 않음)
   */
  async submit(parameters: ScrapeJobParameters): Promise<ScrapeJob> {
    const job = await this.store.createJob(parameters);
    this.schedule(job.job_id);
    return job;
  }

  async getJob(jobId: string): Promise<ScrapeJob> {
    const job = await this.store.getJob(jobId);
    if (!job) {
      throw new JobNotFoundError(jobId);
    }
    return job;
  }

  async listJobs(query: ListJobsQuery): Promise<PageSlice<ScrapeJob>> {
    return this.store.listJobs(query);
  }

  /**
   * 결과 페이지 조회 (완료 전이면 빈 목록)
   */
  async getResults(jobId: string, page: number, pageSize: number): Promise<JobResultsPage> {
    const job = await this.getJob(jobId);
    const products =
      job.status === ScrapeJobStatus.COMPLETED ? ((await this.writer.readResults(jobId)) ?? []) : [];
    return { job, ...paginate(products, page, pageSize) };
  }

  /**
   * 다운로드할 결과 파일 경로
   * @param format 미지정 시 Job의 output_format
   */
  async getResultFile(
    jobId: string,
    format?: OutputFormat,
  ): Promise<{ path: string; format: OutputFormat }> {
    const job = await this.getJob(jobId);
    if (job.status !== ScrapeJobStatus.COMPLETED || !job.result) {
      throw new JobNotCompletedError(jobId, job.status);
    }
    const resolved = format ?? job.parameters.output_format;
    return { path: job.result.output_files[resolved], format: resolved };
  }

  async deleteJob(jobId: string): Promise<void> {
    if (!(await this.store.deleteJob(jobId))) {
      throw new JobNotFoundError(jobId);
    }
  }

  /**
   * 실행 중인 워커 수
   */
  get activeCount(): number {
    return this.activeTasks.size;
  }

  /**
   * 실행 중 / 대기 중인 워커 종료 대기 (테스트, graceful shutdown)
   */
  async waitForIdle(): Promise<void> {
    while (this.activeTasks.size > 0) {
      await Promise.all([...this.activeTasks.values()]);
    }
  }

  private schedule(jobId: string): void {
    const task = this.semaphore
      .runExclusive(() => this.execute(jobId))
      .catch((error: unknown) => {
        this.log.error(
          { job_id: jobId, error: error instanceof Error ? error.message : String(error) },
          "[ScrapeJobService] 워커 처리 중 예외",
        );
      })
      .finally(() => {
        this.activeTasks.delete(jobId);
      });
    this.activeTasks.set(jobId, task);
  }

  /**
   * 워커: running → 스크래핑 → 결과 저장 → completed | failed
   */
  private async execute(jobId: string): Promise<void> {
    const log = createJobLogger(jobId, this.log);
    const startTime = Date.now();

    try {
      const job = await this.store.markRunning(jobId);
      if (!job) {
        log.info("[ScrapeJobService] 삭제된 Job - 실행 건너뜀");
        return;
      }
      const params = job.parameters;

      const outcome = await this.scraper.scrape(
        {
          keyword: params.query,
          brand: params.brand,
          maxProducts: params.max_products,
          maxPages: params.max_pages,
          delayMs: params.delay_ms,
          onProgress: async ({ page, totalProducts }) => {
            await this.store.updateProgress(jobId, `page ${page}: ${totalProducts} products`);
          },
        },
        params.strategy,
        log,
      );

      if (outcome.stopReason === "error" && outcome.products.length === 0) {
        await this.store.markFailed(jobId, outcome.error ?? "Scraping failed");
        log.warn({ error: outcome.error }, "[ScrapeJobService] 수집 실패 - 상품 없음");
        return;
      }

      const completed = await this.store.updateJob(jobId, async (current) => {
        const files = await this.writer.writeResults(jobId, outcome.products);
        return completeJob(current, {
          total_products: outcome.products.length,
          pages_fetched: outcome.pagesFetched,
          stop_reason: outcome.stopReason,
          strategy: outcome.strategy,
          output_dir: this.writer.getJobDir(jobId),
          output_files: files,
          warning:
            outcome.stopReason === "error"
              ? `Stopped early after an error: ${outcome.error ?? "unknown"}`
              : null,
        });
      });

      if (!completed) {
        log.info("[ScrapeJobService] 실행 중 삭제된 Job - 결과 폐기");
        return;
      }

      logImportant(log, "[ScrapeJobService] Job 완료", {
        totalProducts: outcome.products.length,
        stopReason: outcome.stopReason,
        durationMs: Date.now() - startTime,
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      log.error({ error: message, durationMs: Date.now() - startTime }, "[ScrapeJobService] Job 실패");
      await this.store.markFailed(jobId, message);
    }
  }
}
