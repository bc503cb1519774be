/**
 * ScrapeJob - 스크래핑 Job 도메인 모델
 *
 * 상태 전이: pending → running → completed | failed
 * job_metadata.json 파일 내용과 동일한 구조 (snake_case)
 */

import { z } from "zod";
import { JOB_CONFIG } from "@/config/constants";
import {
  SearchStrategyTypeSchema,
  type ExecutedStrategy,
  type SearchStrategyType,
  type StopReason,
} from "./ScrapeResult";

/**
 * Scrape Job 상태
 */
export enum ScrapeJobStatus {
  PENDING = "pending",
  RUNNING = "running",
  COMPLETED = "completed",
  FAILED = "failed",
}

export const ScrapeJobStatusSchema = z.nativeEnum(ScrapeJobStatus);

export const OutputFormatSchema = z.enum(["json", "csv"]);

export type OutputFormat = z.infer<typeof OutputFormatSchema>;

/**
 * Scrape Job 요청 스키마
 * JSON body / query string 모두 허용 (숫자는 coerce)
 */
export const ScrapeJobRequestSchema = z.object({
  query: z.string().trim().min(1, "query is required"),
  brand: z
    .string()
    .trim()
    .nullish()
    .transform((value) => (value ? value : null)),
  max_products: z.coerce
    .number()
    .int()
    .min(1)
    .max(1000)
    .default(JOB_CONFIG.DEFAULT_MAX_PRODUCTS),
  pages: z.coerce.number().int().min(1).max(50).optional(),
  output_format: OutputFormatSchema.default("json"),
  strategy: SearchStrategyTypeSchema.default("auto"),
});

export type ScrapeJobRequest = z.infer<typeof ScrapeJobRequestSchema>;

/**
 * Job 실행 파라미터
 */
export interface ScrapeJobParameters {
  query: string;
  brand: string | null;
  max_products: number | null;
  max_pages: number | null;
  output_format: OutputFormat;
  delay_ms: number;
  strategy: SearchStrategyType;
}

/**
 * 출력 파일 경로
 */
export interface JobOutputFiles {
  json: string;
  csv: string;
  metadata: string;
}

/**
 * Job 결과 핸들 (완료 시)
 */
export interface ScrapeJobResult {
  total_products: number;
  pages_fetched: number;
  stop_reason: StopReason;
  strategy: ExecutedStrategy;
  output_dir: string;
  output_files: JobOutputFiles;
  /** 부분 수집 등 경고 메시지 */
  warning: string | null;
}

/**
 * Scrape Job 도메인 모델
 */
export interface ScrapeJob {
  /** Job ID (UUID v4) */
  job_id: string;

  status: ScrapeJobStatus;

  parameters: ScrapeJobParameters;

  /** 실행 중 진행 상황 */
  progress: string | null;

  /** 결과 핸들 (완료 시) */
  result: ScrapeJobResult | null;

  /** 에러 메시지 (실패 시) */
  error: string | null;

  created_at: string;
  updated_at: string;
  started_at: string | null;
  completed_at: string | null;
}

const ALLOWED_TRANSITIONS: Record<ScrapeJobStatus, readonly ScrapeJobStatus[]> = {
  [ScrapeJobStatus.PENDING]: [ScrapeJobStatus.RUNNING],
  [ScrapeJobStatus.RUNNING]: [ScrapeJobStatus.COMPLETED, ScrapeJobStatus.FAILED],
  [ScrapeJobStatus.COMPLETED]: [],
  [ScrapeJobStatus.FAILED]: [],
};

/**
 * 상태 전이 가능 여부
 */
export function canTransition(from: ScrapeJobStatus, to: ScrapeJobStatus): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

export function isTerminalStatus(status: ScrapeJobStatus): boolean {
  return status === ScrapeJobStatus.COMPLETED || status === ScrapeJobStatus.FAILED;
}

/**
 * ScrapeJob 생성 헬퍼
 */
export function createScrapeJob(
  jobId: string,
  parameters: ScrapeJobParameters,
  now: Date = new Date(),
): ScrapeJob {
  const timestamp = now.toISOString();
  return {
    job_id: jobId,
    status: ScrapeJobStatus.PENDING,
    parameters,
    progress: null,
    result: null,
    error: null,
    created_at: timestamp,
    updated_at: timestamp,
    started_at: null,
    completed_at: null,
  };
}

/**
 * 저장소(JSON 직렬화)에서 읽은 Job 검증용 스키마
 */
export const ScrapeJobSchema: z.ZodType<ScrapeJob> = z.object({
  job_id: z.string(),
  status: ScrapeJobStatusSchema,
  parameters: z.object({
    query: z.string(),
    brand: z.string().nullable(),
    max_products: z.number().nullable(),
    max_pages: z.number().nullable(),
    output_format: OutputFormatSchema,
    delay_ms: z.number(),
    strategy: SearchStrategyTypeSchema,
  }),
  progress: z.string().nullable(),
  result: z
    .object({
      total_products: z.number(),
      pages_fetched: z.number(),
      stop_reason: z.enum(["max_products", "max_pages", "end_of_results", "error"]),
      strategy: z.enum(["graphql", "browser"]),
      output_dir: z.string(),
      output_files: z.object({
        json: z.string(),
        csv: z.string(),
        metadata: z.string(),
      }),
      warning: z.string().nullable(),
    })
    .nullable(),
  error: z.string().nullable(),
  created_at: z.string(),
  updated_at: z.string(),
  started_at: z.string().nullable(),
  completed_at: z.string().nullable(),
});

/**
 * running 전이 (started_at 기록)
 */
export function startJob(job: ScrapeJob, now: Date = new Date()): ScrapeJob {
  return {
    ...job,
    status: ScrapeJobStatus.RUNNING,
    started_at: now.toISOString(),
    progress: "started",
  };
}

/**
 * completed 전이 (결과 핸들 / completed_at 기록)
 */
export function completeJob(job: ScrapeJob, result: ScrapeJobResult, now: Date = new Date()): ScrapeJob {
  return {
    ...job,
    status: ScrapeJobStatus.COMPLETED,
    result,
    progress: `completed: ${result.total_products} products`,
    completed_at: now.toISOString(),
  };
}

/**
 * failed 전이 (에러 메시지 / completed_at 기록)
 */
export function failJob(job: ScrapeJob, error: string, now: Date = new Date()): ScrapeJob {
  return {
    ...job,
    status: ScrapeJobStatus.FAILED,
    error,
    progress: "failed",
    completed_at: now.toISOString(),
  };
}
