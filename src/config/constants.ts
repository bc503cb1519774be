/**
 * 애플리케이션 상수
 * 환경 변수 기반 설정 (기본값 포함)
 */

import path from "path";

function readInt(value: string | undefined, fallback: number): number {
  const parsed = Number.parseInt(value ?? "", 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

export const APP_METADATA = {
  NAME: "tokopedia-scraper",
  SERVICE: "Tokopedia Scraper API",
  VERSION: "1.0.0",
} as const;

/**
 * 서버 설정
 */
export const API_CONFIG = {
  HOST: process.env.HOST || "0.0.0.0",
  PORT: readInt(process.env.PORT, 8000),
} as const;

/**
 * 로그 서비스 이름 (파일 라우팅용)
 */
export const SERVICE_NAMES = {
  SERVER: "server",
  CLI: "cli",
} as const;

/**
 * 결과 파일 저장 경로
 * 구조: {RESULT_DIR}/jobs/{job_id}/{json,csv}/results.*
 */
export const OUTPUT_CONFIG = {
  RESULT_DIR: process.env.RESULT_OUTPUT_DIR || path.join(process.cwd(), "results"),
  JOBS_SUBDIR: "jobs",
  METADATA_FILE: "job_metadata.json",
} as const;

/**
 * Job 처리 설정
 */
export const JOB_CONFIG = {
  STORE: process.env.JOB_STORE === "redis" ? "redis" : "memory",
  MAX_CONCURRENT_JOBS: readInt(process.env.MAX_CONCURRENT_JOBS, 2),
  DEFAULT_MAX_PRODUCTS: readInt(process.env.DEFAULT_MAX_PRODUCTS, 100),
} as const;

export const REDIS_CONFIG = {
  HOST: process.env.REDIS_HOST || "localhost",
  PORT: readInt(process.env.REDIS_PORT, 6379),
  KEY_PREFIX: "tokopedia:job:",
  INDEX_KEY: "tokopedia:jobs",
  // 상태별 TTL (초)
  TTL: {
    ACTIVE: 24 * 60 * 60,
    FINISHED: 7 * 24 * 60 * 60,
  },
} as const;

/**
 * 스크래퍼 설정
 */
export const SCRAPER_CONFIG = {
  PLATFORM: "tokopedia",
  MARKETPLACE_NAME: "Tokopedia",
  BASE_URL: "https://www.tokopedia.com",
  DELAY_MS: readInt(process.env.SCRAPER_DELAY_MS, 1000),
  // 페이지 상한 미지정 시 적용되는 절대 상한
  HARD_PAGE_LIMIT: readInt(process.env.SCRAPER_MAX_PAGES, 100),
  CHROMIUM_PATH: process.env.CHROMIUM_PATH || "",
  DEFAULT_USER_AGENT:
    "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/131.0.0.0 Safari/537.36",
} as const;
