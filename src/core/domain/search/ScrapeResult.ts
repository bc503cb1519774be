/**
 * 스크래핑 실행 옵션 / 결과 타입
 */

import { z } from "zod";
import type { ProductRecord } from "./ProductRecord";

export const SearchStrategyTypeSchema = z.enum(["graphql", "browser", "auto"]);

/** 검색 전략 선택 (auto: GraphQL 우선, 실패 시 브라우저) */
export type SearchStrategyType = z.infer<typeof SearchStrategyTypeSchema>;

/** 실제 실행된 전략 */
export type ExecutedStrategy = Exclude<SearchStrategyType, "auto">;

/**
 * 수집 종료 사유
 * - max_products: 상품 수 상한 도달
 * - max_pages: 페이지 상한 도달
 * - end_of_results: 신규 상품 없는 페이지
 * - error: 재시도 소진 후 중단 (수집분 유지)
 */
export type StopReason = "max_products" | "max_pages" | "end_of_results" | "error";

/**
 * 페이지 진행 상황 (Job progress 갱신용)
 */
export interface ScrapeProgress {
  page: number;
  pageProducts: number;
  totalProducts: number;
}

export interface ScrapeOptions {
  /** 검색 키워드 */
  keyword: string;
  /** 브랜드 필터 (검색어 앞에 붙음) */
  brand: string | null;
  /** 상품 수 상한 (null: 무제한) */
  maxProducts: number | null;
  /** 페이지 상한 (null: 하드 상한까지) */
  maxPages: number | null;
  /** 페이지 간 대기 (ms) */
  delayMs: number;
  /** 페이지 처리 후 호출 (완료까지 대기) */
  onProgress?: (progress: ScrapeProgress) => void | Promise<void>;
}

export interface ScrapeOutcome {
  products: ProductRecord[];
  pagesFetched: number;
  stopReason: StopReason;
  strategy: ExecutedStrategy;
  /** 첫 페이지에서 받은 검색 세션 ID (브라우저 수집은 null) */
  searchId: string | null;
  /** stopReason === "error" 일 때 마지막 에러 메시지 */
  error: string | null;
}

/**
 * 검색어 생성: "{brand} {keyword}"
 */
export function buildSearchQuery(keyword: string, brand: string | null): string {
  return [brand, keyword]
    .map((part) => (part ?? "").trim())
    .filter((part) => part.length > 0)
    .join(" ");
}
