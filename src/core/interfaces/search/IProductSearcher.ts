/**
 * IProductSearcher - 검색 전략 공통 인터페이스 (GraphQL / 브라우저)
 */

import type {
  ExecutedStrategy,
  ScrapeOptions,
  ScrapeOutcome,
} from "@/core/domain/search/ScrapeResult";

export interface IProductSearcher {
  readonly strategy: ExecutedStrategy;

  /**
   * 상한 / 빈 페이지 / 에러까지 수집
   * 요청 실패는 stopReason "error"로 반환 (수집분 유지)
   */
  search(options: ScrapeOptions): Promise<ScrapeOutcome>;

  /**
   * 리소스 정리
   */
  cleanup(): Promise<void>;
}
