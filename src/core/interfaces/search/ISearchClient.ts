/**
 * ISearchClient - 검색 API 페이지 단위 호출
 */

import type { SearchPage, SearchPageRequest } from "@/core/domain/search/TokopediaSearch";

export interface ISearchClient {
  /** 요청당 상품 수 (다음 페이지 start 증가분) */
  readonly pageSize: number;

  /**
   * 검색 결과 한 페이지 요청
   * 재시도 소진 / 재시도 불가 실패 시 SearchRequestError
   */
  fetchPage(request: SearchPageRequest): Promise<SearchPage>;
}
