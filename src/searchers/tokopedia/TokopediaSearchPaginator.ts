/**
 * TokopediaSearchPaginator - GraphQL 검색 페이지 순회
 *
 * 종료 조건 (먼저 도달한 것):
 * - 상품 수 상한
 * - 페이지 상한 (미지정 시 SCRAPER_CONFIG.HARD_PAGE_LIMIT)
 * - 신규 상품이 없는 페이지
 * - 재시도 소진 (수집분 유지)
 *
 * 이미 수집한 상품 ID는 다음 요청의 minus_ids로 전달
 */

import type { ISearchClient } from "@/core/interfaces/search/ISearchClient";
import type { IProductSearcher } from "@/core/interfaces/search/IProductSearcher";
import type { ProductRecord } from "@/core/domain/search/ProductRecord";
import {
  buildSearchQuery,
  type ScrapeOptions,
  type ScrapeOutcome,
  type StopReason,
} from "@/core/domain/search/ScrapeResult";
import type { SearchPage } from "@/core/domain/search/TokopediaSearch";
import { SearchRequestError } from "@/core/errors/SearchRequestError";
import { TokopediaProductMapper } from "@/scrapers/mappers/TokopediaProductMapper";
import { SCRAPER_CONFIG } from "@/config/constants";
import { logger, type Logger } from "@/config/logger";
import { sleep as defaultSleep, type Sleeper } from "@/utils/sleep";

export interface TokopediaSearchPaginatorOptions {
  mapper?: TokopediaProductMapper;
  sleep?: Sleeper;
  hardPageLimit?: number;
  logger?: Logger;
}

export class TokopediaSearchPaginator implements IProductSearcher {
  readonly strategy = "graphql" as const;

  private readonly mapper: TokopediaProductMapper;
  private readonly sleep: Sleeper;
  private readonly hardPageLimit: number;
  private readonly log: Logger;

  constructor(
    private readonly client: ISearchClient,
    options: TokopediaSearchPaginatorOptions = {},
  ) {
    this.mapper = options.mapper ?? new TokopediaProductMapper();
    this.sleep = options.sleep ?? defaultSleep;
    this.hardPageLimit = options.hardPageLimit ?? SCRAPER_CONFIG.HARD_PAGE_LIMIT;
    this.log = options.logger ?? logger;
  }

  async search(options: ScrapeOptions): Promise<ScrapeOutcome> {
    const query = buildSearchQuery(options.keyword, options.brand);
    if (!query) {
      throw new Error("Search query is empty");
    }

    const maxProducts = options.maxProducts;
    const pageLimit = options.maxPages ?? this.hardPageLimit;
    const products: ProductRecord[] = [];
    const emittedIds = new Set<string>();
    const excludedIds: string[] = [];
    const capReached = () => maxProducts !== null && products.length >= maxProducts;

    let page = 1;
    let start = 0;
    let pagesFetched = 0;
    let searchId: string | null = null;

    const finish = (stopReason: StopReason, error: string | null = null): ScrapeOutcome => {
      this.log.info(
        { query, stopReason, pagesFetched, totalProducts: products.length, error },
        "[TokopediaSearchPaginator] 수집 종료",
      );
      return { products, pagesFetched, stopReason, strategy: this.strategy, searchId, error };
    };

    this.log.info({ query, maxProducts, maxPages: pageLimit }, "[TokopediaSearchPaginator] 수집 시작");

    for (;;) {
      if (capReached()) {
        return finish("max_products");
      }
      if (page > pageLimit) {
        return finish("max_pages");
      }

      let result: SearchPage;
      try {
        result = await this.client.fetchPage({
          query,
          page,
          start,
          excludedIds: [...excludedIds],
          searchId,
        });
      } catch (error) {
        if (error instanceof SearchRequestError) {
          this.log.error(
            { ...error.toLogObject(), page },
            "[TokopediaSearchPaginator] 페이지 요청 실패 - 수집 중단",
          );
          return finish("error", error.message);
        }
        throw error;
      }

      pagesFetched++;
      searchId = result.searchId ?? searchId;

      let added = 0;
      for (const record of this.mapper.mapAll(result.products, options.brand)) {
        if (capReached()) break;
        if (emittedIds.has(record.id)) continue;
        emittedIds.add(record.id);
        excludedIds.push(record.id);
        products.push(record);
        added++;
      }

      this.log.debug(
        { page, received: result.products.length, added, total: products.length },
        "[TokopediaSearchPaginator] 페이지 처리",
      );
      await options.onProgress?.({ page, pageProducts: added, totalProducts: products.length });

      if (added === 0) {
        return finish("end_of_results");
      }

      page++;
      start += this.client.pageSize;

      if (!capReached() && page <= pageLimit && options.delayMs > 0) {
        await this.sleep(options.delayMs);
      }
    }
  }

  async cleanup(): Promise<void> {
    // 보유 리소스 없음
  }
}
