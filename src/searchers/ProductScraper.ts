/**
 * ProductScraper - 검색 전략 선택 및 실행
 *
 * - graphql: GraphQL 페이지 순회만
 * - browser: 브라우저 DOM 파싱만
 * - auto: GraphQL 우선, 상품 0개로 에러 종료 시 브라우저 재시도
 */

import type {
  ExecutedStrategy,
  ScrapeOptions,
  ScrapeOutcome,
  SearchStrategyType,
} from "@/core/domain/search/ScrapeResult";
import { logger, type Logger } from "@/config/logger";
import { createDefaultSearcherFactories, type SearcherFactories } from "./SearcherFactory";

export class ProductScraper {
  constructor(private readonly factories: SearcherFactories = createDefaultSearcherFactories()) {}

  async scrape(
    options: ScrapeOptions,
    strategy: SearchStrategyType = "auto",
    log: Logger = logger,
  ): Promise<ScrapeOutcome> {
    if (strategy === "browser") {
      return this.run("browser", options, log);
    }

    const outcome = await this.run("graphql", options, log);
    if (strategy === "auto" && outcome.stopReason === "error" && outcome.products.length === 0) {
      log.warn(
        { error: outcome.error },
        "[ProductScraper] GraphQL 수집 실패 - 브라우저 전략으로 전환",
      );
      return this.run("browser", options, log);
    }
    return outcome;
  }

  private async run(
    strategy: ExecutedStrategy,
    options: ScrapeOptions,
    log: Logger,
  ): Promise<ScrapeOutcome> {
    const searcher = this.factories[strategy](log);
    try {
      return await searcher.search(options);
    } finally {
      await searcher.cleanup();
    }
  }
}
