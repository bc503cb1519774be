/**
 * SearcherFactory - 전략별 검색기 생성
 * 설정은 config/search/tokopedia.yaml (SearchConfigLoader)
 */

import type { IProductSearcher } from "@/core/interfaces/search/IProductSearcher";
import type { ExecutedStrategy } from "@/core/domain/search/ScrapeResult";
import { SearchConfigLoader } from "@/config/SearchConfigLoader";
import { SCRAPER_CONFIG } from "@/config/constants";
import type { Logger } from "@/config/logger";
import { TokopediaGraphQLClient } from "./tokopedia/TokopediaGraphQLClient";
import { TokopediaSearchPaginator } from "./tokopedia/TokopediaSearchPaginator";
import { TokopediaBrowserSearcher } from "./tokopedia/TokopediaBrowserSearcher";

export type SearcherFactories = Record<ExecutedStrategy, (log: Logger) => IProductSearcher>;

export function createDefaultSearcherFactories(
  loader: SearchConfigLoader = SearchConfigLoader.getInstance(),
): SearcherFactories {
  const platform = SCRAPER_CONFIG.PLATFORM;

  return {
    graphql: (log) => {
      const client = new TokopediaGraphQLClient({
        strategy: loader.getGraphQLStrategy(platform),
        errorHandling: loader.loadConfig(platform).errorHandling,
      });
      return new TokopediaSearchPaginator(client, { logger: log });
    },
    browser: (log) =>
      new TokopediaBrowserSearcher(loader.getBrowserStrategy(platform), { logger: log }),
  };
}
