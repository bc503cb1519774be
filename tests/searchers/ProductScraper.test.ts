import { describe, it, expect, jest } from "@jest/globals";
import pino from "pino";
import { ProductScraper } from "@/searchers/ProductScraper";
import type { SearcherFactories } from "@/searchers/SearcherFactory";
import type { IProductSearcher } from "@/core/interfaces/search/IProductSearcher";
import type {
  ExecutedStrategy,
  ScrapeOptions,
  ScrapeOutcome,
} from "@/core/domain/search/ScrapeResult";
import { createProductRecord } from "../helpers/fixtures";

const mockLogger = pino({ level: "silent" });

const OPTIONS: ScrapeOptions = {
  keyword: "serum",
  brand: "Wardah",
  maxProducts: 10,
  maxPages: null,
  delayMs: 0,
};

class FakeSearcher implements IProductSearcher {
  readonly search: jest.Mock<(options: ScrapeOptions) => Promise<ScrapeOutcome>>;
  readonly cleanup = jest.fn<() => Promise<void>>().mockResolvedValue(undefined);

  constructor(
    readonly strategy: ExecutedStrategy,
    result: ScrapeOutcome | Error,
  ) {
    this.search = jest.fn<(options: ScrapeOptions) => Promise<ScrapeOutcome>>(async () => {
      if (result instanceof Error) {
        throw result;
      }
      return result;
    });
  }
}

function outcome(strategy: ExecutedStrategy, overrides: Partial<ScrapeOutcome> = {}): ScrapeOutcome {
  return {
    products: [createProductRecord()],
    pagesFetched: 1,
    stopReason: "end_of_results",
    searchId: null,
    strategy,
    error: null,
    ...overrides,
  };
}

function createScraper(graphql: FakeSearcher, browser: FakeSearcher): ProductScraper {
  const factories: SearcherFactories = {
    graphql: () => graphql,
    browser: () => browser,
  };
  return new ProductScraper(factories);
}

describe("ProductScraper", () => {
  it("auto: GraphQL이 성공하면 브라우저를 사용하지 않아야 함", async () => {
    const graphql = new FakeSearcher("graphql", outcome("graphql"));
    const browser = new FakeSearcher("browser", outcome("browser"));

    const result = await createScraper(graphql, browser).scrape(OPTIONS, "auto", mockLogger);

    expect(result.strategy).toBe("graphql");
    expect(graphql.search).toHaveBeenCalledWith(OPTIONS);
    expect(browser.search).not.toHaveBeenCalled();
    expect(graphql.cleanup).toHaveBeenCalledTimes(1);
  });

  it("auto: GraphQL이 상품 없이 에러로 끝나면 브라우저로 전환해야 함", async () => {
    const graphql = new FakeSearcher(
      "graphql",
      outcome("graphql", { products: [], pagesFetched: 0, stopReason: "error", error: "HTTP 429" }),
    );
    const browser = new FakeSearcher("browser", outcome("browser"));

    const result = await createScraper(graphql, browser).scrape(OPTIONS, "auto", mockLogger);

    expect(result.strategy).toBe("browser");
    expect(browser.search).toHaveBeenCalledWith(OPTIONS);
    expect(graphql.cleanup).toHaveBeenCalledTimes(1);
    expect(browser.cleanup).toHaveBeenCalledTimes(1);
  });

  it("auto: 수집분이 있는 에러 종료는 전환하지 않아야 함", async () => {
    const graphql = new FakeSearcher("graphql", outcome("graphql", { stopReason: "error", error: "HTTP 503" }));
    const browser = new FakeSearcher("browser", outcome("browser"));

    const result = await createScraper(graphql, browser).scrape(OPTIONS, "auto", mockLogger);

    expect(result.stopReason).toBe("error");
    expect(browser.search).not.toHaveBeenCalled();
  });

  it("graphql: 실패해도 브라우저로 전환하지 않아야 함", async () => {
    const graphql = new FakeSearcher(
      "graphql",
      outcome("graphql", { products: [], stopReason: "error", error: "HTTP 429" }),
    );
    const browser = new FakeSearcher("browser", outcome("browser"));

    const result = await createScraper(graphql, browser).scrape(OPTIONS, "graphql", mockLogger);

    expect(result.strategy).toBe("graphql");
    expect(browser.search).not.toHaveBeenCalled();
  });

  it("browser: 브라우저 전략만 실행해야 함", async () => {
    const graphql = new FakeSearcher("graphql", outcome("graphql"));
    const browser = new FakeSearcher("browser", outcome("browser"));

    await createScraper(graphql, browser).scrape(OPTIONS, "browser", mockLogger);

    expect(graphql.search).not.toHaveBeenCalled();
    expect(browser.search).toHaveBeenCalledTimes(1);
  });

  it("검색 예외가 나도 cleanup을 호출해야 함", async () => {
    const graphql = new FakeSearcher("graphql", new Error("launch failed"));
    const browser = new FakeSearcher("browser", outcome("browser"));

    await expect(createScraper(graphql, browser).scrape(OPTIONS, "graphql", mockLogger)).rejects.toThrow(
      "launch failed",
    );
    expect(graphql.cleanup).toHaveBeenCalledTimes(1);
  });
});
