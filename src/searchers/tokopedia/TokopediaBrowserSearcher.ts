/**
 * TokopediaBrowserSearcher - 검색 페이지 DOM 파싱 (GraphQL 대체 경로)
 *
 * 역할:
 * - 검색 URL 또는 카테고리 URL 이동 (카테고리 404/410 → 검색 URL 재시도)
 * - 무한 스크롤 (maxPages × 5회, 미지정 시 maxScrolls)
 * - 상품 카드 텍스트 추출 → TokopediaCardMapper
 *
 * playwright-core 사용: 브라우저 바이너리는 CHROMIUM_PATH로 지정
 */

import { chromium, type Browser, type Locator, type Page } from "playwright-core";
import type { IProductSearcher } from "@/core/interfaces/search/IProductSearcher";
import type { BrowserSelectors, BrowserStrategy } from "@/core/domain/search/SearchConfig";
import type { ProductRecord } from "@/core/domain/search/ProductRecord";
import {
  buildSearchQuery,
  type ScrapeOptions,
  type ScrapeOutcome,
  type StopReason,
} from "@/core/domain/search/ScrapeResult";
import { TokopediaCardMapper, type RawProductCard } from "@/scrapers/mappers/TokopediaCardMapper";
import categoryPaths from "@/data/category-paths.json";
import { BROWSER_ARGS } from "@/config/BrowserArgs";
import { SCRAPER_CONFIG } from "@/config/constants";
import { logger, type Logger } from "@/config/logger";

/** maxPages 1당 스크롤 횟수 */
const SCROLLS_PER_PAGE = 5;

/** 연속으로 신규 상품이 없으면 종료하는 스크롤 횟수 */
const MAX_IDLE_SCROLLS = 3;

const ELEMENT_TIMEOUT_MS = 1000;

/** 카테고리 페이지 대신 검색 페이지로 재시도하는 응답 코드 */
const CATEGORY_FALLBACK_STATUSES: ReadonlySet<number> = new Set([404, 410]);

export interface CategoryPath {
  keyword: string;
  path: string;
}

/**
 * 템플릿 변수 치환 (${query} → 실제 값)
 */
function replaceVariables(template: string, variables: Record<string, string>): string {
  let result = template;
  for (const [key, value] of Object.entries(variables)) {
    result = result.split(`\${${key}}`).join(value);
  }
  return result;
}

/**
 * 키워드에 대응하는 카테고리 경로 (첫 번째 일치 항목)
 */
export function findCategoryPath(
  keyword: string,
  categories: readonly CategoryPath[] = categoryPaths,
): string | null {
  const lower = keyword.toLowerCase();
  return categories.find((entry) => lower.includes(entry.keyword))?.path ?? null;
}

export interface BrowserEntry {
  url: string;
  /** 카테고리 페이지가 없을 때 이동할 검색 URL */
  fallbackUrl: string | null;
}

/**
 * 브라우저 진입 URL 생성
 * 카테고리 매칭 시 카테고리 페이지 (검색 페이지는 대체 경로), 그 외 검색 페이지
 */
export function buildBrowserEntry(
  config: Pick<BrowserStrategy, "searchUrl" | "categoryUrl">,
  keyword: string,
  brand: string | null,
  categories: readonly CategoryPath[] = categoryPaths,
): BrowserEntry {
  const searchUrl = replaceVariables(config.searchUrl, {
    query: encodeURIComponent(buildSearchQuery(keyword, brand)),
  });
  const category = findCategoryPath(keyword, categories);
  if (category) {
    return { url: replaceVariables(config.categoryUrl, { category }), fallbackUrl: searchUrl };
  }
  return { url: searchUrl, fallbackUrl: null };
}

/**
 * page.goto 최소 인터페이스
 */
export interface NavigablePage {
  goto(
    url: string,
    options: { waitUntil: "domcontentloaded"; timeout: number },
  ): Promise<{ status(): number } | null>;
}

/**
 * 진입 URL 이동
 * @returns 실제로 연 URL
 */
export async function openBrowserEntry(
  page: NavigablePage,
  entry: BrowserEntry,
  timeout: number,
  log: Logger,
): Promise<string> {
  const response = await page.goto(entry.url, { waitUntil: "domcontentloaded", timeout });
  const status = response?.status();
  if (!entry.fallbackUrl || status === undefined || !CATEGORY_FALLBACK_STATUSES.has(status)) {
    return entry.url;
  }

  log.warn(
    { url: entry.url, status, fallbackUrl: entry.fallbackUrl },
    "[TokopediaBrowserSearcher] 카테고리 페이지 없음 - 검색 페이지로 이동",
  );
  await page.goto(entry.fallbackUrl, { waitUntil: "domcontentloaded", timeout });
  return entry.fallbackUrl;
}

export interface TokopediaBrowserSearcherOptions {
  mapper?: TokopediaCardMapper;
  executablePath?: string;
  logger?: Logger;
}

export class TokopediaBrowserSearcher implements IProductSearcher {
  readonly strategy = "browser" as const;

  private browser: Browser | null = null;
  private readonly mapper: TokopediaCardMapper;
  private readonly executablePath: string;
  private readonly log: Logger;

  constructor(
    private readonly config: BrowserStrategy,
    options: TokopediaBrowserSearcherOptions = {},
  ) {
    this.mapper = options.mapper ?? new TokopediaCardMapper();
    this.executablePath = options.executablePath ?? SCRAPER_CONFIG.CHROMIUM_PATH;
    this.log = options.logger ?? logger;
  }

  async search(options: ScrapeOptions): Promise<ScrapeOutcome> {
    const entry = buildBrowserEntry(this.config, options.keyword, options.brand);
    let url = entry.url;
    const maxScrolls = options.maxPages
      ? options.maxPages * SCROLLS_PER_PAGE
      : this.config.maxScrolls;
    const products: ProductRecord[] = [];
    const seenIds = new Set<string>();
    let rounds = 0;

    const finish = (stopReason: StopReason, error: string | null = null): ScrapeOutcome => {
      this.log.info(
        { url, stopReason, rounds, totalProducts: products.length, error },
        "[TokopediaBrowserSearcher] 수집 종료",
      );
      return {
        products,
        pagesFetched: rounds,
        stopReason,
        strategy: this.strategy,
        searchId: null,
        error,
      };
    };

    const browser = await this.launch();
    const context = await browser.newContext({
      viewport: this.config.viewport,
      userAgent: this.config.userAgent ?? SCRAPER_CONFIG.DEFAULT_USER_AGENT,
      locale: this.config.locale,
    });

    try {
      const page = await context.newPage();
      this.log.info({ url, maxScrolls }, "[TokopediaBrowserSearcher] 페이지 이동");
      url = await openBrowserEntry(page, entry, this.config.navigationTimeout, this.log);
      await page.waitForTimeout(this.config.scrollDelay);

      let idleRounds = 0;
      while (rounds < maxScrolls) {
        rounds++;
        let added = 0;
        for (const card of await this.extractCards(page)) {
          if (options.maxProducts !== null && products.length >= options.maxProducts) break;
          const record = this.mapper.map(card, options.brand);
          if (!record || seenIds.has(record.id)) continue;
          seenIds.add(record.id);
          products.push(record);
          added++;
        }

        await options.onProgress?.({ page: rounds, pageProducts: added, totalProducts: products.length });

        if (options.maxProducts !== null && products.length >= options.maxProducts) {
          return finish("max_products");
        }
        idleRounds = added === 0 ? idleRounds + 1 : 0;
        if (idleRounds >= MAX_IDLE_SCROLLS) {
          return finish("end_of_results");
        }

        await page.evaluate("window.scrollTo(0, document.body.scrollHeight)");
        await page.waitForTimeout(this.config.scrollDelay);
      }
      return finish("max_pages");
    } catch (error) {
      return finish("error", error instanceof Error ? error.message : String(error));
    } finally {
      await context.close();
    }
  }

  async cleanup(): Promise<void> {
    if (this.browser) {
      await this.browser.close();
      this.browser = null;
    }
  }

  private async launch(): Promise<Browser> {
    if (!this.browser) {
      this.browser = await chromium.launch({
        headless: this.config.headless,
        executablePath: this.executablePath || undefined,
        args: BROWSER_ARGS.DEFAULT,
      });
    }
    return this.browser;
  }

  private async extractCards(page: Page): Promise<RawProductCard[]> {
    const selectors = this.config.selectors;
    let containers: Locator[] = [];
    for (const selector of selectors.container) {
      containers = await page.locator(selector).all();
      if (containers.length > 0) break;
    }

    const cards: RawProductCard[] = [];
    for (const container of containers) {
      try {
        cards.push(await this.extractCard(container, selectors));
      } catch (error) {
        this.log.debug(
          { error: error instanceof Error ? error.message : String(error) },
          "[TokopediaBrowserSearcher] 상품 카드 추출 실패 - 건너뜀",
        );
      }
    }
    return cards;
  }

  private async extractCard(container: Locator, selectors: BrowserSelectors): Promise<RawProductCard> {
    const ownHref = await container.getAttribute("href", { timeout: ELEMENT_TIMEOUT_MS });
    return {
      title:
        (await this.firstText(container, selectors.title)) ??
        (await this.firstAttribute(container, ["a[title]"], "title")),
      link: ownHref ?? (await this.firstAttribute(container, selectors.link, "href")),
      price: await this.firstText(container, selectors.price),
      originalPrice: await this.firstText(container, selectors.originalPrice),
      discount: await this.firstText(container, selectors.discount),
      shopTexts: await this.allTexts(container, selectors.shop),
      rating: await this.firstText(container, selectors.rating),
      sold: await this.firstText(container, selectors.sold),
      image: await this.firstAttribute(container, selectors.image, "src"),
    };
  }

  private async firstText(container: Locator, selectors: readonly string[]): Promise<string | null> {
    for (const selector of selectors) {
      const element = container.locator(selector).first();
      if ((await element.count()) === 0) continue;
      const text = (await element.innerText({ timeout: ELEMENT_TIMEOUT_MS })).trim();
      if (text) return text;
    }
    return null;
  }

  private async firstAttribute(
    container: Locator,
    selectors: readonly string[],
    attribute: string,
  ): Promise<string | null> {
    for (const selector of selectors) {
      const element = container.locator(selector).first();
      if ((await element.count()) === 0) continue;
      const value = await element.getAttribute(attribute, { timeout: ELEMENT_TIMEOUT_MS });
      if (value) return value;
    }
    return null;
  }

  private async allTexts(container: Locator, selectors: readonly string[]): Promise<string[]> {
    const texts: string[] = [];
    for (const selector of selectors) {
      for (const element of await container.locator(selector).all()) {
        const text = (await element.innerText({ timeout: ELEMENT_TIMEOUT_MS })).trim();
        if (text) texts.push(text);
      }
      if (texts.length > 0) break;
    }
    return texts;
  }
}
