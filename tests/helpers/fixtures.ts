/**
 * 테스트 공용 데이터
 */

import type { ProductRecord } from "@/core/domain/search/ProductRecord";
import type { ScrapeJobParameters } from "@/core/domain/search/ScrapeJob";

export function createProductRecord(overrides: Partial<ProductRecord> = {}): ProductRecord {
  return {
    id: "2100000001",
    title: "Wardah Serum, 30ml",
    salePrice: "Rp75.000",
    originalPrice: "Rp100.000",
    discountPercent: 25,
    currency: "IDR",
    rating: 4.9,
    orderCount: 10000,
    storeName: "Wardah Official",
    storeId: "778899",
    storeUrl: "https://www.tokopedia.com/wardah",
    productUrl: "https://www.tokopedia.com/wardah/serum",
    imageUrl: "https://images.tokopedia.net/serum.jpg",
    brand: "Wardah",
    location: "City Bandung",
    scrapedAt: "2026-01-02T03:04:05.000Z",
    ...overrides,
  };
}

export function createJobParameters(overrides: Partial<ScrapeJobParameters> = {}): ScrapeJobParameters {
  return {
    query: "serum",
    brand: "Wardah",
    max_products: 100,
    max_pages: null,
    output_format: "json",
    delay_ms: 0,
    strategy: "graphql",
    ...overrides,
  };
}

/**
 * 호출마다 1초씩 증가하는 시계
 */
export function createTickingClock(start = Date.UTC(2026, 0, 1)): () => Date {
  let tick = 0;
  return () => new Date(start + tick++ * 1000);
}
