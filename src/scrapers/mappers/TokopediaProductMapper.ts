/**
 * Tokopedia Product Mapper
 *
 * 목적: SearchProductV5 상품 원본 → ProductRecord 변환
 *
 * 규칙:
 * - id(oldID) 또는 title이 없으면 건너뜀 (null)
 * - 제목 / 상점명 / 지역은 인도네시아어 용어 치환
 * - 할인율: API 값 우선, 없으면 원가·판매가로 계산
 */

import type { ProductRecord } from "@/core/domain/search/ProductRecord";
import {
  TokopediaRawProductSchema,
  type TokopediaRawProduct,
} from "@/core/domain/search/TokopediaSearch";
import { SCRAPER_CONFIG } from "@/config/constants";
import { logger } from "@/config/logger";
import { PriceParser } from "@/utils/PriceParser";
import { defaultTranslator, type IndonesianTranslator } from "@/utils/IndonesianTranslator";
import { toAbsoluteUrl } from "@/utils/url";

const UNIT_MULTIPLIERS: Record<string, number> = {
  rb: 1_000,
  jt: 1_000_000,
};

/**
 * 판매 수량 라벨 파싱
 * "10rb+ terjual" → 10000, "1,5jt terjual" → 1500000, "250+ terjual" → 250
 */
export function parseSoldCount(label: string | null | undefined): number | null {
  if (!label) {
    return null;
  }
  const match = label.match(/(\d+(?:[.,]\d+)?)\s*(rb|jt)?\s*\+?\s*terjual/i);
  if (!match) {
    return null;
  }
  const value = Number.parseFloat(match[1].replace(",", "."));
  const multiplier = match[2] ? (UNIT_MULTIPLIERS[match[2].toLowerCase()] ?? 1) : 1;
  return Number.isFinite(value) ? Math.round(value * multiplier) : null;
}

function idToString(value: string | number | null | undefined): string | null {
  if (value === null || value === undefined) {
    return null;
  }
  const text = String(value).trim();
  return text.length > 0 && text !== "0" ? text : null;
}

function nonEmpty(value: string | null | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

export class TokopediaProductMapper {
  constructor(
    private readonly translator: IndonesianTranslator = defaultTranslator,
    private readonly now: () => Date = () => new Date(),
  ) {}

  /**
   * 원본 상품 → ProductRecord (변환 불가 시 null)
   */
  map(raw: unknown, brand: string | null): ProductRecord | null {
    const parsed = TokopediaRawProductSchema.safeParse(raw);
    if (!parsed.success) {
      logger.debug(
        { issues: parsed.error.errors.map((e) => `${e.path.join(".")}: ${e.message}`) },
        "[TokopediaProductMapper] 상품 구조 불일치 - 건너뜀",
      );
      return null;
    }
    return this.mapProduct(parsed.data, brand);
  }

  /**
   * 페이지 단위 변환 (불량 상품 제외)
   */
  mapAll(raws: readonly unknown[], brand: string | null): ProductRecord[] {
    const records: ProductRecord[] = [];
    for (const raw of raws) {
      const record = this.map(raw, brand);
      if (record) {
        records.push(record);
      }
    }
    return records;
  }

  private mapProduct(product: TokopediaRawProduct, brand: string | null): ProductRecord | null {
    const id = idToString(product.oldID) ?? idToString(product.id);
    const title = nonEmpty(product.name);
    if (!id || !title) {
      logger.debug({ id, title }, "[TokopediaProductMapper] id/title 없음 - 건너뜀");
      return null;
    }

    const baseUrl = SCRAPER_CONFIG.BASE_URL;
    const salePrice = nonEmpty(product.price?.text);
    const rawOriginalPrice = nonEmpty(product.price?.original);
    const storeId = idToString(product.shop?.oldID) ?? idToString(product.shop?.id);
    const rating = this.parseRating(product.rating);

    return {
      id,
      title: this.translator.translate(title),
      salePrice,
      originalPrice: rawOriginalPrice ?? salePrice,
      discountPercent: this.resolveDiscount(product, salePrice, rawOriginalPrice),
      currency: "IDR",
      rating,
      orderCount: this.parseOrderCount(product),
      storeName: this.translator.translate(nonEmpty(product.shop?.name)),
      storeId,
      storeUrl:
        toAbsoluteUrl(product.shop?.url, baseUrl) ??
        (storeId ? `${baseUrl}/store/${storeId}` : null),
      productUrl: toAbsoluteUrl(product.url, baseUrl),
      imageUrl: toAbsoluteUrl(
        nonEmpty(product.mediaURL?.image) ?? product.mediaURL?.image300,
        baseUrl,
      ),
      brand,
      location: this.translator.translate(nonEmpty(product.shop?.city)),
      scrapedAt: this.now().toISOString(),
    };
  }

  private resolveDiscount(
    product: TokopediaRawProduct,
    salePrice: string | null,
    originalPrice: string | null,
  ): number | null {
    const apiDiscount = product.price?.discountPercentage;
    if (typeof apiDiscount === "number" && Number.isFinite(apiDiscount)) {
      return PriceParser.clampPercent(apiDiscount);
    }
    const saleAmount =
      typeof product.price?.number === "number" ? product.price.number : PriceParser.parse(salePrice);
    return PriceParser.calculateDiscountRate(saleAmount, PriceParser.parse(originalPrice));
  }

  private parseRating(value: string | number | null | undefined): number | null {
    const rating = typeof value === "number" ? value : Number.parseFloat(value ?? "");
    return Number.isFinite(rating) && rating > 0 ? rating : null;
  }

  private parseOrderCount(product: TokopediaRawProduct): number | null {
    for (const label of product.labelGroups ?? []) {
      const count = parseSoldCount(label.title);
      if (count !== null) {
        return count;
      }
    }
    return null;
  }
}
