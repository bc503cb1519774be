/**
 * Tokopedia 검색 페이지 상품 카드 → ProductRecord 변환 (브라우저 전략)
 *
 * DOM에서 추출한 텍스트만 다루므로 Playwright 의존 없음
 */

import type { ProductRecord } from "@/core/domain/search/ProductRecord";
import { SCRAPER_CONFIG } from "@/config/constants";
import { PriceParser } from "@/utils/PriceParser";
import { defaultTranslator, type IndonesianTranslator } from "@/utils/IndonesianTranslator";
import { toAbsoluteUrl } from "@/utils/url";
import { parseSoldCount } from "./TokopediaProductMapper";

/**
 * 상품 카드에서 추출한 원본 텍스트
 */
export interface RawProductCard {
  title: string | null;
  link: string | null;
  price: string | null;
  originalPrice: string | null;
  discount: string | null;
  /** 상점 영역 텍스트 (지역, 상점명 순) */
  shopTexts: string[];
  rating: string | null;
  sold: string | null;
  image: string | null;
}

/** 상점 슬러그로 쓰이지 않는 경로 */
const NON_STORE_PATHS = new Set(["p", "discovery", "help", "about", "careers", "search", "promo"]);

const LOCATION_HINTS = ["Jakarta", "Surabaya", "Bandung", "Medan", "Kab.", "Kota"];

/** 제목 최소 길이 (배지 / 라벨 텍스트 제외) */
const MIN_TITLE_LENGTH = 6;

/**
 * 상품 URL에서 상품 ID 추출
 * 13자리 이상 숫자 ID 우선, 없으면 마지막 경로 세그먼트(slug)
 */
export function extractProductIdFromUrl(url: string): string | null {
  const numeric = url.match(/-(\d{13,})(?:[/?#]|$)/);
  if (numeric) {
    return numeric[1];
  }
  try {
    const segments = new URL(url).pathname.split("/").filter((segment) => segment.length > 0);
    return segments.length > 0 ? segments[segments.length - 1] : null;
  } catch {
    return null;
  }
}

/**
 * 상품 URL에서 상점 슬러그 추출 ("tokopedia.com/{store}/{product}")
 */
export function extractStoreIdFromUrl(url: string): string | null {
  const match = url.match(/tokopedia\.com\/([^/?#]+)/);
  if (!match || NON_STORE_PATHS.has(match[1])) {
    return null;
  }
  return match[1];
}

export class TokopediaCardMapper {
  constructor(
    private readonly translator: IndonesianTranslator = defaultTranslator,
    private readonly now: () => Date = () => new Date(),
  ) {}

  map(card: RawProductCard, brand: string | null): ProductRecord | null {
    const title = card.title?.trim() ?? "";
    const productUrl = toAbsoluteUrl(card.link, SCRAPER_CONFIG.BASE_URL);
    if (title.length < MIN_TITLE_LENGTH || !productUrl) {
      return null;
    }

    const id = extractProductIdFromUrl(productUrl);
    if (!id) {
      return null;
    }

    const salePrice = this.cleanPrice(card.price);
    const rawOriginalPrice = this.cleanPrice(card.originalPrice);
    const discountFromBadge = PriceParser.parse(card.discount);
    const storeId = extractStoreIdFromUrl(productUrl);
    const { storeName, location } = this.splitShopTexts(card.shopTexts);
    const rating = Number.parseFloat(card.rating ?? "");

    return {
      id,
      title: this.translator.translate(title),
      salePrice,
      originalPrice: rawOriginalPrice ?? salePrice,
      discountPercent:
        discountFromBadge !== null
          ? PriceParser.clampPercent(discountFromBadge)
          : PriceParser.calculateDiscountRate(
              PriceParser.parse(salePrice),
              PriceParser.parse(rawOriginalPrice),
            ),
      currency: "IDR",
      rating: Number.isFinite(rating) && rating > 0 ? rating : null,
      orderCount: parseSoldCount(card.sold),
      storeName: this.translator.translate(storeName),
      storeId,
      storeUrl: storeId ? `${SCRAPER_CONFIG.BASE_URL}/${storeId}` : null,
      productUrl,
      imageUrl: toAbsoluteUrl(card.image, SCRAPER_CONFIG.BASE_URL),
      brand,
      location: this.translator.translate(location),
      scrapedAt: this.now().toISOString(),
    };
  }

  /**
   * "Rp 1.246.072" → "Rp1.246.072" (Rp 표기가 없으면 null)
   */
  private cleanPrice(text: string | null): string | null {
    if (!text || !text.includes("Rp")) {
      return null;
    }
    const token = PriceParser.extractFirstToken(text);
    return token ? `Rp${token}` : null;
  }

  /**
   * 상점 영역 텍스트 분리
   * 2개 이상: [지역, 상점명], 1개: 지역 힌트 포함 여부로 판별
   */
  private splitShopTexts(texts: string[]): { storeName: string | null; location: string | null } {
    const cleaned = texts.map((text) => text.trim()).filter((text) => text.length > 2);
    if (cleaned.length >= 2) {
      return { location: cleaned[0], storeName: cleaned[1] };
    }
    if (cleaned.length === 1) {
      const [text] = cleaned;
      return LOCATION_HINTS.some((hint) => text.includes(hint))
        ? { location: text, storeName: null }
        : { location: null, storeName: text };
    }
    return { storeName: null, location: null };
  }
}
