/**
 * TokopediaProductMapper Test
 *
 * 목적: SearchProductV5 상품 원본 → ProductRecord 변환 검증
 */

import { describe, it, expect, beforeEach } from "@jest/globals";
import {
  TokopediaProductMapper,
  parseSoldCount,
} from "@/scrapers/mappers/TokopediaProductMapper";
import type { TokopediaRawProduct } from "@/core/domain/search/TokopediaSearch";

const FIXED_NOW = new Date("2026-01-02T03:04:05.000Z");

function createRawProduct(overrides: Partial<TokopediaRawProduct> = {}): TokopediaRawProduct {
  return {
    id: "15000000001",
    oldID: 2100000001,
    name: "  Wardah Serum Baru Gratis Ongkir ",
    url: "https://www.tokopedia.com/wardah/serum-brightening",
    mediaURL: {
      image: "//images.tokopedia.net/img/serum.jpg",
      image300: "https://images.tokopedia.net/img/300/serum.jpg",
    },
    shop: {
      id: "9001",
      oldID: 778899,
      name: "Wardah Official",
      url: "/wardah",
      city: "Kota Bandung",
    },
    price: {
      text: "Rp75.000",
      number: 75000,
      original: "Rp100.000",
      discountPercentage: 25,
    },
    rating: "4.9",
    labelGroups: [{ position: "ri_product_credibility", title: "10rb+ terjual", type: "textDarkGrey" }],
    ...overrides,
  };
}

describe("parseSoldCount()", () => {
  it("rb / jt 단위를 변환해야 함", () => {
    expect(parseSoldCount("10rb+ terjual")).toBe(10000);
    expect(parseSoldCount("1,5jt terjual")).toBe(1500000);
    expect(parseSoldCount("1.2rb terjual")).toBe(1200);
  });

  it("단위 없는 수량을 파싱해야 함", () => {
    expect(parseSoldCount("250+ terjual")).toBe(250);
  });

  it("terjual 라벨이 아니면 null이어야 함", () => {
    expect(parseSoldCount("Gratis Ongkir")).toBeNull();
    expect(parseSoldCount(null)).toBeNull();
  });
});

describe("TokopediaProductMapper", () => {
  let mapper: TokopediaProductMapper;

  beforeEach(() => {
    mapper = new TokopediaProductMapper(undefined, () => FIXED_NOW);
  });

  describe("map()", () => {
    it("모든 필드를 정규화해야 함", () => {
      expect(mapper.map(createRawProduct(), "Wardah")).toEqual({
        id: "2100000001",
        title: "Wardah Serum New Free Shipping",
        salePrice: "Rp75.000",
        originalPrice: "Rp100.000",
        discountPercent: 25,
        currency: "IDR",
        rating: 4.9,
        orderCount: 10000,
        storeName: "Wardah Official",
        storeId: "778899",
        storeUrl: "https://www.tokopedia.com/wardah",
        productUrl: "https://www.tokopedia.com/wardah/serum-brightening",
        imageUrl: "https://images.tokopedia.net/img/serum.jpg",
        brand: "Wardah",
        location: "City Bandung",
        scrapedAt: "2026-01-02T03:04:05.000Z",
      });
    });

    it("API 할인율이 없으면 원가와 판매가로 계산해야 함", () => {
      const record = mapper.map(
        createRawProduct({ price: { text: "Rp75.000", number: 75000, original: "Rp100.000" } }),
        null,
      );

      expect(record?.discountPercent).toBe(25);
    });

    it("API 할인율은 0~100으로 제한해야 함", () => {
      const record = mapper.map(
        createRawProduct({ price: { text: "Rp1.000", discountPercentage: 130 } }),
        null,
      );

      expect(record?.discountPercent).toBe(100);
    });

    it("원가가 없으면 판매가로 대체하고 할인율은 null이어야 함", () => {
      const record = mapper.map(createRawProduct({ price: { text: "Rp50.000", number: 50000 } }), null);

      expect(record?.originalPrice).toBe("Rp50.000");
      expect(record?.discountPercent).toBeNull();
    });

    it("oldID가 0이면 id를 사용해야 함", () => {
      const record = mapper.map(createRawProduct({ oldID: 0 }), null);

      expect(record?.id).toBe("15000000001");
    });

    it("상점 URL이 없으면 storeId로 생성해야 함", () => {
      const record = mapper.map(createRawProduct({ shop: { oldID: 5, name: "Toko Lima" } }), null);

      expect(record?.storeUrl).toBe("https://www.tokopedia.com/store/5");
      expect(record?.location).toBeNull();
    });

    it("image가 비어 있으면 image300을 사용해야 함", () => {
      const record = mapper.map(
        createRawProduct({ mediaURL: { image: " ", image300: "https://images.tokopedia.net/300.jpg" } }),
        null,
      );

      expect(record?.imageUrl).toBe("https://images.tokopedia.net/300.jpg");
    });

    it("평점 0은 null이어야 함", () => {
      expect(mapper.map(createRawProduct({ rating: 0 }), null)?.rating).toBeNull();
    });

    it("제목이 없으면 null을 반환해야 함", () => {
      expect(mapper.map(createRawProduct({ name: "   " }), null)).toBeNull();
    });

    it("구조가 맞지 않으면 null을 반환해야 함", () => {
      expect(mapper.map({ id: "1", name: "Produk", price: "Rp1.000" }, null)).toBeNull();
      expect(mapper.map("not-a-product", null)).toBeNull();
    });
  });

  describe("mapAll()", () => {
    it("변환 불가 상품은 제외해야 함", () => {
      const records = mapper.mapAll(
        [createRawProduct(), { name: "tanpa id" }, createRawProduct({ oldID: 2100000002 })],
        null,
      );

      expect(records.map((record) => record.id)).toEqual(["2100000001", "2100000002"]);
    });
  });
});
