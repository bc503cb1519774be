import { describe, it, expect } from "@jest/globals";
import {
  TokopediaCardMapper,
  extractProductIdFromUrl,
  extractStoreIdFromUrl,
  type RawProductCard,
} from "@/scrapers/mappers/TokopediaCardMapper";

const FIXED_NOW = new Date("2026-01-02T03:04:05.000Z");

function createCard(overrides: Partial<RawProductCard> = {}): RawProductCard {
  return {
    title: "Azarine Sunscreen Gel SPF45",
    link: "https://www.tokopedia.com/azarine/sunscreen-gel-spf45-1234567890123?extParam=src",
    price: "Rp 65.000",
    originalPrice: "Rp 80.000",
    discount: null,
    shopTexts: ["Kota Surabaya", "Azarine Official"],
    rating: "4.8",
    sold: "5rb+ terjual",
    image: "https://images.tokopedia.net/img/azarine.jpg",
    ...overrides,
  };
}

describe("extractProductIdFromUrl()", () => {
  it("13자리 이상 숫자 ID를 우선 추출해야 함", () => {
    expect(
      extractProductIdFromUrl("https://www.tokopedia.com/azarine/sunscreen-1234567890123?x=1"),
    ).toBe("1234567890123");
  });

  it("숫자 ID가 없으면 마지막 경로 세그먼트를 사용해야 함", () => {
    expect(extractProductIdFromUrl("https://www.tokopedia.com/azarine/sunscreen-gel")).toBe(
      "sunscreen-gel",
    );
  });
});

describe("extractStoreIdFromUrl()", () => {
  it("첫 번째 경로 세그먼트를 상점 슬러그로 추출해야 함", () => {
    expect(extractStoreIdFromUrl("https://www.tokopedia.com/azarine/sunscreen-gel")).toBe("azarine");
  });

  it("상점이 아닌 경로는 null이어야 함", () => {
    expect(extractStoreIdFromUrl("https://www.tokopedia.com/p/kecantikan")).toBeNull();
  });
});

describe("TokopediaCardMapper", () => {
  const mapper = new TokopediaCardMapper(undefined, () => FIXED_NOW);

  it("상품 카드를 ProductRecord로 변환해야 함", () => {
    expect(mapper.map(createCard(), "Azarine")).toEqual({
      id: "1234567890123",
      title: "Azarine Sunscreen Gel SPF45",
      salePrice: "Rp65.000",
      originalPrice: "Rp80.000",
      discountPercent: 19,
      currency: "IDR",
      rating: 4.8,
      orderCount: 5000,
      storeName: "Azarine Official",
      storeId: "azarine",
      storeUrl: "https://www.tokopedia.com/azarine",
      productUrl: "https://www.tokopedia.com/azarine/sunscreen-gel-spf45-1234567890123?extParam=src",
      imageUrl: "https://images.tokopedia.net/img/azarine.jpg",
      brand: "Azarine",
      location: "City Surabaya",
      scrapedAt: "2026-01-02T03:04:05.000Z",
    });
  });

  it("할인 배지가 있으면 배지 값을 사용해야 함", () => {
    expect(mapper.map(createCard({ discount: "20%" }), null)?.discountPercent).toBe(20);
  });

  it("Rp 표기가 없는 가격은 null이어야 함", () => {
    const record = mapper.map(createCard({ price: "Habis", originalPrice: null }), null);

    expect(record?.salePrice).toBeNull();
    expect(record?.originalPrice).toBeNull();
    expect(record?.discountPercent).toBeNull();
  });

  it("상점 텍스트가 하나면 지역 힌트로 구분해야 함", () => {
    expect(mapper.map(createCard({ shopTexts: ["Jakarta Selatan"] }), null)).toMatchObject({
      location: "Jakarta Selatan",
      storeName: null,
    });
    expect(mapper.map(createCard({ shopTexts: ["Toko Cantik"] }), null)).toMatchObject({
      location: null,
      storeName: "Toko Cantik",
    });
  });

  it("짧은 제목이나 링크 없는 카드는 건너뛰어야 함", () => {
    expect(mapper.map(createCard({ title: "Promo" }), null)).toBeNull();
    expect(mapper.map(createCard({ link: null }), null)).toBeNull();
  });
});
