import { describe, it, expect } from "@jest/globals";
import { CSV_HEADERS, renderProductsCsv, toCsvRow } from "@/utils/ProductCsvWriter";
import { createProductRecord } from "../helpers/fixtures";

describe("ProductCsvWriter", () => {
  it("상품을 18개 컬럼 행으로 변환해야 함", () => {
    const row = toCsvRow(createProductRecord());

    expect(Object.keys(row)).toEqual([...CSV_HEADERS]);
    expect(row).toMatchObject({
      "Listing Title*": "Wardah Serum, 30ml",
      "Marketplace*": "Tokopedia",
      "Price*": "75000",
      "Item Number": "2100000001",
      "Seller's Name*": "Wardah Official",
      "Seller's Address": "City Bandung",
      ASIN: "",
    });
  });

  it("null 필드는 빈 문자열이어야 함", () => {
    const row = toCsvRow(
      createProductRecord({ salePrice: null, brand: null, storeUrl: null, imageUrl: null }),
    );

    expect(row["Price*"]).toBe("");
    expect(row.Brand).toBe("");
    expect(row["Seller's URL*"]).toBe("");
    expect(row["Image URL*"]).toBe("");
  });

  it("헤더와 행을 CSV로 렌더링해야 함", () => {
    const csv = renderProductsCsv([createProductRecord()]);

    expect(csv.split("\n")).toEqual([
      CSV_HEADERS.join(","),
      '"Wardah Serum, 30ml",https://www.tokopedia.com/wardah/serum,https://images.tokopedia.net/serum.jpg,' +
        "Tokopedia,75000,,,2100000001,Wardah,,,,Wardah Official,https://www.tokopedia.com/wardah,,City Bandung,,",
      "",
    ]);
  });

  it("상품이 없으면 헤더만 출력해야 함", () => {
    expect(renderProductsCsv([])).toBe(`${CSV_HEADERS.join(",")}\n`);
  });
});
