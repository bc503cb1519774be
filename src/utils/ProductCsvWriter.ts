/**
 * ProductRecord → 통합 CSV 템플릿 변환
 */

import { stringify } from "csv-stringify/sync";
import type { ProductRecord } from "@/core/domain/search/ProductRecord";
import { SCRAPER_CONFIG } from "@/config/constants";
import { PriceParser } from "@/utils/PriceParser";

export const CSV_HEADERS = [
  "Listing Title*",
  "Listings URL*",
  "Image URL*",
  "Marketplace*",
  "Price*",
  "Shipping",
  "Units Available",
  "Item Number",
  "Brand",
  "ASIN",
  "UPC",
  "Walmart ID",
  "Seller's Name*",
  "Seller's URL*",
  "Seller's Business Name",
  "Seller's Address",
  "Seller's Email",
  "Seller's Phone Number",
] as const;

export type CsvHeader = (typeof CSV_HEADERS)[number];

/**
 * 상품 1건 → CSV 행 (수집하지 않는 컬럼은 빈 문자열)
 */
export function toCsvRow(product: ProductRecord): Record<CsvHeader, string> {
  return {
    "Listing Title*": product.title,
    "Listings URL*": product.productUrl ?? "",
    "Image URL*": product.imageUrl ?? "",
    "Marketplace*": SCRAPER_CONFIG.MARKETPLACE_NAME,
    "Price*": PriceParser.toNumericString(product.salePrice),
    Shipping: "",
    "Units Available": "",
    "Item Number": product.id,
    Brand: product.brand ?? "",
    ASIN: "",
    UPC: "",
    "Walmart ID": "",
    "Seller's Name*": product.storeName ?? "",
    "Seller's URL*": product.storeUrl ?? "",
    "Seller's Business Name": "",
    "Seller's Address": product.location ?? "",
    "Seller's Email": "",
    "Seller's Phone Number": "",
  };
}

/**
 * 헤더 포함 CSV 문자열
 */
export function renderProductsCsv(products: readonly ProductRecord[]): string {
  return stringify(products.map(toCsvRow), {
    header: true,
    columns: [...CSV_HEADERS],
  });
}
