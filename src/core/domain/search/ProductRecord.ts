/**
 * ProductRecord - 정규화된 상품 레코드
 *
 * GraphQL / 브라우저 검색 결과 공통 스키마
 * id, title 외 모든 필드는 nullable (부재 시 null 직렬화)
 */

import { z } from "zod";

export const ProductRecordSchema = z.object({
  id: z.string().min(1),
  title: z.string().min(1),
  salePrice: z.string().nullable(),
  originalPrice: z.string().nullable(),
  discountPercent: z.number().min(0).max(100).nullable(),
  currency: z.string().nullable(),
  rating: z.number().nullable(),
  orderCount: z.number().int().nullable(),
  storeName: z.string().nullable(),
  storeId: z.string().nullable(),
  storeUrl: z.string().nullable(),
  productUrl: z.string().nullable(),
  imageUrl: z.string().nullable(),
  brand: z.string().nullable(),
  location: z.string().nullable(),
  scrapedAt: z.string(),
});

export type ProductRecord = z.infer<typeof ProductRecordSchema>;

export const ProductRecordListSchema = z.array(ProductRecordSchema);
