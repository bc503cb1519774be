/**
 * Tokopedia SearchProductV5Query 응답 스키마
 *
 * 상품 단위 검증은 TokopediaProductMapper에서 수행 (불량 상품은 건너뜀)
 */

import { z } from "zod";

const IdSchema = z.union([z.string(), z.number()]);

export const TokopediaLabelGroupSchema = z.object({
  position: z.string().nullish(),
  title: z.string().nullish(),
  type: z.string().nullish(),
});

export const TokopediaRawProductSchema = z.object({
  id: IdSchema.nullish(),
  oldID: IdSchema.nullish(),
  name: z.string().nullish(),
  url: z.string().nullish(),
  mediaURL: z
    .object({
      image: z.string().nullish(),
      image300: z.string().nullish(),
    })
    .nullish(),
  shop: z
    .object({
      id: IdSchema.nullish(),
      oldID: IdSchema.nullish(),
      name: z.string().nullish(),
      url: z.string().nullish(),
      city: z.string().nullish(),
    })
    .nullish(),
  price: z
    .object({
      text: z.string().nullish(),
      number: z.number().nullish(),
      original: z.string().nullish(),
      discountPercentage: z.number().nullish(),
    })
    .nullish(),
  rating: z.union([z.string(), z.number()]).nullish(),
  labelGroups: z.array(TokopediaLabelGroupSchema).nullish(),
});

export type TokopediaRawProduct = z.infer<typeof TokopediaRawProductSchema>;

/**
 * GraphQL 응답 (batch 응답의 원소)
 * products는 unknown으로 받아 상품별로 검증
 */
export const TokopediaSearchResponseSchema = z.object({
  data: z
    .object({
      searchProductV5: z
        .object({
          header: z
            .object({
              totalData: z.number().nullish(),
              responseCode: z.number().nullish(),
              additionalParams: z.string().nullish(),
            })
            .nullish(),
          data: z
            .object({
              products: z.array(z.unknown()).nullish(),
            })
            .nullish(),
        })
        .nullish(),
    })
    .nullish(),
  errors: z.array(z.object({ message: z.string() })).nullish(),
});

export type TokopediaSearchResponse = z.infer<typeof TokopediaSearchResponseSchema>;

/**
 * 검색 클라이언트 페이지 요청
 */
export interface SearchPageRequest {
  query: string;
  page: number;
  start: number;
  /** 이미 수집된 상품 ID (수집 순서 유지) */
  excludedIds: readonly string[];
  /** 세션 search_id (첫 페이지 응답에서 획득) */
  searchId: string | null;
}

/**
 * 검색 클라이언트 페이지 응답
 */
export interface SearchPage {
  products: readonly unknown[];
  searchId: string | null;
  totalData: number;
}
