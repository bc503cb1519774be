/**
 * SearchConfig - 검색 YAML 설정 스키마
 */

import { z } from "zod";

/**
 * GraphQL 전략 설정 스키마
 * query 미지정 시 queryFile (설정 디렉토리 기준 상대 경로) 로드
 */
export const GraphQLStrategySchema = z.object({
  endpoint: z.string().url(),
  operationName: z.string(),
  query: z.string().optional(),
  queryFile: z.string().optional(),
  headers: z.record(z.string()).default({}),
  /** params 문자열 고정 값 */
  params: z.record(z.union([z.string(), z.number(), z.boolean()])).default({}),
  rows: z.number().int().positive().default(60),
  timeout: z.number().default(30000),
  retryCount: z.number().int().min(1).default(3),
  retryDelay: z.number().default(1000),
});

export type GraphQLStrategy = z.infer<typeof GraphQLStrategySchema>;

/**
 * 브라우저(DOM) 전략 설정
 */
export const BrowserStrategySchema = z.object({
  headless: z.boolean().default(true),
  viewport: z
    .object({
      width: z.number(),
      height: z.number(),
    })
    .default({ width: 1920, height: 1080 }),
  userAgent: z.string().optional(),
  locale: z.string().default("id-ID"),
  searchUrl: z.string(),
  categoryUrl: z.string(),
  navigationTimeout: z.number().default(60000),
  scrollDelay: z.number().default(2000),
  maxScrolls: z.number().int().positive().default(200),
  selectors: z.object({
    container: z.array(z.string()).min(1),
    title: z.array(z.string()).min(1),
    price: z.array(z.string()).min(1),
    originalPrice: z.array(z.string()).default([]),
    discount: z.array(z.string()).default([]),
    shop: z.array(z.string()).default([]),
    location: z.array(z.string()).default([]),
    rating: z.array(z.string()).default([]),
    sold: z.array(z.string()).default([]),
    image: z.array(z.string()).default(["img"]),
    link: z.array(z.string()).default(["a"]),
  }),
});

export type BrowserStrategy = z.infer<typeof BrowserStrategySchema>;

export type BrowserSelectors = BrowserStrategy["selectors"];

/**
 * Search 전략 설정 스키마
 */
export const SearchStrategyConfigSchema = z.object({
  id: z.string(),
  type: z.enum(["graphql", "browser"]),
  priority: z.number().default(1),
  description: z.string().optional(),
  graphql: GraphQLStrategySchema.optional(),
  browser: BrowserStrategySchema.optional(),
});

export type SearchStrategyConfig = z.infer<typeof SearchStrategyConfigSchema>;

/**
 * 에러 처리 설정
 */
export const ErrorHandlingSchema = z.object({
  rateLimitDelay: z.number().default(5000),
  serverErrorRetry: z.boolean().default(true),
});

export type ErrorHandling = z.infer<typeof ErrorHandlingSchema>;

/**
 * Search 플랫폼 설정 스키마 (YAML 전체)
 */
export const SearchConfigSchema = z.object({
  platform: z.string(),
  name: z.string(),
  baseUrl: z.string().url(),
  strategies: z.array(SearchStrategyConfigSchema).min(1),
  errorHandling: ErrorHandlingSchema.default({}),
});

export type SearchConfig = z.infer<typeof SearchConfigSchema>;
