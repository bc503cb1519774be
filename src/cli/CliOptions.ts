/**
 * CLI 옵션 정의 / 검증
 */

import { Command } from "commander";
import { z } from "zod";
import { OUTPUT_CONFIG, SCRAPER_CONFIG } from "@/config/constants";
import { SearchStrategyTypeSchema } from "@/core/domain/search/ScrapeResult";
import type { ScrapeJobParameters } from "@/core/domain/search/ScrapeJob";
import { formatZodError } from "@/utils/formatZodError";

const positiveInt = z.coerce.number().int().positive();

const CliOptionsSchema = z
  .object({
    keyword: z.string().trim().min(1, "keyword is required"),
    brand: z.string().trim().min(1, "brand is required"),
    maxProducts: positiveInt.optional(),
    maxPages: positiveInt.optional(),
    pages: positiveInt.optional(),
    delay: z.coerce.number().min(0).default(SCRAPER_CONFIG.DELAY_MS / 1000),
    strategy: SearchStrategyTypeSchema.default("auto"),
    outputDir: z.string().trim().min(1).default(OUTPUT_CONFIG.RESULT_DIR),
  })
  .transform(({ pages, maxPages, ...rest }) => ({
    ...rest,
    maxPages: maxPages ?? pages,
  }));

export type CliOptions = z.infer<typeof CliOptionsSchema>;

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

export function createCliProgram(): Command {
  return new Command()
    .name("tokopedia-scraper")
    .description("Tokopedia 상품 검색 결과를 JSON / CSV로 저장")
    .requiredOption("-k, --keyword <keyword>", "검색 키워드")
    .requiredOption("-b, --brand <brand>", "브랜드 (검색어 앞에 붙음)")
    .option("--max-products <n>", "최대 상품 수")
    .option("--max-pages <n>", "최대 페이지 수")
    .option("--pages <n>", "--max-pages 별칭")
    .option("--delay <seconds>", "페이지 간 대기 (초)", String(SCRAPER_CONFIG.DELAY_MS / 1000))
    .option("--strategy <strategy>", "graphql | browser | auto", "auto")
    .option("--output-dir <dir>", "결과 저장 디렉토리", OUTPUT_CONFIG.RESULT_DIR);
}

/**
 * argv(사용자 인자만) → 검증된 옵션
 * @throws CommanderError 필수 옵션 누락 (exitOverride 설정 시)
 * @throws CliUsageError 값 검증 실패
 */
export function parseCliArgs(argv: readonly string[], program: Command = createCliProgram()): CliOptions {
  program.parse([...argv], { from: "user" });

  const parsed = CliOptionsSchema.safeParse(program.opts());
  if (!parsed.success) {
    throw new CliUsageError(formatZodError(parsed.error));
  }
  return parsed.data;
}

export function toCliJobParameters(options: CliOptions): ScrapeJobParameters {
  return {
    query: options.keyword,
    brand: options.brand,
    max_products: options.maxProducts ?? null,
    max_pages: options.maxPages ?? null,
    output_format: "json",
    delay_ms: Math.round(options.delay * 1000),
    strategy: options.strategy,
  };
}
