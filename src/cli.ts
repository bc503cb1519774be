#!/usr/bin/env node
/**
 * Tokopedia 상품 검색 CLI
 *
 * 사용법:
 *   npx tsx src/cli.ts -k <keyword> -b <brand> [--max-products n] [--pages n]
 *
 * 예시:
 *   npx tsx src/cli.ts -k "serum" -b "wardah" --max-products 120
 *   npx tsx src/cli.ts -k "sunscreen" -b "azarine" --pages 3 --strategy graphql
 */

import "dotenv/config";
import path from "path";
import { CommanderError } from "commander";
import { logger } from "@/config/logger";
import { OUTPUT_CONFIG, SERVICE_NAMES } from "@/config/constants";
import { ScrapeJobStatus } from "@/core/domain/search/ScrapeJob";
import { buildSearchQuery } from "@/core/domain/search/ScrapeResult";
import { InMemoryJobRepository } from "@/repositories/InMemoryJobRepository";
import { ProductScraper } from "@/searchers/ProductScraper";
import { JobStore } from "@/services/JobStore";
import { ScrapeJobService } from "@/services/ScrapeJobService";
import { JobOutputWriter } from "@/utils/JobOutputWriter";
import { CliUsageError, parseCliArgs, toCliJobParameters, type CliOptions } from "@/cli/CliOptions";

const cliLogger = logger.child({ service_name: SERVICE_NAMES.CLI });

async function main(): Promise<number> {
  let options: CliOptions;
  try {
    options = parseCliArgs(process.argv.slice(2));
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    if (error instanceof CliUsageError) {
      console.error(`❌ 잘못된 옵션: ${error.message}`);
      return 2;
    }
    throw error;
  }

  const writer = new JobOutputWriter(path.join(options.outputDir, OUTPUT_CONFIG.JOBS_SUBDIR));
  const store = new JobStore(new InMemoryJobRepository(), {
    onJobUpdated: (job) => writer.writeMetadata(job),
  });
  const service = new ScrapeJobService({
    store,
    scraper: new ProductScraper(),
    writer,
    maxConcurrentJobs: 1,
    logger: cliLogger,
  });

  console.log("================================================================================");
  console.log("🔍 Tokopedia 상품 검색");
  console.log("================================================================================\n");
  console.log(`📝 검색어: "${buildSearchQuery(options.keyword, options.brand)}"`);
  console.log(`⚙️  전략: ${options.strategy}`);
  console.log(`📦 최대 상품 수: ${options.maxProducts ?? "제한 없음"}`);
  console.log(`📄 최대 페이지: ${options.maxPages ?? "제한 없음"}`);
  console.log("");

  const startTime = Date.now();
  const submitted = await service.submit(toCliJobParameters(options));
  await service.waitForIdle();
  const job = await service.getJob(submitted.job_id);
  const duration = Date.now() - startTime;

  console.log("================================================================================");
  console.log("📊 결과");
  console.log("================================================================================");
  console.log(`Job ID: ${job.job_id}`);
  console.log(`상태: ${job.status}`);
  console.log(`소요시간: ${duration}ms`);

  if (job.status !== ScrapeJobStatus.COMPLETED || !job.result) {
    console.error(`❌ 수집 실패: ${job.error ?? "unknown error"}`);
    return 1;
  }

  const { result } = job;
  console.log(`상품 수: ${result.total_products}개`);
  console.log(`페이지 수: ${result.pages_fetched}`);
  console.log(`종료 사유: ${result.stop_reason} (${result.strategy})`);
  if (result.warning) {
    console.log(`⚠️  ${result.warning}`);
  }
  console.log(`\n💾 JSON: ${result.output_files.json}`);
  console.log(`💾 CSV:  ${result.output_files.csv}`);
  console.log("");

  if (result.total_products === 0) {
    console.error("❌ 상품을 찾지 못했습니다");
    return 1;
  }
  return 0;
}

main()
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    cliLogger.error({ error: error instanceof Error ? error.message : String(error) }, "[CLI] 예기치 않은 오류");
    console.error("❌ 예기치 않은 오류:", error);
    process.exit(1);
  });
