/**
 * 결과 CSV 재생성 스크립트
 *
 * csv/results.csv가 없는 Job만 json/results.json을 읽어 다시 씁니다.
 * CSV가 이미 있거나 결과가 비어 있는 Job은 건너뜁니다.
 *
 * 사용법:
 *   npx tsx scripts/regenerate-csv.ts [JOB_ID...]
 *
 * 예시:
 *   npx tsx scripts/regenerate-csv.ts              # 전체 Job
 *   npx tsx scripts/regenerate-csv.ts 1f0c...e2    # 지정 Job만
 *
 * 환경변수:
 *   - RESULT_OUTPUT_DIR
 */

process.env.LOG_LEVEL = "error";

import "dotenv/config";
import { JobOutputWriter } from "@/utils/JobOutputWriter";

async function main(): Promise<number> {
  const writer = new JobOutputWriter();
  const requested = process.argv.slice(2);
  const jobIds = requested.length > 0 ? requested : await writer.listJobIds();

  if (jobIds.length === 0) {
    console.log("재생성할 Job이 없습니다");
    return 0;
  }

  let failed = 0;
  let skipped = 0;
  for (const jobId of jobIds) {
    try {
      const { status, count } = await writer.regenerateMissingCsv(jobId);
      if (status === "written") {
        console.log(`✅ ${jobId}: ${count}개`);
      } else {
        skipped++;
        console.log(`⏭️  ${jobId}: ${status === "exists" ? "CSV 있음" : "결과 없음"}`);
      }
    } catch (error) {
      failed++;
      console.error(`❌ ${jobId}: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  console.log(`\n완료: ${jobIds.length - failed - skipped}/${jobIds.length} (건너뜀 ${skipped})`);
  return failed > 0 ? 1 : 0;
}

main()
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    console.error("❌ 예기치 않은 오류:", error);
    process.exit(1);
  });
