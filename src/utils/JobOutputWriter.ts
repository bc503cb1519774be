/**
 * JobOutputWriter - Job 결과 파일 관리
 *
 * 구조:
 * {baseDir}/{job_id}/
 *   json/results.json
 *   csv/results.csv
 *   job_metadata.json
 */

import * as fs from "fs/promises";
import * as path from "path";
import {
  ProductRecordListSchema,
  type ProductRecord,
} from "@/core/domain/search/ProductRecord";
import type { JobOutputFiles, ScrapeJob } from "@/core/domain/search/ScrapeJob";
import { OUTPUT_CONFIG } from "@/config/constants";
import { renderProductsCsv } from "@/utils/ProductCsvWriter";

const JOB_ID_PATTERN = /^[A-Za-z0-9_-]+$/;

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function isNotFound(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";
}

export interface CsvRegeneration {
  status: "written" | "exists" | "empty";
  count: number;
}

export class JobOutputWriter {
  constructor(
    private readonly baseDir: string = path.join(OUTPUT_CONFIG.RESULT_DIR, OUTPUT_CONFIG.JOBS_SUBDIR),
  ) {}

  getJobDir(jobId: string): string {
    if (!JOB_ID_PATTERN.test(jobId)) {
      throw new Error(`Invalid job id: ${jobId}`);
    }
    return path.join(this.baseDir, jobId);
  }

  getOutputFiles(jobId: string): JobOutputFiles {
    const jobDir = this.getJobDir(jobId);
    return {
      json: path.join(jobDir, "json", "results.json"),
      csv: path.join(jobDir, "csv", "results.csv"),
      metadata: path.join(jobDir, OUTPUT_CONFIG.METADATA_FILE),
    };
  }

  /**
   * JSON + CSV 결과 저장
   */
  async writeResults(jobId: string, products: readonly ProductRecord[]): Promise<JobOutputFiles> {
    const files = this.getOutputFiles(jobId);
    try {
      await this.writeFile(files.json, JSON.stringify(products, null, 2));
      await this.writeFile(files.csv, renderProductsCsv(products));
    } catch (error) {
      throw new Error(`결과 파일 저장 실패: ${errorMessage(error)}`);
    }
    return files;
  }

  /**
   * CSV만 다시 생성 (JSON 기준)
   * @returns 기록한 상품 수
   */
  async writeCsvFromJson(jobId: string): Promise<number> {
    const products = await this.readResults(jobId);
    if (!products) {
      throw new Error(`results.json not found for job ${jobId}`);
    }
    await this.writeFile(this.getOutputFiles(jobId).csv, renderProductsCsv(products));
    return products.length;
  }

  /**
   * 누락된 CSV만 재생성
   * CSV가 이미 있거나 결과가 비어 있으면 건너뜀
   */
  async regenerateMissingCsv(jobId: string): Promise<CsvRegeneration> {
    if (await this.exists(this.getOutputFiles(jobId).csv)) {
      return { status: "exists", count: 0 };
    }
    const products = await this.readResults(jobId);
    if (!products) {
      throw new Error(`results.json not found for job ${jobId}`);
    }
    if (products.length === 0) {
      return { status: "empty", count: 0 };
    }
    return { status: "written", count: await this.writeCsvFromJson(jobId) };
  }

  async writeMetadata(job: ScrapeJob): Promise<void> {
    try {
      await this.writeFile(this.getOutputFiles(job.job_id).metadata, JSON.stringify(job, null, 2));
    } catch (error) {
      throw new Error(`메타데이터 저장 실패: ${errorMessage(error)}`);
    }
  }

  /**
   * results.json 로드 (파일 없으면 null)
   */
  async readResults(jobId: string): Promise<ProductRecord[] | null> {
    let content: string;
    try {
      content = await fs.readFile(this.getOutputFiles(jobId).json, "utf8");
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw error;
    }

    const parsed = ProductRecordListSchema.safeParse(JSON.parse(content));
    if (!parsed.success) {
      throw new Error(`결과 파일 형식 오류 (${jobId}): ${parsed.error.message}`);
    }
    return parsed.data;
  }

  async exists(filePath: string): Promise<boolean> {
    try {
      await fs.access(filePath);
      return true;
    } catch (error) {
      if (isNotFound(error)) {
        return false;
      }
      throw error;
    }
  }

  /**
   * 결과 디렉토리가 있는 Job ID 목록
   */
  async listJobIds(): Promise<string[]> {
    try {
      const entries = await fs.readdir(this.baseDir, { withFileTypes: true });
      return entries
        .filter((entry) => entry.isDirectory() && JOB_ID_PATTERN.test(entry.name))
        .map((entry) => entry.name)
        .sort();
    } catch (error) {
      if (isNotFound(error)) {
        return [];
      }
      throw error;
    }
  }

  async removeJob(jobId: string): Promise<void> {
    await fs.rm(this.getJobDir(jobId), { recursive: true, force: true });
  }

  private async writeFile(filePath: string, content: string): Promise<void> {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, content, "utf8");
  }
}
