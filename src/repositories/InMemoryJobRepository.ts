/**
 * 프로세스 내 Job 저장소 (기본값)
 * 재시작 시 초기화
 */

import type { IJobRepository } from "@/core/interfaces/search/IJobRepository";
import type { ScrapeJob } from "@/core/domain/search/ScrapeJob";

export class InMemoryJobRepository implements IJobRepository {
  private readonly jobs = new Map<string, ScrapeJob>();

  async create(job: ScrapeJob): Promise<void> {
    if (this.jobs.has(job.job_id)) {
      throw new Error(`Job already exists: ${job.job_id}`);
    }
    this.jobs.set(job.job_id, structuredClone(job));
  }

  async get(jobId: string): Promise<ScrapeJob | null> {
    const job = this.jobs.get(jobId);
    return job ? structuredClone(job) : null;
  }

  async update(job: ScrapeJob): Promise<void> {
    this.jobs.set(job.job_id, structuredClone(job));
  }

  async delete(jobId: string): Promise<boolean> {
    return this.jobs.delete(jobId);
  }

  async list(): Promise<ScrapeJob[]> {
    return [...this.jobs.values()].map((job) => structuredClone(job));
  }
}
