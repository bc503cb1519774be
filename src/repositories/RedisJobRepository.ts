/**
 * Redis Job Repository
 * JOB_STORE=redis 일 때 사용 (재시작 후에도 Job 유지)
 *
 * 키 구조:
 * - tokopedia:job:{jobId} (hash, field "data" = Job JSON)
 * - tokopedia:jobs (set, 전체 Job ID 인덱스)
 */

import Redis from "ioredis";
import type { IJobRepository } from "@/core/interfaces/search/IJobRepository";
import { ScrapeJobSchema, isTerminalStatus, type ScrapeJob } from "@/core/domain/search/ScrapeJob";
import { REDIS_CONFIG } from "@/config/constants";
import { logger } from "@/config/logger";

/**
 * 저장소가 사용하는 Redis 명령 (ioredis Redis 호환)
 */
export interface JobHashClient {
  hget(key: string, field: string): Promise<string | null>;
  hset(key: string, field: string, value: string): Promise<number>;
  del(key: string): Promise<number>;
  expire(key: string, seconds: number): Promise<number>;
  sadd(key: string, member: string): Promise<number>;
  srem(key: string, member: string): Promise<number>;
  smembers(key: string): Promise<string[]>;
}

const DATA_FIELD = "data";

function jobKey(jobId: string): string {
  return `${REDIS_CONFIG.KEY_PREFIX}${jobId}`;
}

/**
 * ioredis 클라이언트 생성 (연결 로그 포함)
 */
export function createRedisClient(
  host: string = REDIS_CONFIG.HOST,
  port: number = REDIS_CONFIG.PORT,
): Redis {
  const client = new Redis({
    host,
    port,
    maxRetriesPerRequest: 3,
    retryStrategy: (times: number) => Math.min(times * 50, 2000),
  });

  client.on("connect", () => {
    logger.debug({ host, port }, "[RedisJobRepository] Redis 연결 성공");
  });
  client.on("error", (err: Error) => {
    logger.error({ error: err.message, host, port }, "[RedisJobRepository] Redis 연결 오류");
  });

  return client;
}

export class RedisJobRepository implements IJobRepository {
  constructor(private readonly client: JobHashClient) {}

  async create(job: ScrapeJob): Promise<void> {
    if (await this.client.hget(jobKey(job.job_id), DATA_FIELD)) {
      throw new Error(`Job already exists: ${job.job_id}`);
    }
    await this.save(job);
  }

  async get(jobId: string): Promise<ScrapeJob | null> {
    const raw = await this.client.hget(jobKey(jobId), DATA_FIELD);
    if (!raw) {
      return null;
    }
    return this.deserialize(jobId, raw);
  }

  async update(job: ScrapeJob): Promise<void> {
    await this.save(job);
  }

  async delete(jobId: string): Promise<boolean> {
    const removed = await this.client.del(jobKey(jobId));
    await this.client.srem(REDIS_CONFIG.INDEX_KEY, jobId);
    return removed > 0;
  }

  /**
   * 인덱스의 Job 조회 (TTL 만료된 ID는 인덱스에서 제거)
   */
  async list(): Promise<ScrapeJob[]> {
    const jobs: ScrapeJob[] = [];
    for (const jobId of await this.client.smembers(REDIS_CONFIG.INDEX_KEY)) {
      const job = await this.get(jobId);
      if (job) {
        jobs.push(job);
      } else {
        await this.client.srem(REDIS_CONFIG.INDEX_KEY, jobId);
      }
    }
    return jobs;
  }

  private async save(job: ScrapeJob): Promise<void> {
    const key = jobKey(job.job_id);
    const ttl = isTerminalStatus(job.status) ? REDIS_CONFIG.TTL.FINISHED : REDIS_CONFIG.TTL.ACTIVE;
    await this.client.hset(key, DATA_FIELD, JSON.stringify(job));
    await this.client.expire(key, ttl);
    await this.client.sadd(REDIS_CONFIG.INDEX_KEY, job.job_id);
  }

  private deserialize(jobId: string, raw: string): ScrapeJob | null {
    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (error) {
      logger.warn(
        { jobId, error: error instanceof Error ? error.message : String(error) },
        "[RedisJobRepository] Job JSON 파싱 실패",
      );
      return null;
    }

    const parsed = ScrapeJobSchema.safeParse(data);
    if (!parsed.success) {
      logger.warn({ jobId, errors: parsed.error.errors }, "[RedisJobRepository] Job 스키마 불일치");
      return null;
    }
    return parsed.data;
  }
}
