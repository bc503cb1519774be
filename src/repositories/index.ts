import type { IJobRepository } from "@/core/interfaces/search/IJobRepository";
import { JOB_CONFIG } from "@/config/constants";
import { logger } from "@/config/logger";
import { InMemoryJobRepository } from "./InMemoryJobRepository";
import { RedisJobRepository, createRedisClient } from "./RedisJobRepository";

export { InMemoryJobRepository } from "./InMemoryJobRepository";
export { RedisJobRepository, createRedisClient, type JobHashClient } from "./RedisJobRepository";

/**
 * JOB_STORE 설정에 따른 저장소 생성
 */
export function createJobRepository(store: string = JOB_CONFIG.STORE): IJobRepository {
  if (store === "redis") {
    logger.info("[JobRepository] Redis 저장소 사용");
    return new RedisJobRepository(createRedisClient());
  }
  return new InMemoryJobRepository();
}
