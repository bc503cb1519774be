/**
 * SearchConfigLoader - Search YAML 설정 로더
 * Singleton Pattern
 *
 * 역할:
 * - config/search/*.yaml 파일 로드
 * - queryFile 지정 시 GraphQL 쿼리 파일 로드
 * - SearchConfig 스키마 검증 (Zod)
 * - 설정 캐싱
 */

import * as fs from "fs";
import * as path from "path";
import * as yaml from "js-yaml";
import {
  SearchConfigSchema,
  type BrowserStrategy,
  type GraphQLStrategy,
  type SearchConfig,
  type SearchStrategyConfig,
} from "@/core/domain/search/SearchConfig";
import { logger } from "@/config/logger";

const DEFAULT_CONFIG_DIR = path.join(__dirname, "search");

export class SearchConfigLoader {
  private static instance: SearchConfigLoader | undefined;
  private readonly configCache = new Map<string, SearchConfig>();

  constructor(private readonly configDir: string = DEFAULT_CONFIG_DIR) {}

  static getInstance(): SearchConfigLoader {
    if (!SearchConfigLoader.instance) {
      SearchConfigLoader.instance = new SearchConfigLoader();
    }
    return SearchConfigLoader.instance;
  }

  /**
   * Search YAML 설정 파일 로드
   * @param platform 플랫폼 이름 (예: "tokopedia")
   */
  loadConfig(platform: string): SearchConfig {
    const cached = this.configCache.get(platform);
    if (cached) {
      return cached;
    }

    const configPath = path.join(this.configDir, `${platform}.yaml`);
    if (!fs.existsSync(configPath)) {
      throw new Error(`Search config file not found: ${configPath}`);
    }

    const rawConfig: unknown = yaml.load(fs.readFileSync(configPath, "utf8"));
    const parseResult = SearchConfigSchema.safeParse(rawConfig);
    if (!parseResult.success) {
      logger.error(
        { platform, errors: parseResult.error.errors },
        "[SearchConfigLoader] 설정 검증 실패",
      );
      throw new Error(`Invalid search config for ${platform}: ${parseResult.error.message}`);
    }

    const config = this.resolveQueryFiles(parseResult.data);
    this.validateStrategyIds(config);
    this.configCache.set(platform, config);

    logger.debug(
      { platform, strategies: config.strategies.map((s) => s.id) },
      "[SearchConfigLoader] 설정 로드 완료",
    );

    return config;
  }

  /**
   * 타입별 최우선(priority 최소) 전략 조회
   */
  getStrategy(platform: string, type: SearchStrategyConfig["type"]): SearchStrategyConfig {
    const candidates = this.loadConfig(platform)
      .strategies.filter((strategy) => strategy.type === type)
      .sort((a, b) => a.priority - b.priority);

    if (candidates.length === 0) {
      throw new Error(`No ${type} strategy configured for platform: ${platform}`);
    }
    return candidates[0];
  }

  getGraphQLStrategy(platform: string): GraphQLStrategy {
    const strategy = this.getStrategy(platform, "graphql");
    if (!strategy.graphql) {
      throw new Error(`GraphQL strategy config missing: ${platform}/${strategy.id}`);
    }
    return strategy.graphql;
  }

  getBrowserStrategy(platform: string): BrowserStrategy {
    const strategy = this.getStrategy(platform, "browser");
    if (!strategy.browser) {
      throw new Error(`Browser strategy config missing: ${platform}/${strategy.id}`);
    }
    return strategy.browser;
  }

  /**
   * 사용 가능한 Search 플랫폼 목록
   */
  getAvailablePlatforms(): string[] {
    if (!fs.existsSync(this.configDir)) {
      logger.warn({ configDir: this.configDir }, "[SearchConfigLoader] 설정 디렉토리 없음");
      return [];
    }
    return fs
      .readdirSync(this.configDir)
      .filter((file) => file.endsWith(".yaml"))
      .map((file) => file.replace(/\.yaml$/, ""));
  }

  clearCache(): void {
    this.configCache.clear();
  }

  private resolveQueryFiles(config: SearchConfig): SearchConfig {
    return {
      ...config,
      strategies: config.strategies.map((strategy) => {
        const graphql = strategy.graphql;
        if (!graphql || graphql.query || !graphql.queryFile) {
          return strategy;
        }
        const queryPath = path.join(this.configDir, graphql.queryFile);
        if (!fs.existsSync(queryPath)) {
          throw new Error(`GraphQL query file not found: ${queryPath}`);
        }
        return {
          ...strategy,
          graphql: { ...graphql, query: fs.readFileSync(queryPath, "utf8") },
        };
      }),
    };
  }

  private validateStrategyIds(config: SearchConfig): void {
    const strategyIds = config.strategies.map((s) => s.id);
    if (strategyIds.length !== new Set(strategyIds).size) {
      throw new Error(`Duplicate strategy IDs found in platform: ${config.platform}`);
    }
  }
}
