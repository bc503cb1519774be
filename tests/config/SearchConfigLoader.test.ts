/**
 * SearchConfigLoader Test
 *
 * 목적: 실제 tokopedia.yaml 로드 + 설정 오류 처리 검증
 */

import { describe, it, expect, beforeEach, afterEach } from "@jest/globals";
import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import { SearchConfigLoader } from "@/config/SearchConfigLoader";

const MINIMAL_BROWSER = `
  - id: browser
    type: browser
    browser:
      searchUrl: https://www.tokopedia.com/search?q=\${query}
      categoryUrl: https://www.tokopedia.com/p/\${category}
      selectors:
        container: [div]
        title: [span]
        price: [span]
`;

describe("SearchConfigLoader", () => {
  describe("tokopedia.yaml", () => {
    const loader = SearchConfigLoader.getInstance();

    it("GraphQL 전략과 쿼리 파일을 로드해야 함", () => {
      const strategy = loader.getGraphQLStrategy("tokopedia");

      expect(strategy.endpoint).toBe("https://gql.tokopedia.com/graphql/SearchProductV5Query");
      expect(strategy.operationName).toBe("SearchProductV5Query");
      expect(strategy.rows).toBe(60);
      expect(strategy.retryCount).toBe(3);
      expect(strategy.params.ob).toBe("23");
      expect(strategy.query).toContain("searchProductV5");
    });

    it("브라우저 전략과 에러 처리 설정을 로드해야 함", () => {
      const browser = loader.getBrowserStrategy("tokopedia");

      expect(browser.searchUrl).toBe("https://www.tokopedia.com/search?st=product&q=${query}");
      expect(browser.selectors.container).toHaveLength(3);
      expect(loader.loadConfig("tokopedia").errorHandling).toEqual({
        rateLimitDelay: 5000,
        serverErrorRetry: true,
      });
    });

    it("플랫폼 목록에 tokopedia가 있어야 함", () => {
      expect(loader.getAvailablePlatforms()).toContain("tokopedia");
    });

    it("같은 플랫폼은 캐시된 설정을 반환해야 함", () => {
      expect(loader.loadConfig("tokopedia")).toBe(loader.loadConfig("tokopedia"));
    });
  });

  describe("설정 오류", () => {
    let configDir: string;
    let loader: SearchConfigLoader;

    beforeEach(async () => {
      configDir = await fs.mkdtemp(path.join(os.tmpdir(), "search-config-"));
      loader = new SearchConfigLoader(configDir);
    });

    afterEach(async () => {
      await fs.rm(configDir, { recursive: true, force: true });
    });

    it("설정 파일이 없으면 에러를 던져야 함", () => {
      expect(() => loader.loadConfig("shopee")).toThrow("Search config file not found");
    });

    it("스키마가 맞지 않으면 에러를 던져야 함", async () => {
      await fs.writeFile(path.join(configDir, "broken.yaml"), "platform: broken\nstrategies: []\n");

      expect(() => loader.loadConfig("broken")).toThrow("Invalid search config for broken");
    });

    it("전략 ID가 중복되면 에러를 던져야 함", async () => {
      await fs.writeFile(
        path.join(configDir, "dup.yaml"),
        `platform: dup\nname: Dup\nbaseUrl: https://www.tokopedia.com\nstrategies:${MINIMAL_BROWSER}${MINIMAL_BROWSER}`,
      );

      expect(() => loader.loadConfig("dup")).toThrow("Duplicate strategy IDs found in platform: dup");
    });

    it("쿼리 파일이 없으면 에러를 던져야 함", async () => {
      await fs.writeFile(
        path.join(configDir, "gql.yaml"),
        [
          "platform: gql",
          "name: Gql",
          "baseUrl: https://www.tokopedia.com",
          "strategies:",
          "  - id: graphql",
          "    type: graphql",
          "    graphql:",
          "      endpoint: https://gql.example.test/graphql",
          "      operationName: Search",
          "      queryFile: missing.graphql",
        ].join("\n"),
      );

      expect(() => loader.loadConfig("gql")).toThrow("GraphQL query file not found");
    });

    it("해당 타입 전략이 없으면 에러를 던져야 함", async () => {
      await fs.writeFile(
        path.join(configDir, "only-browser.yaml"),
        `platform: only-browser\nname: Only\nbaseUrl: https://www.tokopedia.com\nstrategies:${MINIMAL_BROWSER}`,
      );

      expect(() => loader.getGraphQLStrategy("only-browser")).toThrow(
        "No graphql strategy configured for platform: only-browser",
      );
    });
  });
});
