/**
 * Browser Launch Arguments
 */

export const BROWSER_ARGS = {
  /**
   * 메모리 최적화 플래그
   */
  MEMORY_OPTIMIZED: [
    "--disable-dev-shm-usage",
    "--disable-gpu",
    "--disable-extensions",
    "--disable-background-networking",
    "--no-first-run",
  ],

  /**
   * 자동화 제어 표시 제거
   */
  STEALTH: ["--disable-blink-features=AutomationControlled"],

  /**
   * Docker 환경 필수
   */
  SANDBOX: ["--no-sandbox", "--disable-setuid-sandbox"],

  get DEFAULT(): string[] {
    return [...this.SANDBOX, ...this.MEMORY_OPTIMIZED, ...this.STEALTH];
  },
} as const;
