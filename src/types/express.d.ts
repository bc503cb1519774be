/**
 * Express Request 타입 확장
 * - id: Request ID (UUID)
 * - log: Request별 로거 인스턴스
 */

import type { Logger } from "pino";

declare global {
  namespace Express {
    interface Request {
      /**
       * requestLogger 미들웨어에서 생성
       */
      id?: string;

      /**
       * request_id, method, path 컨텍스트 포함
       */
      log?: Logger;
    }
  }
}
