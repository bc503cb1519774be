/**
 * 로거 컨텍스트 유틸리티
 * Job ID, Request ID 추적용 자식 로거 생성
 */

import { logger, type Logger } from "@/config/logger";

/**
 * Job 전용 로거 생성
 */
export function createJobLogger(jobId: string, base: Logger = logger): Logger {
  return base.child({ job_id: jobId });
}

/**
 * Request 전용 로거 생성
 * @param requestId - Request ID (UUID)
 * @param method - HTTP method
 * @param path - 요청 경로
 */
export function createRequestLogger(requestId: string, method: string, path: string): Logger {
  return logger.child({
    request_id: requestId,
    method,
    path,
  });
}

/**
 * 중요 정보 로깅 (콘솔에 ⭐ 표시)
 */
export function logImportant(
  target: Logger,
  message: string,
  data?: Record<string, unknown>,
): void {
  target.info({ ...data, important: true }, message);
}
