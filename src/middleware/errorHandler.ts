/// <reference path="../types/express.d.ts" />
/**
 * 에러 핸들러 미들웨어
 * 도메인 에러 → HTTP 상태 변환, 그 외 500
 */

import type { Request, Response, NextFunction } from "express";
import { JobNotCompletedError, JobNotFoundError } from "@/core/errors/JobErrors";
import { logger } from "@/config/logger";

interface HttpError {
  status: number;
  error: string;
}

/**
 * 도메인 에러 → HTTP 상태 (매핑 없으면 null)
 */
export function toHttpError(err: unknown): HttpError | null {
  if (err instanceof JobNotFoundError) {
    return { status: 404, error: "Not Found" };
  }
  if (err instanceof JobNotCompletedError) {
    return { status: 409, error: "Conflict" };
  }
  if (err instanceof SyntaxError && "body" in err) {
    // express.json() 파싱 실패
    return { status: 400, error: "Bad Request" };
  }
  return null;
}

/**
 * 전역 에러 핸들러
 */
export function errorHandler(err: Error, req: Request, res: Response, _next: NextFunction): void {
  const httpError = toHttpError(err);
  if (httpError) {
    res.status(httpError.status).json({
      success: false,
      error: httpError.error,
      message: err.message,
    });
    return;
  }

  (req.log ?? logger).error(
    {
      error: { message: err.message, stack: err.stack, name: err.name },
      request_id: req.id,
      method: req.method,
      path: req.path,
    },
    "처리되지 않은 오류",
  );

  res.status(500).json({
    success: false,
    error: "Internal Server Error",
    message: err.message,
    ...(process.env.NODE_ENV === "development" && { stack: err.stack }),
  });
}

/**
 * 404 핸들러
 */
export function notFoundHandler(req: Request, res: Response): void {
  (req.log ?? logger).warn({ request_id: req.id, method: req.method, path: req.path }, "경로를 찾을 수 없음");

  res.status(404).json({
    success: false,
    error: "Not Found",
    message: `Route not found: ${req.method} ${req.path}`,
  });
}
