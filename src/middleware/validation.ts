/**
 * 요청 검증 헬퍼 (Zod)
 * 실패 시 400 응답 후 null 반환
 */

import type { Response } from "express";
import type { z } from "zod";
import { formatZodError } from "@/utils/formatZodError";

export function parseOrRespond<T extends z.ZodTypeAny>(
  schema: T,
  input: unknown,
  res: Response,
): z.infer<T> | null {
  const parseResult = schema.safeParse(input);
  if (!parseResult.success) {
    res.status(400).json({
      success: false,
      error: "Bad Request",
      message: formatZodError(parseResult.error),
    });
    return null;
  }
  return parseResult.data;
}

/**
 * query string + JSON body 병합 (body 우선)
 */
export function mergeQueryAndBody(query: unknown, body: unknown): Record<string, unknown> {
  const merged: Record<string, unknown> = {};
  for (const source of [query, body]) {
    if (typeof source === "object" && source !== null && !Array.isArray(source)) {
      Object.assign(merged, source);
    }
  }
  return merged;
}
