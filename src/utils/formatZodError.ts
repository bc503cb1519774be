import type { z } from "zod";

/**
 * Zod 검증 에러 → "path: message, ..." 문자열
 */
export function formatZodError(error: z.ZodError): string {
  return error.errors
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join(", ");
}
