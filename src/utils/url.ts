/**
 * URL 정규화 유틸리티
 */

/**
 * 상대 / 프로토콜 상대 URL → 절대 URL
 * "//img.example/a.jpg" → "https://img.example/a.jpg"
 * "/shop/item" → "{baseUrl}/shop/item"
 */
export function toAbsoluteUrl(url: string | null | undefined, baseUrl: string): string | null {
  const trimmed = url?.trim();
  if (!trimmed) {
    return null;
  }
  if (/^https?:\/\//i.test(trimmed)) {
    return trimmed;
  }
  if (trimmed.startsWith("//")) {
    return `https:${trimmed}`;
  }
  const base = baseUrl.replace(/\/+$/, "");
  return trimmed.startsWith("/") ? `${base}${trimmed}` : `${base}/${trimmed}`;
}
