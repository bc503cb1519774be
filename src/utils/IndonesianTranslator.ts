/**
 * 인도네시아어 → 영어 용어 치환
 *
 * - 정적 용어 사전 (src/data/indonesian-terms.json)
 * - 대소문자 구분, 단어 경계 일치만 치환
 * - 긴 구문 우선 ("Gratis Ongkir" → "Free Shipping")
 * - 단일 패스 (치환 결과를 다시 치환하지 않음)
 */

import termTable from "@/data/indonesian-terms.json";

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export class IndonesianTranslator {
  private readonly terms: ReadonlyMap<string, string>;
  private readonly pattern: RegExp | null;

  constructor(terms: Readonly<Record<string, string>>) {
    this.terms = new Map(Object.entries(terms).filter(([from, to]) => from !== to));

    const alternatives = [...this.terms.keys()]
      .sort((a, b) => b.length - a.length)
      .map(escapeRegExp);

    this.pattern =
      alternatives.length > 0
        ? new RegExp(`(?<![\\p{L}\\p{N}])(?:${alternatives.join("|")})(?![\\p{L}\\p{N}])`, "gu")
        : null;
  }

  translate(text: string): string;
  translate(text: string | null | undefined): string | null;
  translate(text: string | null | undefined): string | null {
    if (text === null || text === undefined) {
      return null;
    }
    if (!this.pattern) {
      return text;
    }
    return text.replace(this.pattern, (match) => this.terms.get(match) ?? match);
  }
}

export const defaultTranslator = new IndonesianTranslator(termTable);
