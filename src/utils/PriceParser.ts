/**
 * PriceParser Utility
 *
 * 목적: 인도네시아 루피아(IDR) 가격 텍스트 파싱
 * 패턴: Utility Class (Static Methods)
 *
 * 형식:
 * - "Rp1.246.072" → 1246072 (점: 천 단위 구분)
 * - "Rp12.500,50" → 12500.5 (쉼표: 소수점)
 */

/**
 * 가격 파싱 결과 (통화 포함)
 */
export interface ParsedPrice {
  amount: number | null;
  currency: string;
}

export class PriceParser {
  /**
   * 텍스트에서 첫 번째 가격 토큰 추출
   * 예: "Rp1.246.072 Rp1.500.000" → "1.246.072"
   */
  static extractFirstToken(text: string | null | undefined): string | null {
    if (!text) {
      return null;
    }
    const match = text.match(/\d[\d.,]*/);
    if (!match) {
      return null;
    }
    return match[0].replace(/[.,]+$/, "");
  }

  /**
   * 가격 문자열을 숫자로 변환
   *
   * 점과 쉼표가 함께 있으면 마지막 구분자 = 소수점 ("1.246,07", "1,246.07")
   * 쉼표만 있으면 끝자리 1~2자리일 때 소수점, 그 외 천 단위
   * 점만 있으면 천 단위
   *
   * @returns 파싱 실패 시 null
   */
  static parse(text: string | null | undefined): number | null {
    const token = this.extractFirstToken(text);
    if (!token) {
      return null;
    }

    const hasDot = token.includes(".");
    const hasComma = token.includes(",");
    let normalized: string;

    if (hasDot && hasComma) {
      // 마지막 구분자가 소수점
      normalized =
        token.lastIndexOf(",") > token.lastIndexOf(".")
          ? token.replace(/\./g, "").replace(",", ".")
          : token.replace(/,/g, "");
    } else if (hasComma) {
      normalized = /,\d{1,2}$/.test(token)
        ? token.replace(/,(?=\d{1,2}$)/, ".").replace(/,/g, "")
        : token.replace(/,/g, "");
    } else {
      normalized = token.replace(/\./g, "");
    }

    const parsed = Number.parseFloat(normalized);
    return Number.isFinite(parsed) ? parsed : null;
  }

  /**
   * 통화 정보를 포함한 가격 파싱
   */
  static parseWithCurrency(text: string | null | undefined): ParsedPrice {
    return {
      amount: this.parse(text),
      currency: "IDR",
    };
  }

  /**
   * CSV용 숫자 문자열 ("Rp1.246.072" → "1246072", 실패 시 "")
   */
  static toNumericString(text: string | null | undefined): string {
    const amount = this.parse(text);
    return amount === null ? "" : String(amount);
  }

  /**
   * 할인율 계산
   *
   * 할인율 = round((원가 - 판매가) / 원가 * 100), 0~100 범위로 제한
   * 원가가 0이거나 없으면 null
   */
  static calculateDiscountRate(
    salePrice: number | null,
    originalPrice: number | null,
  ): number | null {
    if (originalPrice === null || originalPrice <= 0 || salePrice === null) {
      return null;
    }
    return this.clampPercent(((originalPrice - salePrice) / originalPrice) * 100);
  }

  /**
   * 반올림 후 0~100 범위로 제한
   */
  static clampPercent(value: number): number {
    return Math.min(100, Math.max(0, Math.round(value)));
  }
}
