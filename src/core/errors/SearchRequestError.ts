/**
 * 검색 요청 에러
 */

export enum SearchRequestErrorType {
  /** 타임아웃, 연결 실패 */
  NETWORK_ERROR = "NETWORK_ERROR",
  /** HTTP 429 */
  RATE_LIMITED = "RATE_LIMITED",
  /** HTTP 5xx */
  SERVER_ERROR = "SERVER_ERROR",
  /** 재시도 대상이 아닌 HTTP 상태 (4xx) */
  HTTP_ERROR = "HTTP_ERROR",
  /** GraphQL errors 응답 / 응답 구조 불일치 */
  INVALID_RESPONSE = "INVALID_RESPONSE",
}

const RETRYABLE_TYPES: ReadonlySet<SearchRequestErrorType> = new Set([
  SearchRequestErrorType.NETWORK_ERROR,
  SearchRequestErrorType.RATE_LIMITED,
  SearchRequestErrorType.SERVER_ERROR,
]);

export class SearchRequestError extends Error {
  public readonly type: SearchRequestErrorType;
  public readonly statusCode?: number;
  public readonly retryable: boolean;
  /** 시도 횟수 (재시도 소진 시 최종 값) */
  public readonly attempts: number;

  constructor(
    type: SearchRequestErrorType,
    message: string,
    options?: {
      statusCode?: number;
      attempts?: number;
      cause?: unknown;
    },
  ) {
    super(message, { cause: options?.cause });
    this.name = "SearchRequestError";
    this.type = type;
    this.statusCode = options?.statusCode;
    this.retryable = RETRYABLE_TYPES.has(type);
    this.attempts = options?.attempts ?? 1;
  }

  /**
   * 재시도 횟수 갱신 사본
   */
  withAttempts(attempts: number): SearchRequestError {
    return new SearchRequestError(this.type, this.message, {
      statusCode: this.statusCode,
      attempts,
      cause: this.cause,
    });
  }

  toLogObject(): Record<string, unknown> {
    return {
      errorType: this.type,
      message: this.message,
      statusCode: this.statusCode,
      retryable: this.retryable,
      attempts: this.attempts,
    };
  }
}
