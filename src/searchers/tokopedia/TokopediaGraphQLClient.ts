/**
 * TokopediaGraphQLClient - SearchProductV5Query 호출
 *
 * 역할:
 * - 페이지당 1회 POST (batch payload: [{ operationName, variables: { params }, query }])
 * - params 문자열 생성 (페이지 오프셋, minus_ids, search_id)
 * - 429 / 5xx / 타임아웃 재시도 (지수 백오프)
 */

import { v4 as uuidv4 } from "uuid";
import type { ISearchClient } from "@/core/interfaces/search/ISearchClient";
import type { ErrorHandling, GraphQLStrategy } from "@/core/domain/search/SearchConfig";
import {
  TokopediaSearchResponseSchema,
  type SearchPage,
  type SearchPageRequest,
} from "@/core/domain/search/TokopediaSearch";
import { SearchRequestError, SearchRequestErrorType } from "@/core/errors/SearchRequestError";
import { logger } from "@/config/logger";
import { sleep as defaultSleep, type Sleeper } from "@/utils/sleep";

/**
 * 세션 식별자 (클라이언트 생성 시 1회 발급)
 */
export interface TokopediaSession {
  deviceId: string;
  userId: string;
  uniqueId: string;
}

function randomDigits(length: number): string {
  let digits = String(1 + Math.floor(Math.random() * 9));
  while (digits.length < length) {
    digits += String(Math.floor(Math.random() * 10));
  }
  return digits;
}

export function createSession(): TokopediaSession {
  return {
    deviceId: randomDigits(19),
    userId: randomDigits(9),
    uniqueId: uuidv4().replace(/-/g, ""),
  };
}

/**
 * header.additionalParams 에서 search_id 추출
 * 예: "search_id=2025010112000000ABCDEF&ob=23" → "2025010112000000ABCDEF"
 */
export function extractSearchId(additionalParams: string | null | undefined): string | null {
  if (!additionalParams) {
    return null;
  }
  const searchId = new URLSearchParams(additionalParams).get("search_id");
  return searchId ? searchId : null;
}

/**
 * GraphQL variables.params 문자열 생성
 */
export function buildSearchParams(
  strategy: Pick<GraphQLStrategy, "params" | "rows">,
  session: TokopediaSession,
  request: SearchPageRequest,
): string {
  const params: Record<string, string> = {};
  for (const [key, value] of Object.entries(strategy.params)) {
    params[key] = String(value);
  }

  params.page = String(request.page);
  params.q = request.query;
  params.rows = String(strategy.rows);
  params.start = String(request.start);
  params.unique_id = session.uniqueId;
  params.user_id = session.userId;

  if (request.page > 1) {
    const previousOffset = String(Math.max(0, request.start - strategy.rows));
    params.has_more = "true";
    params.next_offset_organic = previousOffset;
    params.next_offset_organic_ad = previousOffset;
    if (request.excludedIds.length > 0) {
      params.minus_ids = request.excludedIds.join(",");
    }
    if (request.searchId) {
      params.search_id = request.searchId;
    }
  }

  return Object.entries(params)
    .map(([key, value]) => `${key}=${encodeURIComponent(value)}`)
    .join("&");
}

export interface TokopediaGraphQLClientOptions {
  strategy: GraphQLStrategy;
  errorHandling: ErrorHandling;
  session?: TokopediaSession;
  fetchFn?: typeof fetch;
  sleep?: Sleeper;
}

export class TokopediaGraphQLClient implements ISearchClient {
  private readonly strategy: GraphQLStrategy;
  private readonly errorHandling: ErrorHandling;
  private readonly session: TokopediaSession;
  private readonly fetchFn: typeof fetch;
  private readonly sleep: Sleeper;

  constructor(options: TokopediaGraphQLClientOptions) {
    if (!options.strategy.query) {
      throw new Error("GraphQL query is not configured (query / queryFile)");
    }
    this.strategy = options.strategy;
    this.errorHandling = options.errorHandling;
    this.session = options.session ?? createSession();
    this.fetchFn = options.fetchFn ?? fetch;
    this.sleep = options.sleep ?? defaultSleep;
  }

  get pageSize(): number {
    return this.strategy.rows;
  }

  async fetchPage(request: SearchPageRequest): Promise<SearchPage> {
    const { retryCount } = this.strategy;

    for (let attempt = 1; ; attempt++) {
      try {
        return await this.executeRequest(request);
      } catch (error) {
        const requestError = this.toRequestError(error);
        if (!this.shouldRetry(requestError) || attempt >= retryCount) {
          throw requestError.withAttempts(attempt);
        }

        const delay = this.getRetryDelay(requestError, attempt);
        logger.warn(
          { ...requestError.toLogObject(), page: request.page, attempt, retryCount, delay },
          "[TokopediaGraphQLClient] 요청 실패 - 재시도",
        );
        await this.sleep(delay);
      }
    }
  }

  private async executeRequest(request: SearchPageRequest): Promise<SearchPage> {
    const { endpoint, operationName, query, timeout } = this.strategy;
    const payload = [
      {
        operationName,
        variables: { params: buildSearchParams(this.strategy, this.session, request) },
        query,
      },
    ];

    logger.debug(
      { page: request.page, start: request.start, excluded: request.excludedIds.length },
      "[TokopediaGraphQLClient] GraphQL 요청",
    );

    let response: Response;
    try {
      response = await this.fetchFn(endpoint, {
        method: "POST",
        headers: this.buildHeaders(),
        body: JSON.stringify(payload),
        signal: AbortSignal.timeout(timeout),
      });
    } catch (error) {
      const isTimeout =
        error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError");
      throw new SearchRequestError(
        SearchRequestErrorType.NETWORK_ERROR,
        isTimeout
          ? `Request timeout after ${timeout}ms`
          : `Network error: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error },
      );
    }

    if (response.status === 429) {
      throw new SearchRequestError(SearchRequestErrorType.RATE_LIMITED, "HTTP 429: rate limited", {
        statusCode: 429,
      });
    }
    if (response.status >= 500) {
      throw new SearchRequestError(
        SearchRequestErrorType.SERVER_ERROR,
        `HTTP ${response.status}: server error`,
        { statusCode: response.status },
      );
    }
    if (!response.ok) {
      throw new SearchRequestError(SearchRequestErrorType.HTTP_ERROR, `HTTP ${response.status}`, {
        statusCode: response.status,
      });
    }

    return this.parseResponse(await this.readJson(response), request);
  }

  private async readJson(response: Response): Promise<unknown> {
    try {
      const body: unknown = await response.json();
      return body;
    } catch (error) {
      throw new SearchRequestError(
        SearchRequestErrorType.INVALID_RESPONSE,
        "Response body is not valid JSON",
        { statusCode: response.status, cause: error },
      );
    }
  }

  /**
   * batch 응답의 첫 번째 원소 해석
   */
  private parseResponse(body: unknown, request: SearchPageRequest): SearchPage {
    const first: unknown = Array.isArray(body) ? body[0] : body;
    const parsed = TokopediaSearchResponseSchema.safeParse(first);
    if (!parsed.success) {
      throw new SearchRequestError(
        SearchRequestErrorType.INVALID_RESPONSE,
        `Unexpected response structure: ${parsed.error.errors[0]?.message ?? "unknown"}`,
      );
    }

    const { data, errors } = parsed.data;
    if (errors && errors.length > 0) {
      throw new SearchRequestError(
        SearchRequestErrorType.INVALID_RESPONSE,
        `GraphQL error: ${errors.map((e) => e.message).join("; ")}`,
      );
    }

    const search = data?.searchProductV5;
    if (!search) {
      throw new SearchRequestError(
        SearchRequestErrorType.INVALID_RESPONSE,
        "searchProductV5 missing in response",
      );
    }

    return {
      products: search.data?.products ?? [],
      searchId: extractSearchId(search.header?.additionalParams) ?? request.searchId,
      totalData: search.header?.totalData ?? 0,
    };
  }

  private buildHeaders(): Record<string, string> {
    return {
      ...this.strategy.headers,
      "bd-device-id": this.session.deviceId,
      "bd-web-id": this.session.deviceId,
      "tkpd-userid": this.session.userId,
    };
  }

  private toRequestError(error: unknown): SearchRequestError {
    if (error instanceof SearchRequestError) {
      return error;
    }
    return new SearchRequestError(
      SearchRequestErrorType.NETWORK_ERROR,
      error instanceof Error ? error.message : String(error),
      { cause: error },
    );
  }

  private shouldRetry(error: SearchRequestError): boolean {
    if (error.type === SearchRequestErrorType.SERVER_ERROR) {
      return this.errorHandling.serverErrorRetry;
    }
    return error.retryable;
  }

  /**
   * 429: rateLimitDelay 고정, 그 외: retryDelay × 2^(attempt-1)
   */
  private getRetryDelay(error: SearchRequestError, attempt: number): number {
    if (error.type === SearchRequestErrorType.RATE_LIMITED) {
      return this.errorHandling.rateLimitDelay;
    }
    return this.strategy.retryDelay * 2 ** (attempt - 1);
  }
}
