/**
 * Response normalization
 */

import type {
  NormalizedResponse,
  ResponseMeta,
  RawResponse,
  RateLimitInfo,
  PaginationInfo,
  PaginationStrategy,
} from "./types.js";

export class ResponseNormalizer {
  static normalize(
    raw: RawResponse,
    requestId: string,
    rateLimit: RateLimitInfo | null,
    pagination?: PaginationInfo
  ): NormalizedResponse {
    const meta: ResponseMeta = {
      requestId,
      status: raw.status,
      rateLimit,
    };

    if (pagination) {
      meta.pagination = pagination;
    }

    return {
      data: raw.body,
      meta,
    };
  }

  static extractPaginationInfo(
    raw: RawResponse,
    paginationStrategy: Pick<PaginationStrategy, "hasNext" | "extractCursor">
  ): PaginationInfo | undefined {
    const hasNext = paginationStrategy.hasNext(raw);
    if (!hasNext) {
      return undefined;
    }

    const pagination: PaginationInfo = { hasNext };
    const cursor = paginationStrategy.extractCursor(raw);
    if (cursor !== null) {
      pagination.cursor = cursor;
    }
    return pagination;
  }
}
