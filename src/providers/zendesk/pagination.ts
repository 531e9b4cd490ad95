/**
 * Zendesk cursor pagination
 *
 * List and search endpoints return `meta.has_more` and `meta.after_cursor`;
 * the next page is requested with `page[after]=<cursor>`.
 */

import { z } from "zod";
import type { PaginationStrategy, RawResponse, RequestOptions } from "../../core/types.js";

const CursorMetaSchema = z.object({
  meta: z.object({
    has_more: z.boolean().optional(),
    after_cursor: z.string().nullable().optional(),
  }),
});

export const PAGE_AFTER_PARAM = "page[after]";

export class ZendeskCursorPaginationStrategy implements PaginationStrategy {
  extractCursor(response: RawResponse): string | null {
    const parsed = CursorMetaSchema.safeParse(response.body);
    if (!parsed.success) {
      return null;
    }
    return parsed.data.meta.after_cursor || null;
  }

  hasNext(response: RawResponse): boolean {
    const parsed = CursorMetaSchema.safeParse(response.body);
    if (!parsed.success || parsed.data.meta.has_more !== true) {
      return false;
    }
    return this.extractCursor(response) !== null;
  }

  /**
   * Same endpoint, method and body; only the cursor changes.
   */
  buildNextRequest(
    endpoint: string,
    options: RequestOptions,
    cursor: string
  ): { endpoint: string; options: RequestOptions } {
    return {
      endpoint,
      options: {
        ...options,
        query: {
          ...options.query,
          [PAGE_AFTER_PARAM]: cursor,
        },
      },
    };
  }
}
