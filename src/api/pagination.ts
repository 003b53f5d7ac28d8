/**
 * Pagination utilities for API list endpoints.
 *
 * Provides a Zod schema for parsing `?limit=&offset=` query params
 * and the envelope list endpoints respond with.
 */
import { z } from 'zod';
import type { Page } from '@/webhooks/types.js';

/** Zod schema for pagination query parameters. */
export const paginationSchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(20),
  offset: z.coerce.number().int().min(0).default(0),
});

/** Paginated response envelope for list endpoints. */
export interface PaginatedResponse<T> {
  items: T[];
  total: number;
  limit: number;
  offset: number;
}

/** Attach the requested window to a repository page, mapping each item. */
export function toPaginated<T, R>(
  page: Page<T>,
  limit: number,
  offset: number,
  map: (item: T) => R,
): PaginatedResponse<R> {
  return {
    items: page.items.map(map),
    total: page.total,
    limit,
    offset,
  };
}
