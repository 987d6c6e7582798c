import { z } from 'zod';
import type { PageRequest } from '../stores/types';

export const DEFAULT_PAGE = 1;
export const DEFAULT_LIMIT = 10;
export const MAX_LIMIT = 100;

export interface Pagination extends PageRequest {
  page: number;
}

const paginationQuerySchema = z.object({
  page: z.string().optional(),
  limit: z.string().optional()
});

const toPositiveInt = (value: string | undefined) => {
  if (value === undefined || !/^\d+$/.test(value)) {
    return undefined;
  }
  const parsed = Number(value);
  return Number.isSafeInteger(parsed) && parsed > 0 ? parsed : undefined;
};

/** Unparseable values fall back to the defaults; `limit` is clamped to MAX_LIMIT. */
export function parsePagination(query: unknown): Pagination {
  const parsed = paginationQuerySchema.safeParse(query ?? {});
  const raw: z.infer<typeof paginationQuerySchema> = parsed.success ? parsed.data : {};

  const page = toPositiveInt(raw.page) ?? DEFAULT_PAGE;
  const limit = Math.min(toPositiveInt(raw.limit) ?? DEFAULT_LIMIT, MAX_LIMIT);

  return { page, limit, offset: (page - 1) * limit };
}
