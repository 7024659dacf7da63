import { DEFAULT_PAGE, QUESTIONS_PER_PAGE } from "./policy.js";

/**
 * Returns the 1-based `page` of `items`. Pages before the first or past the
 * last come back empty.
 */
export function paginate<T>(
  items: readonly T[],
  page: number = DEFAULT_PAGE,
  perPage: number = QUESTIONS_PER_PAGE
): T[] {
  if (!Number.isInteger(page) || page < 1) return [];
  const start: number = (page - 1) * perPage;
  return items.slice(start, start + perPage);
}

/** Parses a `?page=` value; anything that is not a whole number means page 1. */
export function parsePage(raw: string | undefined): number {
  if (raw === undefined || !/^[+-]?\d+$/.test(raw.trim())) return DEFAULT_PAGE;
  return Number.parseInt(raw, 10);
}
