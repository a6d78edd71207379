import type { ObjectLiteral, SelectQueryBuilder } from 'typeorm';
import { Errors } from '@shared/middleware/errorHandler.js';

export interface Page<T> {
  items: T[];
  page: number;
  pageSize: number;
  total: number;
  hasNext: boolean;
  hasPrev: boolean;
}

function assertPageArgs(page: number, pageSize: number): void {
  if (!Number.isInteger(page)) {
    throw Errors.validation('page must be an integer');
  }
  if (!Number.isInteger(pageSize) || pageSize < 1) {
    throw Errors.validation('pageSize must be a positive integer');
  }
}

/**
 * 1-indexed pagination over an ordered query.
 *
 * Pages past the end, or below 1, return no items instead of failing.
 * hasNext reports rows after the window, hasPrev is page > 1.
 */
export async function paginate<T extends ObjectLiteral>(
  query: SelectQueryBuilder<T>,
  page: number,
  pageSize: number
): Promise<Page<T>> {
  assertPageArgs(page, pageSize);

  const total = await query.clone().getCount();
  const offset = (page - 1) * pageSize;
  const items = page >= 1 && offset < total
    ? await query.clone().offset(offset).limit(pageSize).getMany()
    : [];

  return {
    items,
    page,
    pageSize,
    total,
    hasNext: page * pageSize < total,
    hasPrev: page > 1,
  };
}
