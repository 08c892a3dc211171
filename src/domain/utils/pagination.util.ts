import type { Page } from '../types/plan.types';

export class PaginationUtil {
  /**
   * Slices an already sorted list. Pages are 1-based; a page past the end is empty.
   */
  static paginate<T>(items: T[], page: number, perPage: number): Page<T> {
    const total = items.length;
    const start = (page - 1) * perPage;
    return {
      items: items.slice(start, start + perPage),
      total,
      page,
      perPage,
      totalPages: Math.ceil(total / perPage),
    };
  }
}
