/**
 * 목록 페이지네이션
 */

export interface PageSlice<T> {
  items: T[];
  total: number;
  page: number;
  page_size: number;
  total_pages: number;
}

/**
 * @param page 1부터 시작
 */
export function paginate<T>(items: readonly T[], page: number, pageSize: number): PageSlice<T> {
  const offset = (page - 1) * pageSize;
  return {
    items: items.slice(offset, offset + pageSize),
    total: items.length,
    page,
    page_size: pageSize,
    total_pages: Math.ceil(items.length / pageSize),
  };
}
