export interface PageResult<T> {
  rows: T[];
  total: number;
  pageNum: number;
  pageSize: number;
  totalPages: number;
}

export interface PageParams {
  pageNum: number;
  pageSize: number;
  offset: number;
}

export interface PageOptions {
  defaultSize?: number;
  maxSize?: number;
}

/**
 * 归一化分页参数：pageNum 最小为 1，pageSize 非法时取默认值，超过上限时截断。
 */
export function normalizePage(
  pageNum: unknown,
  pageSize: unknown,
  options: PageOptions = {},
): PageParams {
  const defaultSize = options.defaultSize ?? 10;
  const maxSize = options.maxSize ?? 100;

  let page = Math.floor(Number(pageNum ?? 1));
  if (!Number.isFinite(page) || page < 1) page = 1;

  let size = Math.floor(Number(pageSize ?? defaultSize));
  if (!Number.isFinite(size) || size < 1) size = defaultSize;
  if (size > maxSize) size = maxSize;

  return { pageNum: page, pageSize: size, offset: (page - 1) * size };
}

export function buildPage<T>(
  rows: T[],
  total: number,
  page: Pick<PageParams, 'pageNum' | 'pageSize'>,
): PageResult<T> {
  return {
    rows,
    total,
    pageNum: page.pageNum,
    pageSize: page.pageSize,
    totalPages: total > 0 ? Math.ceil(total / page.pageSize) : 0,
  };
}

/** 逗号分隔的 ID 串 → 正整数数组，非法项忽略。 */
export function parseIds(raw: string | undefined): number[] {
  return (raw ?? '')
    .split(',')
    .map((s) => Number(s.trim()))
    .filter((v) => Number.isInteger(v) && v > 0);
}
