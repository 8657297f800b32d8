/**
 * "Simple" pagination: no total count is computed. The store is asked for
 * one row more than the page size; the presence of that extra row is what
 * tells us whether a next page exists.
 */

export interface PageRequest {
  page: number;
  perPage: number;
  /** Path the navigation links are built on, e.g. `/api/tasks` */
  path: string;
}

export interface SimplePageMeta {
  currentPage: number;
  perPage: number;
  /** 1-based position of the first item on this page, null when empty */
  from: number | null;
  /** 1-based position of the last item on this page, null when empty */
  to: number | null;
  hasMorePages: boolean;
}

export interface SimplePageLinks {
  prev: string | null;
  next: string | null;
}

export interface SimplePage<T> {
  data: T[];
  meta: SimplePageMeta;
  links: SimplePageLinks;
}

/** Rows to skip and to fetch for a page request (one extra as look-ahead). */
export function pageWindow({ page, perPage }: Pick<PageRequest, 'page' | 'perPage'>): {
  skip: number;
  take: number;
} {
  return { skip: (page - 1) * perPage, take: perPage + 1 };
}

function pageLink(path: string, page: number, perPage: number): string {
  return `${path}?page=${page}&pageSize=${perPage}`;
}

/**
 * Builds a page from the rows fetched with {@link pageWindow}.
 */
export function simplePaginate<T>(rows: T[], request: PageRequest): SimplePage<T> {
  const { page, perPage, path } = request;
  const hasMorePages = rows.length > perPage;
  const data = rows.slice(0, perPage);
  const offset = (page - 1) * perPage;

  return {
    data,
    meta: {
      currentPage: page,
      perPage,
      from: data.length > 0 ? offset + 1 : null,
      to: data.length > 0 ? offset + data.length : null,
      hasMorePages,
    },
    links: {
      prev: page > 1 ? pageLink(path, page - 1, perPage) : null,
      next: hasMorePages ? pageLink(path, page + 1, perPage) : null,
    },
  };
}

/** Maps the items of a page, keeping its navigation metadata. */
export function mapPage<T, U>(page: SimplePage<T>, fn: (item: T) => U): SimplePage<U> {
  return { ...page, data: page.data.map(fn) };
}
