export { PaginationQueryDto, DEFAULT_PAGE_SIZE, MAX_PAGE, MAX_PAGE_SIZE } from './pagination-query.dto';
export { simplePaginate, pageWindow, mapPage } from './simple-paginator';
export type {
  PageRequest,
  SimplePage,
  SimplePageMeta,
  SimplePageLinks,
} from './simple-paginator';
