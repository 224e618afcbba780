import type { IPageInfo, IPageRequest } from '@event-suite/types';

const DEFAULT_PAGE_SIZE = 10;

/**
 * Clamp a requested page into range.
 *
 * A page below 1 becomes 1; a page size below 1 falls back to the default of
 * 10 and one above `maxPageSize` is capped.
 *
 * @example
 * normalizePage(0, 500, 100); // { page: 1, pageSize: 100 }
 */
export function normalizePage(page: number | undefined, pageSize: number | undefined, maxPageSize: number): IPageRequest {
    let size = pageSize ?? DEFAULT_PAGE_SIZE;
    if (size > maxPageSize) {
        size = maxPageSize;
    }
    if (size < 1) {
        size = DEFAULT_PAGE_SIZE;
    }
    const current = page === undefined || page < 1 ? 1 : page;
    return { page: current, pageSize: size };
}

export function buildPageInfo(totalCount: number, request: IPageRequest): IPageInfo {
    return {
        totalCount,
        page: request.page,
        pageSize: request.pageSize,
        totalPages: Math.ceil(totalCount / request.pageSize)
    };
}

export function pageOffset(request: IPageRequest): number {
    return (request.page - 1) * request.pageSize;
}
