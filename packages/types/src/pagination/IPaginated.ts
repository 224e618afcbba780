/**
 * Page metadata returned with every paginated listing.
 */
export interface IPageInfo {
    totalCount: number;
    page: number;
    pageSize: number;
    totalPages: number;
}

/**
 * Normalised page request after clamping.
 */
export interface IPageRequest {
    page: number;
    pageSize: number;
}
