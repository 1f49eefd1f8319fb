export interface PageWindow {
	limit?: number;
	offset?: number;
}

/**
 * Translate a 1-based page index into a limit/offset window. A missing or
 * non-positive page means "everything". `perPage` is capped at
 * `maxItemsPerPage` and falls back to it when unset.
 */
export function pageWindow(
	page: number | undefined,
	perPage: number | undefined,
	maxItemsPerPage: number,
): PageWindow {
	if (page === undefined || page < 1) {
		return {};
	}
	const limit =
		perPage !== undefined && perPage > 0 && perPage <= maxItemsPerPage
			? perPage
			: maxItemsPerPage;
	return { limit, offset: limit * (page - 1) };
}
