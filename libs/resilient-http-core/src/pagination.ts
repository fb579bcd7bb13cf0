export interface PaginationState<TPage> {
  pageIndex: number;
  itemsSoFar: number;
  lastPage?: TPage;
}

export interface PaginationResult<TItem> {
  items: TItem[];
  pages: number;
}

export interface TokenPaginationConfig<TPage, TItem> {
  /** Extracts items from a page (e.g. page.bars, page.trades). */
  extractItems: (page: TPage) => TItem[];

  /** Token for the next page, or null/undefined when this was the last one. */
  getNextToken: (page: TPage, state: PaginationState<TPage>) => string | null | undefined;

  /** Token to start from; omit for the first page. */
  initialToken?: string;

  /** Soft safety limits to prevent unbounded pagination. */
  maxPages?: number;
  maxItems?: number;
}

/**
 * Follows page tokens until the service stops returning one or a limit is hit.
 * `fetchPage` receives `undefined` for the first page.
 */
export async function paginateAll<TPage, TItem>(
  fetchPage: (pageToken: string | undefined) => Promise<TPage>,
  config: TokenPaginationConfig<TPage, TItem>,
): Promise<PaginationResult<TItem>> {
  const items: TItem[] = [];
  let state: PaginationState<TPage> = { pageIndex: 0, itemsSoFar: 0 };
  let token: string | undefined = config.initialToken;
  let pages = 0;

  for (;;) {
    const page = await fetchPage(token);
    items.push(...config.extractItems(page));
    pages += 1;

    state = {
      pageIndex: state.pageIndex + 1,
      itemsSoFar: items.length,
      lastPage: page,
    };

    if (config.maxPages && pages >= config.maxPages) break;
    if (config.maxItems && items.length >= config.maxItems) break;

    const next = config.getNextToken(page, state);
    if (!next) break;
    token = next;
  }

  return { items, pages };
}
