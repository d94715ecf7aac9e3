import type { TimelinePage } from "../types/tweet";

export interface TimelineSource {
  getTimelinePage(userId: string, count?: number, cursor?: string, includePinned?: boolean): Promise<TimelinePage>;
}

export interface PaginateOptions {
  count?: number;
  maxPages?: number; // stop after this many non-empty pages
  includePinned?: boolean; // pinned entries are only requested with the first page (default true)
}

/**
 * Walk a user's timeline page by page, feeding each page's bottom cursor into
 * the next request. Ends at the first empty page, which is not yielded.
 */
export async function* paginateTimeline(
  source: TimelineSource,
  userId: string,
  options: PaginateOptions = {}
): AsyncGenerator<TimelinePage, void, void> {
  const { count, maxPages = Infinity, includePinned = true } = options;
  let cursor: string | undefined;
  let pages = 0;

  while (pages < maxPages) {
    const page = await source.getTimelinePage(userId, count, cursor, includePinned && cursor === undefined);
    if (page.entries.length === 0) return;

    pages++;
    yield page;
    cursor = page.cursorBottom;
  }
}
