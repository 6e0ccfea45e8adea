import type { HttpFailure, HttpResult } from "./http.js";

export type Page<T> = {
  items: T[];
  // page token or absolute link; null/undefined/"" ends the listing
  next?: string | null;
};

export type FetchPage<T> = (cursor: string | null, page: number) => Promise<HttpResult<Page<T>>>;

export class PageError extends Error {
  constructor(readonly page: number, readonly failure: HttpFailure) {
    super(`page ${page} failed (${failure.kind}): ${failure.message}`);
    this.name = "PageError";
  }
}

/**
 * Walks a cursor-paginated listing one page at a time. Finite and single-use:
 * it ends on the first page without a next cursor and throws {@link PageError}
 * when a page cannot be fetched.
 */
export async function* paginate<T>(fetchPage: FetchPage<T>): AsyncGenerator<{ page: number; items: T[] }, void, undefined> {
  let cursor: string | null = null;
  for (let page = 1; ; page++) {
    const res = await fetchPage(cursor, page);
    if (!res.ok) throw new PageError(page, res);
    yield { page, items: res.data.items };
    const next = res.data.next;
    if (!next) return;
    cursor = next;
  }
}
