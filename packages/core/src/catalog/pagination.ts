import { logger } from '../logger.js';
import type { RepositoryCatalog } from './types.js';

export type CatalogPage<TItem, TCursor> = {
  items: TItem[];
  next: TCursor | null;
};

export type CollectPagesOptions<TItem, TCursor> = {
  first: TCursor;
  fetchPage: (cursor: TCursor) => Promise<CatalogPage<TItem, TCursor>>;
  /** Returns null for items that should stay out of the catalog. */
  toEntry: (item: TItem) => readonly [name: string, cloneUrl: string] | null;
};

/**
 * Walks a paginated listing until it runs out of pages. A cursor seen before
 * ends the walk too. A name listed twice keeps its first position and its last URL.
 */
export async function collectPages<TItem, TCursor>(
  options: CollectPagesOptions<TItem, TCursor>,
): Promise<RepositoryCatalog> {
  const catalog: RepositoryCatalog = new Map();
  const visited = new Set<TCursor>();
  let cursor: TCursor | null = options.first;

  while (cursor !== null) {
    if (visited.has(cursor)) {
      logger.warn({ cursor }, 'Listing returned a page already read; stopping');
      break;
    }
    visited.add(cursor);
    const page = await options.fetchPage(cursor);
    if (!page.items.length) break;
    for (const item of page.items) {
      const entry = options.toEntry(item);
      if (entry) catalog.set(entry[0], entry[1]);
    }
    cursor = page.next;
  }

  return catalog;
}
