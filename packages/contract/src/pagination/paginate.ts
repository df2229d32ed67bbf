import { ResourceExhaustedError } from '@ftgate/core';
import { getLogger } from '@ftgate/logger';
import { err, ok, type Result } from 'neverthrow';

import type { PageRequest } from '../assetft/queries.js';

const logger = getLogger('pagination');

export interface PaginateOptions<TPage> {
  /** Used in log lines and error messages */
  label: string;
  fetchPage: (pagination: PageRequest | undefined, pageNumber: number) => Promise<Result<TPage, Error>>;
  nextKey: (page: TPage) => string | null | undefined;
  maxPages: number;
}

export interface CollectedPages<TPage, TItem> {
  lastPage: TPage;
  items: TItem[];
}

/**
 * Lazily pull pages until the upstream reports no continuation. An absent,
 * null or empty `next_key` ends the sequence.
 *
 * Yields one Result per page. After an error nothing else is yielded. When a
 * page still has a continuation after `maxPages` pages the generator yields a
 * ResourceExhaustedError instead of requesting more.
 */
export async function* paginate<TPage>(opts: PaginateOptions<TPage>): AsyncGenerator<Result<TPage, Error>> {
  const { label, fetchPage, nextKey, maxPages } = opts;
  let pagination: PageRequest | undefined;
  let pageNumber = 0;

  while (true) {
    const pageResult = await fetchPage(pagination, pageNumber);
    if (pageResult.isErr()) {
      yield err(pageResult.error);
      return;
    }

    pageNumber += 1;
    const key = nextKey(pageResult.value) || undefined;
    logger.trace({ hasMore: key !== undefined, label, pageNumber }, 'Fetched page');

    yield ok(pageResult.value);

    if (key === undefined) {
      return;
    }
    if (pageNumber >= maxPages) {
      yield err(
        new ResourceExhaustedError(maxPages, `${label} query did not finish within ${maxPages} pages`, {
          operation: label,
        })
      );
      return;
    }
    pagination = { key };
  }
}

/**
 * Drain a page sequence, concatenating items in the order received and
 * keeping the final page for its pagination metadata.
 */
export async function collectAllPages<TPage, TItem>(
  pages: AsyncIterable<Result<TPage, Error>>,
  itemsOf: (page: TPage) => readonly TItem[]
): Promise<Result<CollectedPages<TPage, TItem>, Error>> {
  const items: TItem[] = [];
  let lastPage: TPage | undefined;

  for await (const page of pages) {
    if (page.isErr()) {
      return err(page.error);
    }
    items.push(...itemsOf(page.value));
    lastPage = page.value;
  }

  if (lastPage === undefined) {
    return err(new Error('Page sequence ended without yielding a page'));
  }
  return ok({ items, lastPage });
}
