/**
 * Directory scan helpers shared by the index builders
 *
 * A refresh cycle lists each directory once and fetches each body at most
 * once: builders share a memoizing body loader.
 */

import type { NoteDirectory, NoteOrigin, RemoteEntry } from '@groundwave/zk-core';
import { FETCH_CONCURRENCY } from './constants.js';

/** Fetch a note body by directory and filename */
export type LoadBody = (dir: NoteDirectory, filename: string, signal?: AbortSignal) => Promise<string>;

/** A directory entry tagged with the directory it came from */
export interface WorkItem {
  dir: NoteDirectory;
  entry: RemoteEntry;
}

export interface FetchedItem<T extends WorkItem = WorkItem> {
  item: T;
  result: PromiseSettledResult<string>;
}

/**
 * Body loader for one refresh cycle. Concurrent and repeated loads of the
 * same file share one request, failures included.
 */
export function createBodyLoader(origin: NoteOrigin): LoadBody {
  const bodies = new Map<string, Promise<string>>();

  return (dir, filename, signal) => {
    const key = `${dir}/${filename}`;
    let body = bodies.get(key);
    if (!body) {
      body = origin.fetchNote(dir, filename, signal);
      bodies.set(key, body);
    }
    return body;
  };
}

export function tagEntries(dir: NoteDirectory, entries: readonly RemoteEntry[]): WorkItem[] {
  return entries.map((entry) => ({ dir, entry }));
}

/**
 * Fetch bodies in batches of FETCH_CONCURRENCY.
 * Results come back in input order, so callers stay deterministic.
 */
export async function fetchBodies<T extends WorkItem>(
  items: readonly T[],
  load: LoadBody,
  signal?: AbortSignal
): Promise<Array<FetchedItem<T>>> {
  const fetched: Array<FetchedItem<T>> = [];

  for (let i = 0; i < items.length; i += FETCH_CONCURRENCY) {
    const batch = items.slice(i, i + FETCH_CONCURRENCY);

    const results = await Promise.allSettled(
      batch.map((item) => load(item.dir, item.entry.filename, signal))
    );

    results.forEach((result, index) => {
      fetched.push({ item: batch[index], result });
    });
  }

  return fetched;
}
