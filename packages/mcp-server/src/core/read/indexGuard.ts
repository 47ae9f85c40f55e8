/**
 * Index guard - ensures tools fail fast when the link index isn't built
 *
 * Without it, a query before the first build would return an empty list
 * that reads the same as "no links".
 */

import { IndexNotReadyError } from '@groundwave/zk-core';
import type { ZettelCache } from './cache.js';

/**
 * @throws IndexNotReadyError while no link build has completed
 */
export function requireLinkIndex(cache: Pick<ZettelCache, 'hasLinkIndex' | 'status'>): void {
  if (cache.hasLinkIndex()) return;

  const { links, refreshing } = cache.status();
  if (links.lastError) {
    throw new IndexNotReadyError(`Link index failed to build: ${links.lastError}`);
  }
  throw new IndexNotReadyError(
    refreshing ? 'Link index building... try again shortly' : 'Link index not built yet; run refresh_index'
  );
}
