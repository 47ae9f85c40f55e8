/**
 * Link index builder - backlinks, forward links and access flags
 *
 * One pass over the main and daily listings:
 * - main notes are keyed by their `:ID:` and record `#+access: public`
 * - daily notes are keyed `daily:YYYY-MM-DD` and never enter the public map
 * - each source contributes once per distinct target
 *
 * Bodies are fetched in batches but processed in listing order, so the
 * snapshot does not depend on fetch timing.
 */

import {
  buildContactLinkMatchers,
  dailySource,
  describeCause,
  extractContactLinks,
  extractId,
  extractLinks,
  formatLinkSourceId,
  isPublic,
  noteSource,
  parseDateString,
  type LinkSourceId,
  type RemoteEntry,
} from '@groundwave/zk-core';
import { serverLog } from '../shared/serverLog.js';
import { DAILY_FILE_REGEX } from './constants.js';
import { fetchBodies, tagEntries, type LoadBody } from './scan.js';
import type { LinkSnapshot } from './types.js';

export interface LinkBuildInput {
  main: readonly RemoteEntry[];
  daily: readonly RemoteEntry[];
  load: LoadBody;
  siteBaseUrl?: string;
  signal?: AbortSignal;
  /** Called for every main note whose id was read */
  onNoteSeen?: (id: string, filename: string) => void;
}

/** Synthetic source for a daily filename, or undefined when the name is not a date */
export function dailySourceFor(filename: string): LinkSourceId | undefined {
  const match = DAILY_FILE_REGEX.exec(filename);
  if (!match || !parseDateString(match[1])) return undefined;
  return dailySource(match[1]);
}

function appendUnique(map: Map<string, string[]>, key: string, value: string): void {
  const list = map.get(key);
  if (!list) {
    map.set(key, [value]);
  } else if (!list.includes(value)) {
    list.push(value);
  }
}

/**
 * Build a complete link snapshot. Per-file failures are counted as skipped;
 * the function itself only fails on programming errors.
 */
export async function buildLinkSnapshot(input: LinkBuildInput): Promise<LinkSnapshot> {
  const startTime = Date.now();
  const contactMatchers = buildContactLinkMatchers(input.siteBaseUrl);

  const backlinks = new Map<string, string[]>();
  const forwardLinks = new Map<string, string[]>();
  const publicNotes = new Map<string, boolean>();
  const contactLinks = new Map<string, string[]>();
  let processed = 0;
  let skipped = 0;

  const dailyItems = tagEntries('daily', input.daily).filter((item) => {
    if (dailySourceFor(item.entry.filename)) return true;
    skipped++;
    return false;
  });
  const items = [...tagEntries('main', input.main), ...dailyItems];

  const fetched = await fetchBodies(items, input.load, input.signal);

  for (const { item, result } of fetched) {
    const { filename } = item.entry;

    if (result.status === 'rejected') {
      serverLog('links', `Skipping ${item.dir}/${filename}: ${describeCause(result.reason)}`, 'warn');
      skipped++;
      continue;
    }
    const body = result.value;

    let source: LinkSourceId | undefined;
    if (item.dir === 'daily') {
      source = dailySourceFor(filename);
    } else {
      const id = extractId(body);
      if (id) {
        source = noteSource(id);
        // a duplicated :ID: is public only when every copy is
        publicNotes.set(id, (publicNotes.get(id) ?? true) && isPublic(body));
        input.onNoteSeen?.(id, filename);
      }
    }

    if (!source) {
      skipped++;
      continue;
    }
    const sourceId = formatLinkSourceId(source);

    const targets = [...new Set(extractLinks(body))];
    for (const target of targets) {
      appendUnique(backlinks, target, sourceId);
    }
    // a duplicated :ID: merges into one source so both directions stay in step
    const previous = forwardLinks.get(sourceId) ?? [];
    forwardLinks.set(sourceId, [...new Set([...previous, ...targets])].sort());

    for (const contactId of extractContactLinks(body, contactMatchers)) {
      appendUnique(contactLinks, contactId, sourceId);
    }

    processed++;
  }

  const durationMs = Date.now() - startTime;
  serverLog('links', `Link index built: ${processed} files, ${skipped} skipped, ${backlinks.size} targets (${durationMs}ms)`);

  return {
    backlinks,
    forwardLinks,
    publicNotes,
    contactLinks,
    builtAt: new Date(),
    stats: { processed, skipped, targets: backlinks.size, durationMs },
  };
}
