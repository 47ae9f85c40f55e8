/**
 * Timeline index builder - timestamped notes bucketed by day
 *
 * Filenames carry a UTC `YYYYMMDDHHMMSS` prefix. A `#+DATE:` directive naming
 * another day moves the note to that day at midnight.
 */

import {
  UNTITLED_NOTE,
  describeCause,
  extractDateOverride,
  extractId,
  extractTitle,
  formatDateString,
  type RemoteEntry,
} from '@groundwave/zk-core';
import { serverLog } from '../shared/serverLog.js';
import { TIMELINE_FILE_REGEX } from './constants.js';
import { fetchBodies, tagEntries, type LoadBody, type WorkItem } from './scan.js';
import type { TimelineNote, TimelineSnapshot } from './types.js';

export interface TimelineBuildInput {
  main: readonly RemoteEntry[];
  /** Index note filename; never part of the timeline */
  indexFile: string;
  load: LoadBody;
  signal?: AbortSignal;
}

interface StampedItem extends WorkItem {
  timestamp: Date;
}

/**
 * Timestamp encoded in a timeline filename, or undefined when the name does
 * not follow the pattern or names an impossible instant.
 */
export function parseTimelineTimestamp(filename: string): Date | undefined {
  const match = TIMELINE_FILE_REGEX.exec(filename);
  if (!match) return undefined;

  const [year, month, day, hour, minute, second] = match.slice(1, 7).map(Number);
  const timestamp = new Date(Date.UTC(year, month - 1, day, hour, minute, second));

  if (
    timestamp.getUTCFullYear() !== year ||
    timestamp.getUTCMonth() !== month - 1 ||
    timestamp.getUTCDate() !== day ||
    timestamp.getUTCHours() !== hour ||
    timestamp.getUTCMinutes() !== minute ||
    timestamp.getUTCSeconds() !== second
  ) {
    return undefined;
  }
  return timestamp;
}

export async function buildTimelineSnapshot(input: TimelineBuildInput): Promise<TimelineSnapshot> {
  const startTime = Date.now();
  const byDate = new Map<string, TimelineNote[]>();
  let processed = 0;
  let skipped = 0;

  const items: StampedItem[] = [];
  for (const item of tagEntries('main', input.main)) {
    const { filename } = item.entry;
    if (filename === input.indexFile || !TIMELINE_FILE_REGEX.test(filename)) continue;

    const timestamp = parseTimelineTimestamp(filename);
    if (!timestamp) {
      skipped++;
      continue;
    }
    items.push({ ...item, timestamp });
  }

  const fetched = await fetchBodies(items, input.load, input.signal);

  for (const { item, result } of fetched) {
    const { filename } = item.entry;

    if (result.status === 'rejected') {
      serverLog('timeline', `Skipping ${filename}: ${describeCause(result.reason)}`, 'warn');
      skipped++;
      continue;
    }
    const body = result.value;

    const id = extractId(body);
    if (!id) {
      skipped++;
      continue;
    }

    const title = extractTitle(body);
    let timestamp = item.timestamp;
    const override = extractDateOverride(body);
    if (override && formatDateString(override) !== formatDateString(timestamp)) {
      timestamp = override;
    }

    const dateString = formatDateString(timestamp);
    const bucket = byDate.get(dateString) ?? [];
    bucket.push({
      id,
      title: title === UNTITLED_NOTE ? filename.replace(/\.org$/, '') : title,
      filename,
      timestamp,
      dateString,
    });
    byDate.set(dateString, bucket);
    processed++;
  }

  for (const bucket of byDate.values()) {
    bucket.sort((a, b) => b.timestamp.getTime() - a.timestamp.getTime());
  }

  const durationMs = Date.now() - startTime;
  serverLog('timeline', `Timeline index built: ${processed} notes in ${byDate.size} days, ${skipped} skipped (${durationMs}ms)`);

  return {
    byDate,
    builtAt: new Date(),
    stats: { processed, skipped, durationMs },
  };
}
