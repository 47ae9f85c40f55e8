/**
 * Journal index builder - daily notes keyed by date
 */

import {
  UNTITLED_NOTE,
  buildJournalPreview,
  describeCause,
  extractTitle,
  parseDateString,
  renderOrgToHtml,
  type RemoteEntry,
} from '@groundwave/zk-core';
import { serverLog } from '../shared/serverLog.js';
import { DAILY_FILE_REGEX, PREVIEW_MAX_CHARS, PREVIEW_MAX_PARAGRAPHS } from './constants.js';
import { fetchBodies, tagEntries, type LoadBody, type WorkItem } from './scan.js';
import type { JournalEntry, JournalSnapshot } from './types.js';

export interface JournalBuildInput {
  daily: readonly RemoteEntry[];
  load: LoadBody;
  siteBaseUrl?: string;
  signal?: AbortSignal;
}

interface DatedItem extends WorkItem {
  date: Date;
  dateString: string;
}

function renderPreview(body: string, siteBaseUrl?: string): { previewHtml: string; hasMore: boolean } {
  const { preview, hasMore } = buildJournalPreview(body, PREVIEW_MAX_PARAGRAPHS, PREVIEW_MAX_CHARS);
  if (!preview) {
    return { previewHtml: '', hasMore };
  }
  try {
    return { previewHtml: renderOrgToHtml(preview, { siteBaseUrl }), hasMore };
  } catch (err) {
    serverLog('journal', `Preview render failed: ${describeCause(err)}`, 'warn');
    return { previewHtml: '', hasMore };
  }
}

export async function buildJournalSnapshot(input: JournalBuildInput): Promise<JournalSnapshot> {
  const startTime = Date.now();
  const entries = new Map<string, JournalEntry>();
  let skipped = 0;

  const items: DatedItem[] = [];
  for (const item of tagEntries('daily', input.daily)) {
    const match = DAILY_FILE_REGEX.exec(item.entry.filename);
    if (!match) continue;

    const date = parseDateString(match[1]);
    if (!date) {
      skipped++;
      continue;
    }
    items.push({ ...item, date, dateString: match[1] });
  }

  const fetched = await fetchBodies(items, input.load, input.signal);

  for (const { item, result } of fetched) {
    if (result.status === 'rejected') {
      serverLog('journal', `Skipping ${item.entry.filename}: ${describeCause(result.reason)}`, 'warn');
      skipped++;
      continue;
    }
    const body = result.value;

    let htmlBody: string;
    try {
      htmlBody = renderOrgToHtml(body, { siteBaseUrl: input.siteBaseUrl });
    } catch (err) {
      serverLog('journal', `Skipping ${item.entry.filename}: ${describeCause(err)}`, 'warn');
      skipped++;
      continue;
    }

    const { previewHtml, hasMore } = renderPreview(body, input.siteBaseUrl);
    const title = extractTitle(body);

    entries.set(item.dateString, {
      date: item.date,
      dateString: item.dateString,
      filename: item.entry.filename,
      title: title === UNTITLED_NOTE ? item.dateString : title,
      htmlBody,
      previewHtml,
      hasMore,
      updatedAt: new Date(),
    });
  }

  const durationMs = Date.now() - startTime;
  serverLog('journal', `Journal index built: ${entries.size} entries, ${skipped} skipped (${durationMs}ms)`);

  return {
    entries,
    builtAt: new Date(),
    stats: { processed: entries.size, skipped, durationMs },
  };
}

/** Entries sorted by date, newest first */
export function sortJournalEntries(entries: Iterable<JournalEntry>): JournalEntry[] {
  return [...entries].sort((a, b) => b.dateString.localeCompare(a.dateString));
}
