/**
 * Journal and timeline tools
 */

import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { DateInvalidError, parseDateString } from '@groundwave/zk-core';
import type { ZettelCache } from '../../core/read/cache.js';
import type { JournalEntry, TimelineNote } from '../../core/read/types.js';
import { MAX_LIMIT } from '../../core/read/constants.js';
import { isoOrNull, runTool } from './results.js';

const JournalEntrySchema = z.object({
  date_string: z.string().describe('YYYY-MM-DD'),
  filename: z.string(),
  title: z.string(),
  html_body: z.string(),
  preview_html: z.string().describe('Rendered leading paragraphs'),
  has_more: z.boolean().describe('Whether the preview omits content'),
  updated_at: z.string(),
});

const TimelineNoteSchema = z.object({
  id: z.string(),
  title: z.string(),
  filename: z.string(),
  timestamp: z.string().describe('ISO timestamp from the filename, or midnight of a #+DATE: override'),
  date_string: z.string(),
});

function toJournalOutput(entry: JournalEntry) {
  return {
    date_string: entry.dateString,
    filename: entry.filename,
    title: entry.title,
    html_body: entry.htmlBody,
    preview_html: entry.previewHtml,
    has_more: entry.hasMore,
    updated_at: entry.updatedAt.toISOString(),
  };
}

function toTimelineOutput(note: TimelineNote) {
  return {
    id: note.id,
    title: note.title,
    filename: note.filename,
    timestamp: note.timestamp.toISOString(),
    date_string: note.dateString,
  };
}

/**
 * Register journal and timeline tools with the MCP server
 */
export function registerPeriodicTools(server: McpServer, getCache: () => ZettelCache): void {
  server.registerTool(
    'get_journal',
    {
      title: 'Get Journal',
      description:
        'Get journal entries from the daily/ directory, newest first, or the single entry for a date.',
      inputSchema: {
        date: z.string().optional().describe('YYYY-MM-DD; omit for the list'),
        limit: z.coerce.number().default(50).describe('Maximum number of entries to return'),
      },
      outputSchema: {
        count: z.number().describe('Number of entries returned'),
        entries: z.array(JournalEntrySchema),
        built_at: z.string().nullable().describe('When the journal index was built'),
      },
    },
    async ({ date, limit: requestedLimit }) => runTool(() => {
      const cache = getCache();
      let entries: JournalEntry[];
      if (date !== undefined) {
        const entry = cache.getJournalEntry(date);
        entries = entry ? [entry] : [];
      } else {
        entries = cache.getJournalEntries().slice(0, Math.min(requestedLimit, MAX_LIMIT));
      }

      return {
        count: entries.length,
        entries: entries.map(toJournalOutput),
        built_at: isoOrNull(cache.lastJournalBuildAt()),
      };
    })
  );

  server.registerTool(
    'get_timeline',
    {
      title: 'Get Timeline',
      description:
        'Get timestamped notes (YYYYMMDDHHMMSS-*.org) grouped by day, newest day first.',
      inputSchema: {
        date: z.string().optional().describe('YYYY-MM-DD; omit for every day'),
      },
      outputSchema: {
        day_count: z.number(),
        days: z.array(z.object({
          date: z.string(),
          notes: z.array(TimelineNoteSchema),
        })),
        built_at: z.string().nullable().describe('When the timeline index was built'),
      },
    },
    async ({ date }) => runTool(() => {
      const cache = getCache();
      const wanted = date?.trim();
      if (wanted !== undefined && !parseDateString(wanted)) {
        throw new DateInvalidError(date ?? '');
      }

      const days = [...cache.getTimelineByDate()]
        .filter(([day]) => wanted === undefined || day === wanted)
        .sort(([a], [b]) => b.localeCompare(a))
        .map(([day, notes]) => ({ date: day, notes: notes.map(toTimelineOutput) }));

      return {
        day_count: days.length,
        days,
        built_at: isoOrNull(cache.lastTimelineBuildAt()),
      };
    })
  );
}
