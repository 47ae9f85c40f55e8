/**
 * Tests for Periodic Tools - journal and timeline
 */

import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import { callTool, createTestServer, type TestServerContext } from '../helpers/createTestServer.js';
import { NOTE_C, createSeedOrigin, orgNote } from '../helpers/memoryOrigin.js';

const LATER_ID = '55555555-5555-5555-5555-555555555555';

describe('Periodic Tools via MCP', () => {
  let context: TestServerContext;

  beforeEach(async () => {
    const origin = createSeedOrigin()
      .put('daily', '2024-01-01.org', '#+TITLE: Monday\n\nHello.')
      .put('daily', '2024-01-03.org', 'Later.')
      .put('main', '20240301090000-t.org', orgNote(NOTE_C, 'Note C'))
      .put('main', '20240302080000-u.org', orgNote(LATER_ID, 'Note U'));
    context = await createTestServer(origin);
  });

  afterEach(async () => {
    await context.client.close();
  });

  describe('get_journal', () => {
    test('is empty before the first build', async () => {
      const result = await callTool(context.client, 'get_journal');

      expect(result.data).toEqual({ count: 0, entries: [], built_at: null });
    });

    test('lists entries newest first', async () => {
      await context.cache.refresh();

      const result = await callTool(context.client, 'get_journal');

      expect(result.data).toMatchObject({
        count: 2,
        entries: [
          { date_string: '2024-01-03', filename: '2024-01-03.org', title: '2024-01-03', has_more: false },
          { date_string: '2024-01-01', filename: '2024-01-01.org', title: 'Monday', has_more: false },
        ],
        built_at: context.cache.lastJournalBuildAt()?.toISOString(),
      });
    });

    test('applies the limit', async () => {
      await context.cache.refresh();

      const result = await callTool(context.client, 'get_journal', { limit: 1 });

      expect(result.data).toMatchObject({ count: 1, entries: [{ date_string: '2024-01-03' }] });
    });

    test('returns the entry for one date', async () => {
      await context.cache.refresh();

      const result = await callTool(context.client, 'get_journal', { date: '2024-01-01' });

      expect(result.data).toMatchObject({
        count: 1,
        entries: [{ title: 'Monday', preview_html: expect.stringContaining('Hello.') }],
      });
    });

    test('returns nothing for a date without an entry', async () => {
      await context.cache.refresh();

      const result = await callTool(context.client, 'get_journal', { date: '2024-01-02' });

      expect(result.data).toMatchObject({ count: 0, entries: [] });
    });

    test('rejects malformed dates', async () => {
      const result = await callTool(context.client, 'get_journal', { date: 'bad' });

      expect(result.isError).toBe(true);
      expect(result.data).toEqual({ error: 'Invalid date: "bad" (expected YYYY-MM-DD)', code: 'DATE_INVALID' });
    });
  });

  describe('get_timeline', () => {
    test('groups notes by day, newest day first', async () => {
      await context.cache.refresh();

      const result = await callTool(context.client, 'get_timeline');

      expect(result.data).toEqual({
        day_count: 2,
        days: [
          {
            date: '2024-03-02',
            notes: [{
              id: LATER_ID,
              title: 'Note U',
              filename: '20240302080000-u.org',
              timestamp: '2024-03-02T08:00:00.000Z',
              date_string: '2024-03-02',
            }],
          },
          {
            date: '2024-03-01',
            notes: [{
              id: NOTE_C,
              title: 'Note C',
              filename: '20240301090000-t.org',
              timestamp: '2024-03-01T09:00:00.000Z',
              date_string: '2024-03-01',
            }],
          },
        ],
        built_at: context.cache.lastTimelineBuildAt()?.toISOString(),
      });
    });

    test('filters by date', async () => {
      await context.cache.refresh();

      const result = await callTool(context.client, 'get_timeline', { date: '2024-03-01' });

      expect(result.data).toMatchObject({ day_count: 1, days: [{ date: '2024-03-01' }] });
    });

    test('rejects malformed dates', async () => {
      const result = await callTool(context.client, 'get_timeline', { date: '2024-3-1' });

      expect(result.data).toEqual({ error: 'Invalid date: "2024-3-1" (expected YYYY-MM-DD)', code: 'DATE_INVALID' });
    });
  });
});
