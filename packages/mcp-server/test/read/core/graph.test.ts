/**
 * Tests for the link index builder
 */

import { describe, it, expect, vi } from 'vitest';
import { buildLinkSnapshot, dailySourceFor } from '../../../src/core/read/graph.js';
import { createBodyLoader } from '../../../src/core/read/scan.js';
import type { LinkSnapshot } from '../../../src/core/read/types.js';
import {
  INDEX_ID,
  MemoryOrigin,
  NOTE_A,
  NOTE_B,
  NOTE_C,
  createSeedOrigin,
  orgNote,
} from '../helpers/memoryOrigin.js';

async function build(origin: MemoryOrigin, onNoteSeen?: (id: string, filename: string) => void): Promise<LinkSnapshot> {
  return buildLinkSnapshot({
    main: await origin.listNotes('main'),
    daily: await origin.listNotes('daily'),
    load: createBodyLoader(origin),
    onNoteSeen,
  });
}

function expectBidirectional(snapshot: LinkSnapshot): void {
  for (const [source, targets] of snapshot.forwardLinks) {
    for (const target of targets) {
      expect(snapshot.backlinks.get(target)).toContain(source);
    }
  }
  for (const [target, sources] of snapshot.backlinks) {
    for (const source of sources) {
      expect(snapshot.forwardLinks.get(source)).toContain(target);
    }
  }
}

describe('dailySourceFor', () => {
  it('accepts real dates only', () => {
    expect(dailySourceFor('2024-01-01.org')).toEqual({ kind: 'daily', date: '2024-01-01' });
    expect(dailySourceFor('2024-02-30.org')).toBeUndefined();
    expect(dailySourceFor('notes.org')).toBeUndefined();
  });
});

describe('buildLinkSnapshot', () => {
  it('builds backlinks and forward links for a simple link', async () => {
    const snapshot = await build(createSeedOrigin());

    expect(snapshot.backlinks.get(NOTE_B)).toEqual([NOTE_A]);
    expect(snapshot.forwardLinks.get(NOTE_A)).toEqual([NOTE_B]);
    expect(snapshot.forwardLinks.get(INDEX_ID)).toEqual([]);
    expect([...snapshot.publicNotes]).toEqual([
      [INDEX_ID, false],
      [NOTE_A, false],
      [NOTE_B, false],
    ]);
    expect(snapshot.stats).toMatchObject({ processed: 3, skipped: 0, targets: 1 });
  });

  it('records public notes', async () => {
    const origin = createSeedOrigin()
      .put('main', 'b.org', orgNote(NOTE_B, 'Note B', '#+access: public'));
    const snapshot = await build(origin);

    expect(snapshot.publicNotes.get(NOTE_B)).toBe(true);
    expect(snapshot.publicNotes.get(NOTE_A)).toBe(false);
  });

  it('treats a duplicated id as public only when every copy is', async () => {
    const privateFirst = await build(new MemoryOrigin()
      .put('main', 'c1.org', orgNote(NOTE_C, 'C'))
      .put('main', 'c2.org', orgNote(NOTE_C, 'C copy', '#+access: public')));
    const publicFirst = await build(new MemoryOrigin()
      .put('main', 'c2.org', orgNote(NOTE_C, 'C copy', '#+access: public'))
      .put('main', 'c1.org', orgNote(NOTE_C, 'C')));
    const bothPublic = await build(new MemoryOrigin()
      .put('main', 'c1.org', orgNote(NOTE_C, 'C', '#+access: public'))
      .put('main', 'c2.org', orgNote(NOTE_C, 'C copy', '#+access: public')));

    expect(privateFirst.publicNotes.get(NOTE_C)).toBe(false);
    expect(publicFirst.publicNotes.get(NOTE_C)).toBe(false);
    expect(bothPublic.publicNotes.get(NOTE_C)).toBe(true);
  });

  it('keys daily notes by synthetic id and keeps them out of the public map', async () => {
    const origin = createSeedOrigin()
      .put('daily', '2024-01-01.org', `#+access: public\nMet about [[id:${NOTE_B}]].`);
    const snapshot = await build(origin);

    expect(snapshot.backlinks.get(NOTE_B)).toEqual([NOTE_A, 'daily:2024-01-01']);
    expect(snapshot.forwardLinks.get('daily:2024-01-01')).toEqual([NOTE_B]);
    expect(snapshot.publicNotes.has('daily:2024-01-01')).toBe(false);
    expect(snapshot.publicNotes.size).toBe(3);
  });

  it('deduplicates and sorts forward links', async () => {
    const origin = new MemoryOrigin()
      .put('main', 'a.org', orgNote(NOTE_A, 'A', `[[id:${NOTE_C}]] [[id:${NOTE_B}]] [[id:${NOTE_C}][again]]`));
    const snapshot = await build(origin);

    expect(snapshot.forwardLinks.get(NOTE_A)).toEqual([NOTE_B, NOTE_C]);
    expect(snapshot.backlinks.get(NOTE_C)).toEqual([NOTE_A]);
    expect(snapshot.backlinks.get(NOTE_B)).toEqual([NOTE_A]);
  });

  it('keeps self-links', async () => {
    const origin = new MemoryOrigin()
      .put('main', 'a.org', orgNote(NOTE_A, 'A', `Myself: [[id:${NOTE_A}]]`));
    const snapshot = await build(origin);

    expect(snapshot.forwardLinks.get(NOTE_A)).toEqual([NOTE_A]);
    expect(snapshot.backlinks.get(NOTE_A)).toEqual([NOTE_A]);
  });

  it('matches ids case-insensitively', async () => {
    const origin = new MemoryOrigin()
      .put('main', 'a.org', orgNote(NOTE_A.toUpperCase(), 'A', `[[id:${NOTE_B.toUpperCase()}]]`))
      .put('main', 'b.org', orgNote(NOTE_B, 'B'));
    const snapshot = await build(origin);

    expect(snapshot.backlinks.get(NOTE_B)).toEqual([NOTE_A]);
  });

  it('keeps links in both directions consistent', async () => {
    const origin = new MemoryOrigin()
      .put('main', 'a.org', orgNote(NOTE_A, 'A', `[[id:${NOTE_B}]] [[id:${NOTE_C}]]`))
      .put('main', 'b.org', orgNote(NOTE_B, 'B', `[[id:${NOTE_A}]]`))
      .put('main', 'c.org', orgNote(NOTE_C, 'C', `[[id:${NOTE_C}]] [[id:${NOTE_B}]]`))
      .put('main', 'dup.org', orgNote(NOTE_C, 'C copy', `[[id:${NOTE_A}]]`))
      .put('daily', '2024-05-06.org', `[[id:${NOTE_A}]] [[id:${NOTE_C}]]`);

    const snapshot = await build(origin);
    expectBidirectional(snapshot);
    expect(snapshot.forwardLinks.get(NOTE_C)).toEqual([NOTE_A, NOTE_B, NOTE_C]);
  });

  it('skips unreadable files, files without ids and misnamed daily files', async () => {
    const origin = createSeedOrigin()
      .put('main', 'loose.org', `#+TITLE: No drawer\n[[id:${NOTE_B}]]`)
      .put('daily', 'notes.org', `[[id:${NOTE_B}]]`)
      .put('daily', '2024-01-02.org', `[[id:${NOTE_B}]]`)
      .failFetch('daily', '2024-01-02.org');

    const snapshot = await build(origin);

    expect(snapshot.stats).toMatchObject({ processed: 3, skipped: 3 });
    expect(snapshot.backlinks.get(NOTE_B)).toEqual([NOTE_A]);
    expect(origin.fetchCalls).not.toContain('daily/notes.org');
  });

  it('indexes contact links per source', async () => {
    const contact = 'cccccccc-cccc-cccc-cccc-cccccccccccc';
    const origin = new MemoryOrigin()
      .put('main', 'a.org', orgNote(NOTE_A, 'A', `[[contact:${contact}][Ann]] and [[/contact/${contact}][Ann]]`))
      .put('daily', '2024-01-01.org', `Lunch with [[contact:${contact.toUpperCase()}][Ann]]`);

    const snapshot = await build(origin);
    expect(snapshot.contactLinks.get(contact)).toEqual([NOTE_A, 'daily:2024-01-01']);
  });

  it('reports every main note it reads', async () => {
    const seen = vi.fn();
    await build(createSeedOrigin(), seen);

    expect(seen.mock.calls).toEqual([
      [INDEX_ID, 'index.org'],
      [NOTE_A, 'a.org'],
      [NOTE_B, 'b.org'],
    ]);
  });

  it('produces equal snapshots when rebuilt against the same files', async () => {
    const origin = createSeedOrigin()
      .put('daily', '2024-01-01.org', `[[id:${NOTE_A}]]`);

    const first = await build(origin);
    const second = await build(origin);

    expect(second.backlinks).toEqual(first.backlinks);
    expect(second.forwardLinks).toEqual(first.forwardLinks);
    expect(second.publicNotes).toEqual(first.publicNotes);
    expect(second.contactLinks).toEqual(first.contactLinks);
  });

  it('publishes nothing for an empty directory', async () => {
    const snapshot = await build(new MemoryOrigin());

    expect(snapshot.backlinks.size).toBe(0);
    expect(snapshot.forwardLinks.size).toBe(0);
    expect(snapshot.stats).toMatchObject({ processed: 0, skipped: 0, targets: 0 });
  });
});
