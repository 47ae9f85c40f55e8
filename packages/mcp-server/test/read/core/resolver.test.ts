/**
 * Tests for the ID resolver
 */

import { describe, it, expect } from 'vitest';
import { RemoteFetchError, UuidInvalidError } from '@groundwave/zk-core';
import { IdResolver } from '../../../src/core/read/resolver.js';
import {
  INDEX_ID,
  NOTE_A,
  NOTE_B,
  createSeedOrigin,
  orgNote,
} from '../helpers/memoryOrigin.js';

const MISSING_ID = '99999999-9999-9999-9999-999999999999';

describe('IdResolver', () => {
  it('scans on a miss, then answers from memory', async () => {
    const origin = createSeedOrigin();
    const resolver = new IdResolver(origin);

    await expect(resolver.resolve(NOTE_A)).resolves.toBe('a.org');
    expect(origin.listCalls.main).toBe(1);
    expect(origin.fetchCalls).toEqual(['main/index.org', 'main/a.org']);
    expect(resolver.peek(INDEX_ID)).toBe('index.org');
    expect(resolver.size).toBe(2);

    await expect(resolver.resolve(NOTE_A)).resolves.toBe('a.org');
    expect(origin.listCalls.main).toBe(1);
    expect(origin.fetchCalls).toHaveLength(2);
  });

  it('normalizes the requested id', async () => {
    const resolver = new IdResolver(createSeedOrigin());
    await expect(resolver.resolve(` ${NOTE_B.toUpperCase()} `)).resolves.toBe('b.org');
  });

  it('rejects invalid ids without touching the network', async () => {
    const origin = createSeedOrigin();
    const resolver = new IdResolver(origin);

    await expect(resolver.resolve('not-a-uuid')).rejects.toBeInstanceOf(UuidInvalidError);
    expect(origin.listCalls.main).toBe(0);
    expect(origin.fetchCalls).toEqual([]);
  });

  it('does not cache misses', async () => {
    const origin = createSeedOrigin();
    const resolver = new IdResolver(origin);

    await expect(resolver.resolve(MISSING_ID)).resolves.toBeUndefined();
    expect(resolver.size).toBe(3);

    origin.put('main', 'new.org', orgNote(MISSING_ID, 'New'));
    await expect(resolver.resolve(MISSING_ID)).resolves.toBe('new.org');
    expect(origin.listCalls.main).toBe(2);
  });

  it('skips files that fail to fetch', async () => {
    const origin = createSeedOrigin().failFetch('main', 'index.org');
    const resolver = new IdResolver(origin);

    await expect(resolver.resolve(NOTE_A)).resolves.toBe('a.org');
    expect(resolver.peek(INDEX_ID)).toBeUndefined();
  });

  it('propagates listing failures', async () => {
    const origin = createSeedOrigin().failList('main', 503);
    const resolver = new IdResolver(origin);

    const error = await resolver.resolve(NOTE_A).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(RemoteFetchError);
    expect(error).toMatchObject({ status: 503 });
  });

  it('overwrites stale mappings during a later scan', async () => {
    const origin = createSeedOrigin();
    const resolver = new IdResolver(origin);
    resolver.remember(NOTE_B, 'moved.org');

    await expect(resolver.resolve(MISSING_ID)).resolves.toBeUndefined();
    expect(resolver.peek(NOTE_B)).toBe('b.org');
  });
});
