/**
 * Cache coordinator - owns the published link, journal and timeline snapshots
 *
 * Snapshots are immutable once published and replaced by a single reference
 * assignment, so a query sees either the previous build or the next one in
 * full. Queries return copies of what they read, down to the entries.
 * The three snapshots advance independently.
 */

import {
  BuildError,
  DateInvalidError,
  describeCause,
  parseDateString,
  type BuilderName,
  type NoteDirectory,
  type NoteOrigin,
  type RemoteEntry,
} from '@groundwave/zk-core';
import { serverLog } from '../shared/serverLog.js';
import { buildLinkSnapshot } from './graph.js';
import { buildJournalSnapshot, sortJournalEntries } from './journal.js';
import { IdResolver } from './resolver.js';
import { createBodyLoader, type LoadBody } from './scan.js';
import { buildTimelineSnapshot } from './timeline.js';
import type {
  BuildStats,
  JournalEntry,
  JournalSnapshot,
  LinkBuildStats,
  LinkSnapshot,
  TimelineNote,
  TimelineSnapshot,
} from './types.js';

export interface ZettelCacheOptions {
  origin: NoteOrigin;
  /** Index note filename, excluded from the timeline */
  indexFile: string;
  siteBaseUrl?: string;
  /** Resolver seeded from every link build */
  resolver?: IdResolver;
}

export type BuildOutcome<S extends BuildStats = BuildStats> =
  | { status: 'ok'; stats: S }
  | { status: 'failed'; error: string };

export interface RefreshResult {
  links: BuildOutcome<LinkBuildStats>;
  journal: BuildOutcome;
  timeline: BuildOutcome;
  durationMs: number;
}

export interface SnapshotStatus<S extends BuildStats = BuildStats> {
  builtAt: Date | null;
  stats: S | null;
  lastError: string | null;
}

export interface CacheStatus {
  links: SnapshotStatus<LinkBuildStats>;
  journal: SnapshotStatus;
  timeline: SnapshotStatus;
  refreshing: boolean;
}

type Listing = PromiseSettledResult<RemoteEntry[]>;

function copyJournalEntry(entry: JournalEntry): JournalEntry {
  return { ...entry, date: new Date(entry.date), updatedAt: new Date(entry.updatedAt) };
}

function copyTimelineNote(note: TimelineNote): TimelineNote {
  return { ...note, timestamp: new Date(note.timestamp) };
}

function listingOrThrow(builder: BuilderName, ...listings: Listing[]): RemoteEntry[][] {
  return listings.map((listing) => {
    if (listing.status === 'rejected') {
      throw new BuildError(builder, listing.reason);
    }
    return listing.value;
  });
}

export class ZettelCache {
  readonly resolver: IdResolver;

  private readonly origin: NoteOrigin;
  private readonly indexFile: string;
  private readonly siteBaseUrl?: string;

  private links: LinkSnapshot | null = null;
  private journal: JournalSnapshot | null = null;
  private timeline: TimelineSnapshot | null = null;
  private readonly lastErrors: Record<BuilderName, string | null> = {
    links: null,
    journal: null,
    timeline: null,
  };

  private inFlight: Promise<RefreshResult> | null = null;

  constructor(options: ZettelCacheOptions) {
    this.origin = options.origin;
    this.indexFile = options.indexFile;
    this.siteBaseUrl = options.siteBaseUrl;
    this.resolver = options.resolver ?? new IdResolver(options.origin);
  }

  // ---------------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------------

  /** Source ids linking to `targetId` (note UUID) */
  getBacklinks(targetId: string): string[] {
    return [...(this.links?.backlinks.get(targetId.trim().toLowerCase()) ?? [])];
  }

  /** Sorted target ids of a note UUID or `daily:YYYY-MM-DD` source */
  getForwardLinks(sourceId: string): string[] {
    return [...(this.links?.forwardLinks.get(sourceId.trim().toLowerCase()) ?? [])];
  }

  /** Source ids mentioning a contact */
  getContactLinks(contactId: string): string[] {
    return [...(this.links?.contactLinks.get(contactId.trim().toLowerCase()) ?? [])];
  }

  /** Whether a note is public; unknown ids are not */
  isPublic(id: string): boolean {
    return this.links?.publicNotes.get(id.trim().toLowerCase()) ?? false;
  }

  hasLinkIndex(): boolean {
    return this.links !== null;
  }

  /** Journal entries, newest first */
  getJournalEntries(): JournalEntry[] {
    return sortJournalEntries(this.journal?.entries.values() ?? []).map(copyJournalEntry);
  }

  /**
   * @throws DateInvalidError when `dateString` is not `YYYY-MM-DD`
   */
  getJournalEntry(dateString: string): JournalEntry | undefined {
    const trimmed = dateString.trim();
    if (!parseDateString(trimmed)) {
      throw new DateInvalidError(dateString);
    }
    const entry = this.journal?.entries.get(trimmed);
    return entry ? copyJournalEntry(entry) : undefined;
  }

  /** Copy of the timeline buckets */
  getTimelineByDate(): Map<string, TimelineNote[]> {
    const copy = new Map<string, TimelineNote[]>();
    for (const [date, notes] of this.timeline?.byDate ?? []) {
      copy.set(date, notes.map(copyTimelineNote));
    }
    return copy;
  }

  lastLinkBuildAt(): Date | null {
    return this.links?.builtAt ?? null;
  }

  lastJournalBuildAt(): Date | null {
    return this.journal?.builtAt ?? null;
  }

  lastTimelineBuildAt(): Date | null {
    return this.timeline?.builtAt ?? null;
  }

  status(): CacheStatus {
    return {
      links: this.snapshotStatus('links', this.links),
      journal: this.snapshotStatus('journal', this.journal),
      timeline: this.snapshotStatus('timeline', this.timeline),
      refreshing: this.inFlight !== null,
    };
  }

  // ---------------------------------------------------------------------------
  // Builds
  // ---------------------------------------------------------------------------

  /**
   * Full refresh: list both directories once and run every builder over the
   * shared listings and body loader. Builder failures are reported in the
   * result and leave the previous snapshot in place.
   *
   * A call made while a refresh is running joins it.
   */
  refresh(signal?: AbortSignal): Promise<RefreshResult> {
    if (!this.inFlight) {
      this.inFlight = this.runRefresh(signal).finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  /** @throws BuildError when a listing fails or the build is cancelled */
  async rebuildLinks(signal?: AbortSignal): Promise<LinkBuildStats> {
    const [main, daily] = await Promise.all([
      this.listFor('links', 'main', signal),
      this.listFor('links', 'daily', signal),
    ]);
    return this.publishLinks(main, daily, createBodyLoader(this.origin), signal);
  }

  /** @throws BuildError when the listing fails or the build is cancelled */
  async rebuildJournal(signal?: AbortSignal): Promise<BuildStats> {
    const daily = await this.listFor('journal', 'daily', signal);
    return this.publishJournal(daily, createBodyLoader(this.origin), signal);
  }

  /** @throws BuildError when the listing fails or the build is cancelled */
  async rebuildTimeline(signal?: AbortSignal): Promise<BuildStats> {
    const main = await this.listFor('timeline', 'main', signal);
    return this.publishTimeline(main, createBodyLoader(this.origin), signal);
  }

  private async runRefresh(signal?: AbortSignal): Promise<RefreshResult> {
    const startTime = Date.now();
    serverLog('refresh', 'Refreshing zettelkasten caches');

    const [main, daily] = await Promise.allSettled([
      this.origin.listNotes('main', signal),
      this.origin.listNotes('daily', signal),
    ]);
    const load = createBodyLoader(this.origin);

    const links = await this.attempt('links', () => {
      const [mainEntries, dailyEntries] = listingOrThrow('links', main, daily);
      return this.publishLinks(mainEntries, dailyEntries, load, signal);
    });
    const journal = await this.attempt('journal', () => {
      const [dailyEntries] = listingOrThrow('journal', daily);
      return this.publishJournal(dailyEntries, load, signal);
    });
    const timeline = await this.attempt('timeline', () => {
      const [mainEntries] = listingOrThrow('timeline', main);
      return this.publishTimeline(mainEntries, load, signal);
    });

    const durationMs = Date.now() - startTime;
    serverLog(
      'refresh',
      `Refresh finished in ${durationMs}ms (links: ${links.status}, journal: ${journal.status}, timeline: ${timeline.status})`
    );
    return { links, journal, timeline, durationMs };
  }

  private async attempt<S extends BuildStats>(
    builder: BuilderName,
    build: () => Promise<S>
  ): Promise<BuildOutcome<S>> {
    try {
      const stats = await build();
      return { status: 'ok', stats };
    } catch (err) {
      const error = err instanceof BuildError ? err : new BuildError(builder, err);
      this.lastErrors[builder] = error.message;
      serverLog(builder, error.message, 'error');
      return { status: 'failed', error: error.message };
    }
  }

  private async listFor(builder: BuilderName, dir: NoteDirectory, signal?: AbortSignal): Promise<RemoteEntry[]> {
    try {
      return await this.origin.listNotes(dir, signal);
    } catch (err) {
      throw new BuildError(builder, err);
    }
  }

  private async publishLinks(
    main: RemoteEntry[],
    daily: RemoteEntry[],
    load: LoadBody,
    signal?: AbortSignal
  ): Promise<LinkBuildStats> {
    const snapshot = await buildLinkSnapshot({
      main,
      daily,
      load,
      siteBaseUrl: this.siteBaseUrl,
      signal,
      onNoteSeen: (id, filename) => this.resolver.remember(id, filename),
    });
    this.throwIfCancelled('links', signal);
    this.links = snapshot;
    this.lastErrors.links = null;
    return snapshot.stats;
  }

  private async publishJournal(daily: RemoteEntry[], load: LoadBody, signal?: AbortSignal): Promise<BuildStats> {
    const snapshot = await buildJournalSnapshot({ daily, load, siteBaseUrl: this.siteBaseUrl, signal });
    this.throwIfCancelled('journal', signal);
    this.journal = snapshot;
    this.lastErrors.journal = null;
    return snapshot.stats;
  }

  private async publishTimeline(main: RemoteEntry[], load: LoadBody, signal?: AbortSignal): Promise<BuildStats> {
    const snapshot = await buildTimelineSnapshot({ main, indexFile: this.indexFile, load, signal });
    this.throwIfCancelled('timeline', signal);
    this.timeline = snapshot;
    this.lastErrors.timeline = null;
    return snapshot.stats;
  }

  /** A cancelled build saw its fetches fail; keep the previous snapshot instead */
  private throwIfCancelled(builder: BuilderName, signal?: AbortSignal): void {
    if (signal?.aborted) {
      throw new BuildError(builder, signal.reason ?? 'cancelled');
    }
  }

  private snapshotStatus<S extends BuildStats>(
    builder: BuilderName,
    snapshot: { builtAt: Date; stats: S } | null
  ): SnapshotStatus<S> {
    return {
      builtAt: snapshot?.builtAt ?? null,
      stats: snapshot ? { ...snapshot.stats } : null,
      lastError: this.lastErrors[builder],
    };
  }
}
