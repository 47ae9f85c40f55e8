/**
 * Note renderer - single notes, index notes, note lists and backlink views
 */

import {
  DEFAULT_BASE_PATH,
  NoteNotFoundError,
  RemoteFetchError,
  assertUuid,
  describeCause,
  extractId,
  extractTitle,
  isHome,
  isPublic,
  normalizeBasePath,
  parseLinkSourceId,
  renderOrgToHtml,
  resolveHomeIndexFile,
  type NoteOrigin,
  type ZkConfig,
} from '@groundwave/zk-core';
import { serverLog } from '../shared/serverLog.js';
import type { ZettelCache } from './cache.js';
import {
  HOME_BASE_PATH,
  JOURNAL_BASE_PATH,
  PUBLIC_NOTE_BASE_PATH,
  RESTRICTED_LINK_CLASS,
} from './constants.js';
import type { IdResolver } from './resolver.js';
import { createBodyLoader, fetchBodies, tagEntries } from './scan.js';
import type { ChatNote, Note, NoteSummary } from './types.js';

const ANCHOR_TAG_REGEX = /<a\b([^>]*)>/gi;

const NOTE_HREF_REGEX =
  /\bhref="\/note\/([0-9a-fA-F]{8}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{12})(?:[?#][^"]*)?"/i;

const CLASS_ATTR_REGEX = /\bclass="([^"]*)"/i;

/**
 * Add `restricted-link` to every `/note/<uuid>` anchor whose target is not
 * public, merging with an existing class attribute.
 */
export function annotateRestrictedNoteLinks(html: string, isTargetPublic: (id: string) => boolean): string {
  return html.replace(ANCHOR_TAG_REGEX, (tag: string, attrs: string) => {
    const href = NOTE_HREF_REGEX.exec(attrs);
    if (!href || isTargetPublic(href[1].toLowerCase())) {
      return tag;
    }

    const existing = CLASS_ATTR_REGEX.exec(attrs);
    if (!existing) {
      return `<a class="${RESTRICTED_LINK_CLASS}"${attrs}>`;
    }

    const classes = existing[1].split(/\s+/).filter(Boolean);
    if (classes.includes(RESTRICTED_LINK_CLASS)) {
      return tag;
    }
    classes.push(RESTRICTED_LINK_CLASS);
    return `<a${attrs.replace(CLASS_ATTR_REGEX, `class="${classes.join(' ')}"`)}>`;
  });
}

/** Which backlinks a caller may see */
export type BacklinkVisibility = 'all' | 'public' | 'home-or-public';

export interface BacklinkRef {
  /** Canonical source id: note UUID or `daily:YYYY-MM-DD` */
  id: string;
  title: string;
  url: string;
}

export interface DescribeBacklinksOptions {
  /** Route prefix for note links */
  basePath?: string;
  visibility?: BacklinkVisibility;
  signal?: AbortSignal;
}

export interface ZettelNotesOptions {
  origin: NoteOrigin;
  cache: ZettelCache;
  config: Pick<ZkConfig, 'rootUrl' | 'indexFile' | 'homePath' | 'siteBaseUrl'>;
  /** Defaults to the cache's resolver */
  resolver?: IdResolver;
}

interface LoadedNote {
  id: string;
  filename: string;
  body: string;
}

export class ZettelNotes {
  private readonly origin: NoteOrigin;
  private readonly cache: ZettelCache;
  private readonly resolver: IdResolver;
  private readonly config: ZettelNotesOptions['config'];

  constructor(options: ZettelNotesOptions) {
    this.origin = options.origin;
    this.cache = options.cache;
    this.resolver = options.resolver ?? options.cache.resolver;
    this.config = options.config;
  }

  /**
   * Resolve, fetch and render a note.
   *
   * With base path `/note`, links to non-public notes are marked
   * `restricted-link` once the link index has been built.
   *
   * @throws UuidInvalidError, NoteNotFoundError, RemoteFetchError, RenderError
   */
  async renderNote(id: string, basePath: string = DEFAULT_BASE_PATH, signal?: AbortSignal): Promise<Note> {
    const note = await this.loadNote(id, signal);
    return this.toNote(note, basePath);
  }

  /** Render the configured index note; no id resolution */
  async renderIndexNote(basePath: string = DEFAULT_BASE_PATH, signal?: AbortSignal): Promise<Note> {
    return this.renderFile(this.config.indexFile, basePath, signal);
  }

  /**
   * Render the home index note under `/home`.
   * @throws ConfigError when WEBDAV_HOME_PATH is unset or outside the notes root
   */
  async renderHomeIndexNote(signal?: AbortSignal): Promise<Note> {
    const filename = resolveHomeIndexFile(this.config);
    return this.renderFile(filename, HOME_BASE_PATH, signal);
  }

  /** Raw Org body of a note */
  async getChatNote(id: string, signal?: AbortSignal): Promise<ChatNote> {
    const { id: noteId, body } = await this.loadNote(id, signal);
    return { id: noteId, title: extractTitle(body), rawBody: body };
  }

  /**
   * Every note in the main directory that carries an id, sorted by title
   * (case-insensitive). Unreadable files are skipped.
   *
   * @throws RemoteFetchError when the listing fails
   */
  async listNotes(signal?: AbortSignal): Promise<NoteSummary[]> {
    const entries = await this.origin.listNotes('main', signal);
    const fetched = await fetchBodies(tagEntries('main', entries), createBodyLoader(this.origin), signal);

    const notes: NoteSummary[] = [];
    for (const { item, result } of fetched) {
      if (result.status === 'rejected') {
        serverLog('notes', `Skipping ${item.entry.filename}: ${describeCause(result.reason)}`, 'warn');
        continue;
      }

      const id = extractId(result.value);
      if (!id) continue;

      this.resolver.remember(id, item.entry.filename);
      notes.push({ id, title: extractTitle(result.value), isPublic: isPublic(result.value) });
    }

    return notes.sort((a, b) => a.title.toLowerCase().localeCompare(b.title.toLowerCase()));
  }

  /**
   * Turn the cached backlinks of a note into titled links.
   *
   * Daily sources link to `/journal/YYYY-MM-DD` and are shown only for
   * visibility `all`. Note sources are fetched for their title and access
   * flags; failures are logged and the source is left out.
   */
  async describeBacklinks(targetId: string, options: DescribeBacklinksOptions = {}): Promise<BacklinkRef[]> {
    const target = assertUuid(targetId);
    const basePath = normalizeBasePath(options.basePath);
    const visibility = options.visibility ?? 'all';
    const refs: BacklinkRef[] = [];

    for (const sourceId of this.cache.getBacklinks(target)) {
      const source = parseLinkSourceId(sourceId);
      if (!source) continue;

      if (source.kind === 'daily') {
        if (visibility !== 'all') continue;
        const entry = this.cache.getJournalEntry(source.date);
        refs.push({
          id: sourceId,
          title: entry?.title ?? source.date,
          url: `${JOURNAL_BASE_PATH}/${source.date}`,
        });
        continue;
      }

      let note: LoadedNote;
      try {
        note = await this.loadNote(source.id, options.signal);
      } catch (err) {
        serverLog('notes', `Skipping backlink ${sourceId}: ${describeCause(err)}`, 'warn');
        continue;
      }

      const pub = isPublic(note.body);
      if (visibility === 'public' && !pub) continue;
      if (visibility === 'home-or-public' && !pub && !isHome(note.body)) continue;

      refs.push({ id: note.id, title: extractTitle(note.body), url: `${basePath}/${note.id}` });
    }

    return refs;
  }

  /**
   * Resolve and fetch a note body. A cached filename that no longer exists
   * or now holds another id is dropped and the id is resolved again.
   */
  private async loadNote(id: string, signal?: AbortSignal): Promise<LoadedNote> {
    const wanted = assertUuid(id);
    const fromCache = this.resolver.peek(wanted) !== undefined;

    const filename = await this.resolver.resolve(wanted, signal);
    if (!filename) {
      throw new NoteNotFoundError(wanted);
    }

    let body: string;
    try {
      body = await this.origin.fetchNote('main', filename, signal);
    } catch (err) {
      if (fromCache && err instanceof RemoteFetchError && err.status === 404) {
        this.resolver.forget(wanted);
        return this.loadNote(wanted, signal);
      }
      throw err;
    }

    if (fromCache && extractId(body) !== wanted) {
      serverLog('notes', `Stale mapping ${wanted} -> ${filename}, resolving again`, 'warn');
      this.resolver.forget(wanted);
      return this.loadNote(wanted, signal);
    }

    return { id: wanted, filename, body };
  }

  private async renderFile(filename: string, basePath: string, signal?: AbortSignal): Promise<Note> {
    const body = await this.origin.fetchNote('main', filename, signal);
    return this.toNote({ id: extractId(body) ?? '', filename, body }, basePath);
  }

  private toNote(note: LoadedNote, basePath: string): Note {
    const normalized = normalizeBasePath(basePath);
    let htmlBody = renderOrgToHtml(note.body, {
      basePath: normalized,
      siteBaseUrl: this.config.siteBaseUrl,
    });

    if (normalized === PUBLIC_NOTE_BASE_PATH && this.cache.hasLinkIndex()) {
      htmlBody = annotateRestrictedNoteLinks(htmlBody, (target) => this.cache.isPublic(target));
    }

    return {
      id: note.id,
      title: extractTitle(note.body),
      filename: note.filename,
      isPublic: isPublic(note.body),
      isHome: isHome(note.body),
      htmlBody,
    };
  }
}
