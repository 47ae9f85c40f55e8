/**
 * WebDAV access to the notes directory.
 *
 * Directory listings are PROPFIND Depth 1 requests and file reads are plain
 * GETs. Nothing is cached here; the caches live in the index builders.
 */

import { createClient, type FileStat, type WebDAVClient } from 'webdav';
import type { WebDavCredentials, ZkConfig } from './config.js';
import { DEFAULT_TIMEOUT_MS } from './config.js';
import { RemoteFetchError } from './errors.js';

/** A single entry of a directory listing */
export interface RemoteEntry {
  /** Server path of the entry */
  path: string;
  /** Last path segment */
  filename: string;
  isDir: boolean;
  size: number;
  modified?: Date;
}

export interface WebDavClientOptions {
  credentials?: WebDavCredentials;
  timeoutMs?: number;
}

function statusOf(err: unknown): number | undefined {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return undefined;
}

function toEntry(stat: FileStat): RemoteEntry {
  const modified = stat.lastmod ? new Date(stat.lastmod) : undefined;
  return {
    path: stat.filename,
    filename: stat.basename,
    isDir: stat.type === 'directory',
    size: stat.size,
    modified: modified && !Number.isNaN(modified.getTime()) ? modified : undefined,
  };
}

/**
 * Authenticated WebDAV client addressed by absolute URLs.
 *
 * One underlying `webdav` client is kept per origin. Every request carries
 * basic auth when both username and password are configured.
 */
export class WebDavClient {
  private readonly clients = new Map<string, WebDAVClient>();
  private readonly credentials?: WebDavCredentials;
  private readonly timeoutMs: number;

  constructor(options: WebDavClientOptions = {}) {
    this.credentials = options.credentials;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  /**
   * List a directory. A missing directory (404) is an empty listing.
   * @throws RemoteFetchError for any other failure
   */
  async listDirectory(url: string, signal?: AbortSignal): Promise<RemoteEntry[]> {
    const { client, path } = this.target(url);
    try {
      const result = await client.getDirectoryContents(path, { signal: this.deadline(signal) });
      const stats = Array.isArray(result) ? result : result.data;
      return stats.map(toEntry);
    } catch (err) {
      const status = statusOf(err);
      if (status === 404) {
        return [];
      }
      throw new RemoteFetchError(url, { status, cause: err });
    }
  }

  /**
   * Fetch a file body as text.
   * @throws RemoteFetchError on non-2xx answers and transport failures
   */
  async fetchFile(url: string, signal?: AbortSignal): Promise<string> {
    const { client, path } = this.target(url);
    try {
      const result = await client.getFileContents(path, { format: 'text', signal: this.deadline(signal) });
      const body = typeof result === 'object' && 'data' in result ? result.data : result;
      return typeof body === 'string' ? body : new TextDecoder().decode(body);
    } catch (err) {
      throw new RemoteFetchError(url, { status: statusOf(err), cause: err });
    }
  }

  private target(url: string): { client: WebDAVClient; path: string } {
    const parsed = new URL(url);
    let client = this.clients.get(parsed.origin);
    if (!client) {
      client = this.credentials
        ? createClient(parsed.origin, {
          username: this.credentials.username,
          password: this.credentials.password,
        })
        : createClient(parsed.origin);
      this.clients.set(parsed.origin, client);
    }
    return { client, path: decodeURIComponent(parsed.pathname) };
  }

  private deadline(signal?: AbortSignal): AbortSignal {
    const timeout = AbortSignal.timeout(this.timeoutMs);
    return signal ? AbortSignal.any([signal, timeout]) : timeout;
  }
}

/** The two directories the zettelkasten reads from */
export type NoteDirectory = 'main' | 'daily';

/**
 * Read-only view of the notes root and its daily subdirectory.
 * Listings contain `.org` files only.
 */
export interface NoteOrigin {
  listNotes(dir: NoteDirectory, signal?: AbortSignal): Promise<RemoteEntry[]>;
  fetchNote(dir: NoteDirectory, filename: string, signal?: AbortSignal): Promise<string>;
}

export function isOrgFile(entry: RemoteEntry): boolean {
  return !entry.isDir && entry.filename.endsWith('.org');
}

/**
 * NoteOrigin backed by the configured WebDAV server
 */
export function createWebDavOrigin(config: ZkConfig, client?: WebDavClient): NoteOrigin {
  const dav = client ?? new WebDavClient({
    credentials: config.credentials,
    timeoutMs: config.timeoutMs,
  });

  const directoryUrl = (dir: NoteDirectory): string =>
    dir === 'main' ? config.rootUrl : config.dailyUrl;

  return {
    async listNotes(dir, signal) {
      const entries = await dav.listDirectory(directoryUrl(dir), signal);
      return entries.filter(isOrgFile);
    },
    fetchNote(dir, filename, signal) {
      return dav.fetchFile(new URL(encodeURIComponent(filename), directoryUrl(dir)).href, signal);
    },
  };
}
