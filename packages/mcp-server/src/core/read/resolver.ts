/**
 * ID resolver - maps note UUIDs to filenames in the notes root
 *
 * Hits come from memory. A miss scans the main directory in listing order,
 * recording every id it sees, until the requested id turns up. Misses are
 * never cached, so newly added notes are found on the next call.
 */

import { assertUuid, describeCause, extractId, type NoteOrigin } from '@groundwave/zk-core';
import { serverLog } from '../shared/serverLog.js';

export class IdResolver {
  private readonly filenames = new Map<string, string>();

  constructor(private readonly origin: NoteOrigin) {}

  /**
   * Filename of the note with this id, or undefined when no note in the
   * current listing carries it.
   *
   * @throws UuidInvalidError before any request when `id` is not a UUID
   * @throws RemoteFetchError when the directory listing fails
   */
  async resolve(id: string, signal?: AbortSignal): Promise<string | undefined> {
    const wanted = assertUuid(id);

    const cached = this.filenames.get(wanted);
    if (cached) {
      return cached;
    }

    const entries = await this.origin.listNotes('main', signal);
    let scanned = 0;

    for (const entry of entries) {
      scanned++;

      let body: string;
      try {
        body = await this.origin.fetchNote('main', entry.filename, signal);
      } catch (err) {
        serverLog('resolver', `Skipping ${entry.filename}: ${describeCause(err)}`, 'warn');
        continue;
      }

      const found = extractId(body);
      if (!found) continue;

      this.filenames.set(found, entry.filename);
      if (found === wanted) {
        serverLog('resolver', `Resolved ${wanted} -> ${entry.filename} after ${scanned} files`);
        return entry.filename;
      }
    }

    serverLog('resolver', `No note with id ${wanted} (scanned ${scanned} files)`);
    return undefined;
  }

  /** Record a mapping observed elsewhere (index builds) */
  remember(id: string, filename: string): void {
    this.filenames.set(id.toLowerCase(), filename);
  }

  /** Drop a mapping found to be stale */
  forget(id: string): void {
    this.filenames.delete(id.toLowerCase());
  }

  /** Cached filename without scanning */
  peek(id: string): string | undefined {
    return this.filenames.get(id.toLowerCase());
  }

  get size(): number {
    return this.filenames.size;
  }
}
