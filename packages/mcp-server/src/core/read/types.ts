/**
 * Shapes produced by the zettelkasten cache
 */

/** A rendered note */
export interface Note {
  id: string;
  title: string;
  filename: string;
  isPublic: boolean;
  isHome: boolean;
  htmlBody: string;
}

/** Raw Org body of a note, for prompt building */
export interface ChatNote {
  id: string;
  title: string;
  rawBody: string;
}

export interface NoteSummary {
  id: string;
  title: string;
  isPublic: boolean;
}

export interface JournalEntry {
  /** UTC midnight of the entry's day */
  date: Date;
  dateString: string;
  filename: string;
  title: string;
  htmlBody: string;
  previewHtml: string;
  hasMore: boolean;
  updatedAt: Date;
}

export interface TimelineNote {
  id: string;
  title: string;
  filename: string;
  timestamp: Date;
  dateString: string;
}

/** Per-build counters shared by every builder */
export interface BuildStats {
  /** Files that contributed to the snapshot */
  processed: number;
  /** Files dropped for this cycle (fetch, name, id or render failures) */
  skipped: number;
  durationMs: number;
}

export interface LinkBuildStats extends BuildStats {
  /** Distinct link targets */
  targets: number;
}

/**
 * Published link graph. Keys and values are canonical link source ids:
 * the note UUID or `daily:YYYY-MM-DD`.
 */
export interface LinkSnapshot {
  /** target id -> source ids, in processing order */
  backlinks: ReadonlyMap<string, readonly string[]>;
  /** source id -> sorted, unique target ids */
  forwardLinks: ReadonlyMap<string, readonly string[]>;
  /** note id -> `#+access: public`; daily notes are absent */
  publicNotes: ReadonlyMap<string, boolean>;
  /** contact id -> source ids */
  contactLinks: ReadonlyMap<string, readonly string[]>;
  builtAt: Date;
  stats: LinkBuildStats;
}

export interface JournalSnapshot {
  /** keyed by `YYYY-MM-DD` */
  entries: ReadonlyMap<string, JournalEntry>;
  builtAt: Date;
  stats: BuildStats;
}

export interface TimelineSnapshot {
  /** keyed by `YYYY-MM-DD`; each bucket sorted by timestamp, newest first */
  byDate: ReadonlyMap<string, readonly TimelineNote[]>;
  builtAt: Date;
  stats: BuildStats;
}
