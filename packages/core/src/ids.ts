/**
 * Identifier helpers - note UUIDs, calendar dates and link-graph source ids
 */

import { UuidInvalidError } from './errors.js';

/** RFC 4122 textual form (hex groups 8-4-4-4-12, any version nibble) */
const UUID_REGEX = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

const DATE_REGEX = /^(\d{4})-(\d{2})-(\d{2})$/;

/** Prefix of synthetic link-graph ids for daily notes */
export const DAILY_ID_PREFIX = 'daily:';

export function isUuid(value: string): boolean {
  return UUID_REGEX.test(value);
}

/**
 * Validate and normalise a note id received from a caller.
 * @throws UuidInvalidError when the value is not a UUID
 */
export function assertUuid(value: string): string {
  const trimmed = value.trim();
  if (!isUuid(trimmed)) {
    throw new UuidInvalidError(value);
  }
  return trimmed.toLowerCase();
}

/**
 * Parse a `YYYY-MM-DD` string as a UTC calendar date.
 * Returns undefined for malformed strings and impossible dates (2024-02-30).
 */
export function parseDateString(value: string): Date | undefined {
  const match = DATE_REGEX.exec(value);
  if (!match) return undefined;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const date = new Date(Date.UTC(year, month - 1, day));

  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return undefined;
  }
  return date;
}

/** Format a Date as `YYYY-MM-DD` in UTC */
export function formatDateString(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/** Source of an edge in the link graph */
export type LinkSourceId =
  | { kind: 'note'; id: string }
  | { kind: 'daily'; date: string };

export function noteSource(id: string): LinkSourceId {
  return { kind: 'note', id };
}

export function dailySource(date: string): LinkSourceId {
  return { kind: 'daily', date };
}

/** Canonical string form: the UUID itself, or `daily:YYYY-MM-DD` */
export function formatLinkSourceId(source: LinkSourceId): string {
  return source.kind === 'note' ? source.id : `${DAILY_ID_PREFIX}${source.date}`;
}

/** Inverse of formatLinkSourceId; undefined for strings of neither form */
export function parseLinkSourceId(value: string): LinkSourceId | undefined {
  if (value.startsWith(DAILY_ID_PREFIX)) {
    const date = value.slice(DAILY_ID_PREFIX.length);
    return parseDateString(date) ? dailySource(date) : undefined;
  }
  return isUuid(value) ? noteSource(value.toLowerCase()) : undefined;
}
