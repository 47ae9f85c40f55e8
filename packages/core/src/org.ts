/**
 * Org-mode parser - extracts note ids, titles, access flags, dates and links
 *
 * These functions never fail on ill-formed Org; absent values fall back
 * to defaults.
 */

import { isUuid, parseDateString } from './ids.js';

/** Title used when a note has neither `#+TITLE:` nor a headline */
export const UNTITLED_NOTE = 'Untitled Note';

const ID_PROPERTY_REGEX = /^:ID:\s+(\S+)\s*$/i;

const TITLE_REGEX = /^\s*#\+TITLE:\s+(.+)$/i;

const HEADLINE_REGEX = /^\*+\s+(.+)$/;

const PUBLIC_ACCESS_REGEX = /^\s*#\+access:\s*public\s*$/im;

const HOME_ACCESS_REGEX = /^\s*#\+access:\s*home\s*$/im;

const DATE_DIRECTIVE_REGEX = /^\s*#\+DATE:\s*<?(\d{4}-\d{2}-\d{2})/im;

/** `[[id:uuid]]` or `[[id:uuid][title]]` */
const ID_LINK_REGEX = /\[\[id:([0-9a-fA-F-]+)\](?:\[[^\]]*\])?\]/g;

const UUID_PATTERN = '[0-9a-fA-F]{8}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{12}';

/**
 * The `:ID:` property of the first property drawer that has one.
 * Returns undefined when no drawer carries a UUID id.
 */
export function extractId(body: string): string | undefined {
  let inDrawer = false;

  for (const line of body.split('\n')) {
    const trimmed = line.trim();

    if (!inDrawer) {
      if (trimmed.toUpperCase() === ':PROPERTIES:') {
        inDrawer = true;
      }
      continue;
    }

    if (trimmed.toUpperCase() === ':END:') {
      inDrawer = false;
      continue;
    }

    const match = ID_PROPERTY_REGEX.exec(trimmed);
    if (match && isUuid(match[1])) {
      return match[1].toLowerCase();
    }
  }

  return undefined;
}

/**
 * Value of the first `#+TITLE:` directive, else the first headline,
 * else "Untitled Note".
 */
export function extractTitle(body: string): string {
  const lines = body.split('\n');

  for (const line of lines) {
    const match = TITLE_REGEX.exec(line);
    if (match) {
      const title = match[1].trim();
      if (title) return title;
    }
  }

  for (const line of lines) {
    const match = HEADLINE_REGEX.exec(line);
    if (match) {
      const title = match[1].trim();
      if (title) return title;
    }
  }

  return UNTITLED_NOTE;
}

/** True iff some line reads `#+access: public` (case-insensitive, trimmed) */
export function isPublic(body: string): boolean {
  return PUBLIC_ACCESS_REGEX.test(body);
}

/** True iff some line reads `#+access: home` */
export function isHome(body: string): boolean {
  return HOME_ACCESS_REGEX.test(body);
}

/** Calendar date of the first `#+DATE:` directive, if it parses as YYYY-MM-DD */
export function extractDateOverride(body: string): Date | undefined {
  const match = DATE_DIRECTIVE_REGEX.exec(body);
  return match ? parseDateString(match[1]) : undefined;
}

/**
 * Targets of all `[[id:...]]` links, in order of appearance.
 * Duplicates are kept; non-UUID targets are dropped.
 */
export function extractLinks(body: string): string[] {
  const targets: string[] = [];
  for (const match of body.matchAll(ID_LINK_REGEX)) {
    if (isUuid(match[1])) {
      targets.push(match[1].toLowerCase());
    }
  }
  return targets;
}

function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Build the matchers for links into the contact book.
 *
 * Recognised forms: `contact:<uuid>`, `/contact/<uuid>`, and, when the site
 * base URL is known, `{basePath}/contact/<uuid>` and
 * `http(s)://{host}{basePath}/contact/<uuid>`.
 */
export function buildContactLinkMatchers(siteBaseUrl?: string): RegExp[] {
  const matchers = [
    new RegExp(`(?:^|[^\\w/-])contact:(${UUID_PATTERN})`, 'g'),
    new RegExp(`(?:^|[\\s\\[("'<])/contact/(${UUID_PATTERN})`, 'g'),
  ];

  const trimmed = siteBaseUrl?.trim().replace(/\/+$/, '');
  if (!trimmed) return matchers;

  let host: string;
  let basePath: string;
  try {
    const parsed = new URL(/^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`);
    host = parsed.host;
    basePath = parsed.pathname.replace(/\/+$/, '');
  } catch {
    return matchers;
  }

  const hostPattern = escapeRegex(host);
  const pathPattern = escapeRegex(basePath);
  matchers.push(new RegExp(`https?://${hostPattern}${pathPattern}/contact/(${UUID_PATTERN})`, 'gi'));
  if (basePath) {
    matchers.push(new RegExp(`(?:^|[\\s\\[("'<])${pathPattern}/contact/(${UUID_PATTERN})`, 'g'));
  }

  return matchers;
}

/** Unique, lower-cased contact ids referenced from a body, in order of first appearance */
export function extractContactLinks(body: string, matchers: RegExp[]): string[] {
  const found: Array<{ index: number; id: string }> = [];
  for (const matcher of matchers) {
    for (const match of body.matchAll(matcher)) {
      found.push({ index: match.index ?? 0, id: match[1].toLowerCase() });
    }
  }

  found.sort((a, b) => a.index - b.index);

  const seen = new Set<string>();
  const ids: string[] = [];
  for (const { id } of found) {
    if (!seen.has(id)) {
      seen.add(id);
      ids.push(id);
    }
  }
  return ids;
}

export interface JournalPreview {
  preview: string;
  hasMore: boolean;
}

/**
 * Leading paragraphs of a journal body.
 *
 * Skips the property drawer, `#+TITLE:` lines and headlines. Paragraphs are
 * runs of non-blank lines; at most `maxParagraphs` are kept and the joined
 * text is cut at `maxChars`. `hasMore` reports that something was dropped.
 */
export function buildJournalPreview(body: string, maxParagraphs: number, maxChars: number): JournalPreview {
  const paragraphs: string[] = [];
  let current: string[] = [];
  let inProperties = false;

  const closeParagraph = () => {
    if (current.length > 0) {
      paragraphs.push(current.join('\n'));
      current = [];
    }
  };

  for (const line of body.split('\n')) {
    const trimmed = line.trim();
    const upper = trimmed.toUpperCase();

    if (upper === ':PROPERTIES:') {
      inProperties = true;
      continue;
    }
    if (inProperties) {
      if (upper === ':END:') inProperties = false;
      continue;
    }
    if (upper.startsWith('#+TITLE:')) continue;
    if (HEADLINE_REGEX.test(line)) continue;

    if (trimmed === '') {
      closeParagraph();
      continue;
    }

    current.push(line);
  }
  closeParagraph();

  let hasMore = false;
  let kept = paragraphs;
  if (kept.length > maxParagraphs) {
    kept = kept.slice(0, maxParagraphs);
    hasMore = true;
  }

  let preview = kept.join('\n\n').trim();
  if (preview === '') {
    return { preview: '', hasMore: false };
  }

  // measured in code points so a surrogate pair is never split
  const chars = Array.from(preview);
  if (chars.length > maxChars) {
    preview = chars.slice(0, maxChars).join('').trim();
    hasMore = true;
  }

  return { preview, hasMore };
}
