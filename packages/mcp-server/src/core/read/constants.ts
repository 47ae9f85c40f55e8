/**
 * Shared constants for the zettelkasten cache
 */

/** Concurrent body fetches per batch during a build */
export const FETCH_CONCURRENCY = 8;

/** Journal preview: leading paragraphs kept */
export const PREVIEW_MAX_PARAGRAPHS = 2;

/** Journal preview: character cap after joining paragraphs */
export const PREVIEW_MAX_CHARS = 480;

/** Base path of the externally-facing note route; enables restricted-link marking */
export const PUBLIC_NOTE_BASE_PATH = '/note';

/** Base path used when rendering the home index note */
export const HOME_BASE_PATH = '/home';

/** Route prefix for journal entries in backlink lists */
export const JOURNAL_BASE_PATH = '/journal';

/** CSS class added to links whose target is not public */
export const RESTRICTED_LINK_CLASS = 'restricted-link';

/** Daily note filename, `YYYY-MM-DD.org` */
export const DAILY_FILE_REGEX = /^(\d{4}-\d{2}-\d{2})\.org$/;

/** Timestamped zettel filename, `YYYYMMDDHHMMSS-slug.org` */
export const TIMELINE_FILE_REGEX = /^(\d{4})(\d{2})(\d{2})(\d{2})(\d{2})(\d{2})-.*\.org$/;

/** Maximum results per tool request */
export const MAX_LIMIT = 200;
