/**
 * Zettelkasten configuration, read from environment variables.
 *
 * WEBDAV_ZK_PATH points at the index note; its directory becomes the notes
 * root and `daily/` below it holds the journal.
 *   https://dav.example.com/org/abc-index.org
 *     -> rootUrl:   https://dav.example.com/org/
 *     -> indexFile: abc-index.org
 */

import { z } from 'zod';
import { ConfigError } from './errors.js';

/** Per-request WebDAV timeout; storage is expected on the same network */
export const DEFAULT_TIMEOUT_MS = 3 * 1000;

/** Background refresh interval */
export const DEFAULT_REFRESH_INTERVAL_MS = 10 * 60 * 1000;

/** Delay before the first background refresh */
export const DEFAULT_STARTUP_DELAY_MS = 5 * 1000;

/** Upper bound for a single refresh cycle */
export const DEFAULT_REFRESH_TIMEOUT_MS = 15 * 60 * 1000;

export interface WebDavCredentials {
  username: string;
  password: string;
}

export interface RefreshSettings {
  intervalMs: number;
  startupDelayMs: number;
  timeoutMs: number;
}

export interface ZkConfig {
  /** Directory URL holding the notes, always ends in `/` */
  rootUrl: string;
  /** `{rootUrl}daily/` */
  dailyUrl: string;
  /** Filename of the index note inside rootUrl */
  indexFile: string;
  /** Raw WEBDAV_HOME_PATH, validated lazily by resolveHomeIndexFile */
  homePath?: string;
  credentials?: WebDavCredentials;
  timeoutMs: number;
  refresh: RefreshSettings;
  /** Public base URL of the site, used to tell internal links from external ones */
  siteBaseUrl?: string;
}

const optionalString = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

function positiveInt(defaultValue: number) {
  return z.preprocess(
    (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
    z.coerce.number().int().positive().default(defaultValue)
  );
}

const EnvSchema = z.object({
  WEBDAV_ZK_PATH: optionalString,
  WEBDAV_HOME_PATH: optionalString,
  WEBDAV_USERNAME: optionalString,
  WEBDAV_PASSWORD: optionalString,
  WEBDAV_TIMEOUT_MS: positiveInt(DEFAULT_TIMEOUT_MS),
  ZK_REFRESH_INTERVAL_MS: positiveInt(DEFAULT_REFRESH_INTERVAL_MS),
  ZK_STARTUP_DELAY_MS: positiveInt(DEFAULT_STARTUP_DELAY_MS),
  ZK_REFRESH_TIMEOUT_MS: positiveInt(DEFAULT_REFRESH_TIMEOUT_MS),
  GROUNDWAVE_BASE_URL: optionalString,
});

export type ZkEnv = Record<string, string | undefined>;

/** A note URL split into its directory and filename */
export interface NoteLocation {
  directoryUrl: string;
  filename: string;
}

/**
 * Split a full note URL into directory URL and `.org` filename.
 * @throws ConfigError for relative or non-http(s) URLs and non-.org targets
 */
export function splitNoteUrl(raw: string, variable: string): NoteLocation {
  let parsed: URL;
  try {
    parsed = new URL(raw);
  } catch (err) {
    throw new ConfigError(`invalid ${variable} URL: ${raw}`, { cause: err });
  }

  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new ConfigError(`${variable} must be an http(s) URL`);
  }

  const slash = parsed.pathname.lastIndexOf('/');
  const filename = decodeURIComponent(parsed.pathname.slice(slash + 1));
  if (!filename) {
    throw new ConfigError(`${variable} must include a filename`);
  }
  if (!filename.endsWith('.org')) {
    throw new ConfigError(`${variable} must point to a .org file`);
  }

  return {
    directoryUrl: `${parsed.origin}${parsed.pathname.slice(0, slash + 1)}`,
    filename,
  };
}

/**
 * Load and validate configuration.
 * @throws ConfigError when WEBDAV_ZK_PATH is missing or malformed, or a numeric setting is invalid
 */
export function loadZkConfig(env: ZkEnv = process.env): ZkConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ConfigError(`invalid ${issue.path.join('.')}: ${issue.message}`);
  }
  const vars = result.data;

  if (!vars.WEBDAV_ZK_PATH) {
    throw new ConfigError('WEBDAV_ZK_PATH not configured');
  }

  const index = splitNoteUrl(vars.WEBDAV_ZK_PATH, 'WEBDAV_ZK_PATH');

  const credentials = vars.WEBDAV_USERNAME && vars.WEBDAV_PASSWORD
    ? { username: vars.WEBDAV_USERNAME, password: vars.WEBDAV_PASSWORD }
    : undefined;

  return {
    rootUrl: index.directoryUrl,
    dailyUrl: `${index.directoryUrl}daily/`,
    indexFile: index.filename,
    homePath: vars.WEBDAV_HOME_PATH,
    credentials,
    timeoutMs: vars.WEBDAV_TIMEOUT_MS,
    refresh: {
      intervalMs: vars.ZK_REFRESH_INTERVAL_MS,
      startupDelayMs: vars.ZK_STARTUP_DELAY_MS,
      timeoutMs: vars.ZK_REFRESH_TIMEOUT_MS,
    },
    siteBaseUrl: vars.GROUNDWAVE_BASE_URL,
  };
}

/**
 * Filename of the home index note.
 * @throws ConfigError when WEBDAV_HOME_PATH is unset, malformed, or not in the notes root
 */
export function resolveHomeIndexFile(config: Pick<ZkConfig, 'homePath' | 'rootUrl'>): string {
  if (!config.homePath) {
    throw new ConfigError('WEBDAV_HOME_PATH not configured');
  }

  const home = splitNoteUrl(config.homePath, 'WEBDAV_HOME_PATH');
  if (home.directoryUrl !== config.rootUrl) {
    throw new ConfigError(
      `WEBDAV_HOME_PATH must be in the same directory as WEBDAV_ZK_PATH (${config.rootUrl})`
    );
  }

  return home.filename;
}
