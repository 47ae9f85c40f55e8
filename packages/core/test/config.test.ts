/**
 * Tests for environment configuration
 */

import { describe, it, expect } from 'vitest';
import {
  DEFAULT_REFRESH_INTERVAL_MS,
  DEFAULT_REFRESH_TIMEOUT_MS,
  DEFAULT_STARTUP_DELAY_MS,
  DEFAULT_TIMEOUT_MS,
  loadZkConfig,
  resolveHomeIndexFile,
  splitNoteUrl,
} from '../src/config.js';
import { ConfigError } from '../src/errors.js';

const ZK_PATH = 'https://dav.example.com/org/abc-index.org';

describe('loadZkConfig', () => {
  it('derives root and daily URLs from the index note URL', () => {
    const config = loadZkConfig({ WEBDAV_ZK_PATH: ZK_PATH });

    expect(config.rootUrl).toBe('https://dav.example.com/org/');
    expect(config.dailyUrl).toBe('https://dav.example.com/org/daily/');
    expect(config.indexFile).toBe('abc-index.org');
    expect(config.credentials).toBeUndefined();
    expect(config.homePath).toBeUndefined();
    expect(config.siteBaseUrl).toBeUndefined();
  });

  it('applies defaults for numeric settings', () => {
    const config = loadZkConfig({ WEBDAV_ZK_PATH: ZK_PATH, WEBDAV_TIMEOUT_MS: '' });

    expect(config.timeoutMs).toBe(DEFAULT_TIMEOUT_MS);
    expect(config.refresh).toEqual({
      intervalMs: DEFAULT_REFRESH_INTERVAL_MS,
      startupDelayMs: DEFAULT_STARTUP_DELAY_MS,
      timeoutMs: DEFAULT_REFRESH_TIMEOUT_MS,
    });
    expect(DEFAULT_TIMEOUT_MS).toBe(3000);
    expect(DEFAULT_REFRESH_INTERVAL_MS).toBe(600000);
  });

  it('reads numeric overrides', () => {
    const config = loadZkConfig({
      WEBDAV_ZK_PATH: ZK_PATH,
      WEBDAV_TIMEOUT_MS: '1500',
      ZK_REFRESH_INTERVAL_MS: '60000',
      ZK_STARTUP_DELAY_MS: '10',
      ZK_REFRESH_TIMEOUT_MS: '120000',
    });

    expect(config.timeoutMs).toBe(1500);
    expect(config.refresh).toEqual({ intervalMs: 60000, startupDelayMs: 10, timeoutMs: 120000 });
  });

  it('rejects non-numeric and non-positive values', () => {
    expect(() => loadZkConfig({ WEBDAV_ZK_PATH: ZK_PATH, WEBDAV_TIMEOUT_MS: 'abc' }))
      .toThrow(/^invalid WEBDAV_TIMEOUT_MS: /);
    expect(() => loadZkConfig({ WEBDAV_ZK_PATH: ZK_PATH, ZK_REFRESH_INTERVAL_MS: '0' }))
      .toThrow(ConfigError);
  });

  it('sets credentials only when both parts are present', () => {
    expect(loadZkConfig({ WEBDAV_ZK_PATH: ZK_PATH, WEBDAV_USERNAME: 'reader' }).credentials)
      .toBeUndefined();
    expect(loadZkConfig({
      WEBDAV_ZK_PATH: ZK_PATH,
      WEBDAV_USERNAME: 'reader',
      WEBDAV_PASSWORD: 'test-secret',
    }).credentials).toEqual({ username: 'reader', password: 'test-secret' });
  });

  it('fails when WEBDAV_ZK_PATH is missing or blank', () => {
    expect(() => loadZkConfig({})).toThrow('WEBDAV_ZK_PATH not configured');
    expect(() => loadZkConfig({ WEBDAV_ZK_PATH: '   ' })).toThrow(ConfigError);
  });

  it('fails when WEBDAV_ZK_PATH is not a .org URL', () => {
    expect(() => loadZkConfig({ WEBDAV_ZK_PATH: 'https://dav.example.com/org/' }))
      .toThrow('WEBDAV_ZK_PATH must include a filename');
    expect(() => loadZkConfig({ WEBDAV_ZK_PATH: 'https://dav.example.com/org/index.md' }))
      .toThrow('WEBDAV_ZK_PATH must point to a .org file');
    expect(() => loadZkConfig({ WEBDAV_ZK_PATH: 'ftp://dav.example.com/org/index.org' }))
      .toThrow('WEBDAV_ZK_PATH must be an http(s) URL');
    expect(() => loadZkConfig({ WEBDAV_ZK_PATH: 'org/index.org' }))
      .toThrow(ConfigError);
  });
});

describe('splitNoteUrl', () => {
  it('decodes the filename', () => {
    expect(splitNoteUrl('https://dav.example.com/my%20notes/home%20page.org', 'X')).toEqual({
      directoryUrl: 'https://dav.example.com/my%20notes/',
      filename: 'home page.org',
    });
  });
});

describe('resolveHomeIndexFile', () => {
  it('returns the home filename when it shares the notes root', () => {
    const config = loadZkConfig({
      WEBDAV_ZK_PATH: ZK_PATH,
      WEBDAV_HOME_PATH: 'https://dav.example.com/org/home.org',
    });
    expect(resolveHomeIndexFile(config)).toBe('home.org');
  });

  it('rejects a home note in another directory', () => {
    const config = loadZkConfig({
      WEBDAV_ZK_PATH: 'https://dav.example.com/zk/index.org',
      WEBDAV_HOME_PATH: 'https://dav.example.com/other/home.org',
    });
    expect(() => resolveHomeIndexFile(config)).toThrow(ConfigError);
    expect(() => resolveHomeIndexFile(config)).toThrow(
      'WEBDAV_HOME_PATH must be in the same directory as WEBDAV_ZK_PATH (https://dav.example.com/zk/)'
    );
  });

  it('fails when WEBDAV_HOME_PATH is unset', () => {
    const config = loadZkConfig({ WEBDAV_ZK_PATH: ZK_PATH });
    expect(() => resolveHomeIndexFile(config)).toThrow('WEBDAV_HOME_PATH not configured');
  });
});
