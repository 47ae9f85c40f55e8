/**
 * Error taxonomy shared by every zettelkasten component.
 *
 * Each error carries a stable `code` so adapters (the MCP tools, a future
 * HTTP layer) can map failures without string matching.
 */

export type ZkErrorCode =
  | 'CONFIG'
  | 'UUID_INVALID'
  | 'DATE_INVALID'
  | 'REMOTE_FETCH'
  | 'RENDER'
  | 'NOT_FOUND'
  | 'BUILD'
  | 'INDEX_NOT_READY';

export class ZkError extends Error {
  readonly code: ZkErrorCode;

  constructor(code: ZkErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Missing or malformed configuration */
export class ConfigError extends ZkError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONFIG', message, options);
  }
}

/** A caller passed an identifier that is not a UUID */
export class UuidInvalidError extends ZkError {
  readonly id: string;

  constructor(id: string) {
    super('UUID_INVALID', `Invalid note id: ${JSON.stringify(id)}`);
    this.id = id;
  }
}

/** A caller passed a date that is not a valid `YYYY-MM-DD` calendar date */
export class DateInvalidError extends ZkError {
  readonly value: string;

  constructor(value: string) {
    super('DATE_INVALID', `Invalid date: ${JSON.stringify(value)} (expected YYYY-MM-DD)`);
    this.value = value;
  }
}

/**
 * A WebDAV request failed.
 *
 * `status` is set when the server answered; `transient` marks timeouts,
 * aborts and transport failures that a later attempt may not hit.
 */
export class RemoteFetchError extends ZkError {
  readonly url: string;
  readonly status?: number;
  readonly transient: boolean;

  constructor(url: string, detail: { status?: number; cause?: unknown }) {
    const reason = detail.status !== undefined
      ? `HTTP ${detail.status}`
      : describeCause(detail.cause);
    super('REMOTE_FETCH', `WebDAV request failed for ${url}: ${reason}`, { cause: detail.cause });
    this.url = url;
    this.status = detail.status;
    this.transient = detail.status === undefined;
  }
}

/** Org to HTML conversion failed */
export class RenderError extends ZkError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('RENDER', message, options);
  }
}

/** No note carries the requested id in the current directory listing */
export class NoteNotFoundError extends ZkError {
  readonly id: string;

  constructor(id: string, scanned?: number) {
    const suffix = scanned !== undefined ? ` (scanned ${scanned} files)` : '';
    super('NOT_FOUND', `Note with id ${id} not found${suffix}`);
    this.id = id;
  }
}

export type BuilderName = 'links' | 'journal' | 'timeline';

/** A cache build failed before any file was processed */
export class BuildError extends ZkError {
  readonly builder: BuilderName;

  constructor(builder: BuilderName, cause: unknown) {
    super('BUILD', `Failed to build ${builder} index: ${describeCause(cause)}`, { cause });
    this.builder = builder;
  }
}

/** A query needs an index that has not been built yet */
export class IndexNotReadyError extends ZkError {
  constructor(message: string) {
    super('INDEX_NOT_READY', message);
  }
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return String(cause);
}
