/**
 * Server Activity Log - in-memory ring buffer for startup/runtime diagnostics
 *
 * Appends to buffer AND writes to console.error (stdout belongs to the MCP
 * stdio transport). The buffer is queryable via the `server_log` MCP tool.
 */

export type LogLevel = 'info' | 'warn' | 'error';

export const LOG_COMPONENTS = [
  'server', 'config', 'resolver',
  'links', 'journal', 'timeline', 'refresh', 'notes',
] as const;

export type LogComponent = typeof LOG_COMPONENTS[number];

export interface LogEntry {
  ts: number;
  component: LogComponent;
  message: string;
  level: LogLevel;
}

const MAX_ENTRIES = 200;
const buffer: LogEntry[] = [];
const serverStartTs = Date.now();

/**
 * Log a message to the ring buffer and stderr.
 */
export function serverLog(component: LogComponent, message: string, level: LogLevel = 'info'): void {
  const entry: LogEntry = {
    ts: Date.now(),
    component,
    message,
    level,
  };

  buffer.push(entry);
  if (buffer.length > MAX_ENTRIES) {
    buffer.shift();
  }

  const prefix = level === 'error' ? '[Groundwave] ERROR' : level === 'warn' ? '[Groundwave] WARN' : '[Groundwave]';
  console.error(`${prefix} [${component}] ${message}`);
}

/**
 * Query the log buffer with optional filters.
 */
export function getServerLog(options: {
  since?: number;
  component?: LogComponent;
  level?: LogLevel;
  limit?: number;
} = {}): { entries: LogEntry[]; server_uptime_ms: number } {
  const { since, component, level, limit = 100 } = options;

  let entries = buffer;

  if (since) {
    entries = entries.filter(e => e.ts > since);
  }

  if (component) {
    entries = entries.filter(e => e.component === component);
  }

  if (level) {
    entries = entries.filter(e => e.level === level);
  }

  // Most recent entries (tail of buffer)
  entries = entries.slice(-limit);

  return {
    entries,
    server_uptime_ms: Date.now() - serverStartTs,
  };
}
