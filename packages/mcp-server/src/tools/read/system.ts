/**
 * System tools - refresh, health and the activity log
 */

import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { DEFAULT_REFRESH_INTERVAL_MS } from '@groundwave/zk-core';
import type { BuildOutcome, SnapshotStatus, ZettelCache } from '../../core/read/cache.js';
import type { BuildStats } from '../../core/read/types.js';
import { LOG_COMPONENTS, getServerLog } from '../../core/shared/serverLog.js';
import { isoOrNull, runTool } from './results.js';

export interface SystemToolOptions {
  /** Configured refresh interval; a snapshot older than two intervals is stale */
  refreshIntervalMs?: number;
}

const OutcomeSchema = z.object({
  status: z.enum(['ok', 'failed']),
  processed: z.number().optional(),
  skipped: z.number().optional(),
  error: z.string().optional(),
});

const SnapshotSchema = z.object({
  built_at: z.string().nullable().describe('null = never built'),
  age_seconds: z.number().nullable(),
  stale: z.boolean(),
  processed: z.number().nullable(),
  skipped: z.number().nullable(),
  last_error: z.string().nullable(),
});

function toOutcomeOutput(outcome: BuildOutcome) {
  return outcome.status === 'ok'
    ? { status: outcome.status, processed: outcome.stats.processed, skipped: outcome.stats.skipped }
    : { status: outcome.status, error: outcome.error };
}

function toSnapshotOutput(snapshot: SnapshotStatus<BuildStats>, now: number, staleAfterMs: number) {
  const age = snapshot.builtAt ? now - snapshot.builtAt.getTime() : null;
  return {
    built_at: isoOrNull(snapshot.builtAt),
    age_seconds: age === null ? null : Math.floor(age / 1000),
    stale: age === null || age > staleAfterMs,
    processed: snapshot.stats?.processed ?? null,
    skipped: snapshot.stats?.skipped ?? null,
    last_error: snapshot.lastError,
  };
}

/**
 * Register system tools with the MCP server
 */
export function registerSystemTools(
  server: McpServer,
  getCache: () => ZettelCache,
  options: SystemToolOptions = {}
): void {
  const staleAfterMs = 2 * (options.refreshIntervalMs ?? DEFAULT_REFRESH_INTERVAL_MS);

  // refresh_index - Rebuild every cache without waiting for the worker
  server.registerTool(
    'refresh_index',
    {
      title: 'Refresh Index',
      description:
        'Rebuild the link, journal and timeline caches from WebDAV now. Joins a refresh that is already running.',
      inputSchema: {},
      outputSchema: {
        links: OutcomeSchema,
        journal: OutcomeSchema,
        timeline: OutcomeSchema,
        duration_ms: z.number(),
      },
    },
    async () => runTool(async () => {
      const result = await getCache().refresh();
      return {
        links: toOutcomeOutput(result.links),
        journal: toOutcomeOutput(result.journal),
        timeline: toOutcomeOutput(result.timeline),
        duration_ms: result.durationMs,
      };
    })
  );

  // health_check - cache freshness
  server.registerTool(
    'health_check',
    {
      title: 'Health Check',
      description: 'Report when each cache was last built, its counts and any build error.',
      inputSchema: {},
      outputSchema: {
        status: z.enum(['healthy', 'degraded', 'unhealthy']).describe('unhealthy = no link index yet'),
        refreshing: z.boolean(),
        links: SnapshotSchema.extend({ targets: z.number().nullable() }),
        journal: SnapshotSchema,
        timeline: SnapshotSchema,
        resolver_size: z.number().describe('Cached id -> filename mappings'),
      },
    },
    async () => runTool(() => {
      const cache = getCache();
      const status = cache.status();
      const now = Date.now();

      const links = toSnapshotOutput(status.links, now, staleAfterMs);
      const journal = toSnapshotOutput(status.journal, now, staleAfterMs);
      const timeline = toSnapshotOutput(status.timeline, now, staleAfterMs);
      const snapshots = [links, journal, timeline];

      let health: 'healthy' | 'degraded' | 'unhealthy' = 'healthy';
      if (links.built_at === null) {
        health = 'unhealthy';
      } else if (snapshots.some((s) => s.stale || s.last_error !== null)) {
        health = 'degraded';
      }

      return {
        status: health,
        refreshing: status.refreshing,
        links: { ...links, targets: status.links.stats?.targets ?? null },
        journal,
        timeline,
        resolver_size: cache.resolver.size,
      };
    })
  );

  // server_log - recent activity
  server.registerTool(
    'server_log',
    {
      title: 'Server Log',
      description: 'Recent server activity: refresh cycles, build summaries, skipped files.',
      inputSchema: {
        since: z.coerce.number().optional().describe('Only entries after this epoch-ms timestamp'),
        component: z.enum(LOG_COMPONENTS).optional().describe('Filter by component'),
        level: z.enum(['info', 'warn', 'error']).optional().describe('Filter by level'),
        limit: z.coerce.number().default(100).describe('Maximum number of entries'),
      },
      outputSchema: {
        entries: z.array(z.object({
          ts: z.number(),
          component: z.string(),
          message: z.string(),
          level: z.string(),
        })),
        server_uptime_ms: z.number(),
      },
    },
    async ({ since, component, level, limit }) => runTool(() => getServerLog({ since, component, level, limit }))
  );
}
