#!/usr/bin/env node
/**
 * Groundwave zettelkasten server - read-only link graph, journal and
 * timeline caches over a WebDAV Org-mode notes directory, exposed as MCP tools
 *
 * Tools:
 * - graph: get_backlinks, get_forward_links, get_contact_links
 * - notes: get_note, get_index_note, get_home_note, list_notes, get_chat_note
 * - periodic: get_journal, get_timeline
 * - system: refresh_index, health_check, server_log
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { createWebDavOrigin, describeCause, loadZkConfig } from '@groundwave/zk-core';

import { ZettelCache } from './core/read/cache.js';
import { ZettelNotes } from './core/read/notes.js';
import { startRefreshWorker } from './core/read/refresh.js';
import { serverLog } from './core/shared/serverLog.js';

import { registerGraphTools } from './tools/read/graph.js';
import { registerNoteTools } from './tools/read/notes.js';
import { registerPeriodicTools } from './tools/read/periodic.js';
import { registerSystemTools } from './tools/read/system.js';

async function main() {
  serverLog('server', 'Starting Groundwave zettelkasten server...');

  const config = loadZkConfig();
  serverLog('config', `Notes root: ${config.rootUrl} (index ${config.indexFile})`);
  serverLog('config', `Basic auth ${config.credentials ? 'enabled' : 'disabled'}, request timeout ${config.timeoutMs}ms`);
  if (config.homePath) {
    serverLog('config', `Home index: ${config.homePath}`);
  }

  const origin = createWebDavOrigin(config);
  const cache = new ZettelCache({
    origin,
    indexFile: config.indexFile,
    siteBaseUrl: config.siteBaseUrl,
  });
  const notes = new ZettelNotes({ origin, cache, config });

  const server = new McpServer({
    name: 'groundwave-zk',
    version: '0.1.0',
  });

  registerGraphTools(server, () => cache, () => notes);
  registerNoteTools(server, () => notes);
  registerPeriodicTools(server, () => cache);
  registerSystemTools(server, () => cache, { refreshIntervalMs: config.refresh.intervalMs });

  const transport = new StdioServerTransport();
  await server.connect(transport);
  serverLog('server', 'MCP server connected');

  const worker = startRefreshWorker(cache, config.refresh);

  const shutdown = (signal: NodeJS.Signals) => {
    serverLog('server', `Received ${signal}, shutting down`);
    void worker.stop()
      .then(() => server.close())
      .then(
        () => process.exit(0),
        (err: unknown) => {
          serverLog('server', `Shutdown failed: ${describeCause(err)}`, 'error');
          process.exit(1);
        }
      );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

main().catch((error) => {
  console.error('[Groundwave] Fatal error:', error);
  process.exit(1);
});
