/**
 * Test helper to create a configured MCP server for testing
 *
 * The server runs against a MemoryOrigin; the client talks to it over the
 * SDK's in-memory transport pair.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { CallToolResultSchema } from '@modelcontextprotocol/sdk/types.js';
import { ZettelCache } from '../../../src/core/read/cache.js';
import { ZettelNotes } from '../../../src/core/read/notes.js';
import { registerGraphTools } from '../../../src/tools/read/graph.js';
import { registerNoteTools } from '../../../src/tools/read/notes.js';
import { registerPeriodicTools } from '../../../src/tools/read/periodic.js';
import { registerSystemTools } from '../../../src/tools/read/system.js';
import { ROOT_URL, type MemoryOrigin } from './memoryOrigin.js';

export interface TestServerContext {
  server: McpServer;
  client: Client;
  cache: ZettelCache;
  notes: ZettelNotes;
  origin: MemoryOrigin;
}

export interface ToolCallOutcome {
  isError: boolean;
  /** Parsed JSON of the first text content item */
  data: unknown;
  structured: unknown;
}

/**
 * Creates a fully configured MCP server and a connected client
 */
export async function createTestServer(
  origin: MemoryOrigin,
  options: { homePath?: string; refreshIntervalMs?: number } = {}
): Promise<TestServerContext> {
  const cache = new ZettelCache({ origin, indexFile: 'index.org' });
  const notes = new ZettelNotes({
    origin,
    cache,
    config: { rootUrl: ROOT_URL, indexFile: 'index.org', homePath: options.homePath },
  });

  const server = new McpServer({
    name: 'groundwave-zk-test',
    version: '1.0.0-test',
  });

  registerGraphTools(server, () => cache, () => notes);
  registerNoteTools(server, () => notes);
  registerPeriodicTools(server, () => cache);
  registerSystemTools(server, () => cache, { refreshIntervalMs: options.refreshIntervalMs });

  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  const client = new Client({ name: 'groundwave-zk-test-client', version: '1.0.0-test' });
  await Promise.all([
    server.connect(serverTransport),
    client.connect(clientTransport),
  ]);

  return { server, client, cache, notes, origin };
}

/**
 * Call a tool and decode its JSON text content
 */
export async function callTool(
  client: Client,
  name: string,
  args: Record<string, unknown> = {}
): Promise<ToolCallOutcome> {
  const result = CallToolResultSchema.parse(await client.callTool({ name, arguments: args }));
  const first = result.content[0];
  if (first?.type !== 'text') {
    throw new Error(`Tool ${name} returned no text content`);
  }
  return {
    isError: result.isError === true,
    data: JSON.parse(first.text),
    structured: result.structuredContent,
  };
}
