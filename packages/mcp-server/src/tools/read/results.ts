/**
 * Tool result helpers - JSON text content plus structured content, and
 * `isError` results carrying the error code
 */

import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { ZkError, describeCause } from '@groundwave/zk-core';
import { serverLog } from '../../core/shared/serverLog.js';

export type ToolOutput = Record<string, unknown>;

export function toolResult(output: ToolOutput): CallToolResult {
  return {
    content: [{ type: 'text', text: JSON.stringify(output, null, 2) }],
    structuredContent: output,
  };
}

export function toolError(err: unknown): CallToolResult {
  const code = err instanceof ZkError ? err.code : 'INTERNAL';
  if (code === 'INTERNAL') {
    serverLog('server', `Unexpected tool failure: ${describeCause(err)}`, 'error');
  }
  return {
    content: [{ type: 'text', text: JSON.stringify({ error: describeCause(err), code }) }],
    isError: true,
  };
}

/** Run a tool body, turning thrown errors into `isError` results */
export async function runTool(body: () => Promise<ToolOutput> | ToolOutput): Promise<CallToolResult> {
  try {
    return toolResult(await body());
  } catch (err) {
    return toolError(err);
  }
}

export function isoOrNull(date: Date | null): string | null {
  return date ? date.toISOString() : null;
}
