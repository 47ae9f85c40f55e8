/**
 * Link graph tools - backlinks, forward links and contact mentions
 */

import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { UuidInvalidError, assertUuid, formatLinkSourceId, parseLinkSourceId } from '@groundwave/zk-core';
import type { ZettelCache } from '../../core/read/cache.js';
import type { ZettelNotes } from '../../core/read/notes.js';
import { requireLinkIndex } from '../../core/read/indexGuard.js';
import { isoOrNull, runTool } from './results.js';

const BacklinkItemSchema = z.object({
  id: z.string().describe('Note UUID or daily:YYYY-MM-DD'),
  title: z.string().describe('Title of the linking note or journal entry'),
  url: z.string().describe('Site path of the linking note'),
});

const GetBacklinksOutputSchema = {
  id: z.string().describe('The target note id'),
  backlink_count: z.number().describe('Number of sources linking to the note'),
  source_ids: z.array(z.string()).describe('Canonical ids of every linking source'),
  backlinks: z.array(BacklinkItemSchema).optional().describe('Titled links, filtered by visibility'),
  built_at: z.string().nullable().describe('When the link index was built'),
};

const GetForwardLinksOutputSchema = {
  id: z.string().describe('The source id'),
  forward_link_count: z.number().describe('Number of distinct targets'),
  forward_links: z.array(z.string()).describe('Sorted target note ids'),
  built_at: z.string().nullable().describe('When the link index was built'),
};

const GetContactLinksOutputSchema = {
  contact_id: z.string().describe('The contact UUID'),
  source_ids: z.array(z.string()).describe('Notes and daily entries mentioning the contact'),
  built_at: z.string().nullable().describe('When the link index was built'),
};

/**
 * Register link graph tools with the MCP server
 */
export function registerGraphTools(
  server: McpServer,
  getCache: () => ZettelCache,
  getNotes: () => ZettelNotes
): void {
  // get_backlinks - What links TO this note?
  server.registerTool(
    'get_backlinks',
    {
      title: 'Get Backlinks',
      description:
        'Get every note and daily entry that links TO the given note. Daily sources appear as daily:YYYY-MM-DD.',
      inputSchema: {
        id: z.string().describe('Note UUID'),
        describe: z.boolean().default(true).describe('Fetch titles and URLs of the linking notes'),
        base_path: z.string().default('/zk').describe('Route prefix for note URLs'),
        visibility: z.enum(['all', 'public', 'home-or-public']).default('all')
          .describe('Which linking notes to describe'),
      },
      outputSchema: GetBacklinksOutputSchema,
    },
    async ({ id, describe, base_path, visibility }) => runTool(async () => {
      const cache = getCache();
      const target = assertUuid(id);
      requireLinkIndex(cache);

      const sourceIds = cache.getBacklinks(target);
      const backlinks = describe
        ? await getNotes().describeBacklinks(target, { basePath: base_path, visibility })
        : undefined;

      return {
        id: target,
        backlink_count: sourceIds.length,
        source_ids: sourceIds,
        ...(backlinks ? { backlinks } : {}),
        built_at: isoOrNull(cache.lastLinkBuildAt()),
      };
    })
  );

  // get_forward_links - What does this note link TO?
  server.registerTool(
    'get_forward_links',
    {
      title: 'Get Forward Links',
      description: 'Get the sorted, distinct notes that a note or daily entry links TO.',
      inputSchema: {
        id: z.string().describe('Note UUID or daily:YYYY-MM-DD'),
      },
      outputSchema: GetForwardLinksOutputSchema,
    },
    async ({ id }) => runTool(() => {
      const cache = getCache();
      const source = parseLinkSourceId(id.trim().toLowerCase());
      if (!source) {
        throw new UuidInvalidError(id);
      }
      requireLinkIndex(cache);

      const canonical = formatLinkSourceId(source);
      const forwardLinks = cache.getForwardLinks(canonical);
      return {
        id: canonical,
        forward_link_count: forwardLinks.length,
        forward_links: forwardLinks,
        built_at: isoOrNull(cache.lastLinkBuildAt()),
      };
    })
  );

  // get_contact_links - Which notes mention this contact?
  server.registerTool(
    'get_contact_links',
    {
      title: 'Get Contact Links',
      description: 'Get the notes and daily entries that link to a contact (contact:<uuid> or /contact/<uuid>).',
      inputSchema: {
        contact_id: z.string().describe('Contact UUID'),
      },
      outputSchema: GetContactLinksOutputSchema,
    },
    async ({ contact_id }) => runTool(() => {
      const cache = getCache();
      const contactId = assertUuid(contact_id);
      requireLinkIndex(cache);

      return {
        contact_id: contactId,
        source_ids: cache.getContactLinks(contactId),
        built_at: isoOrNull(cache.lastLinkBuildAt()),
      };
    })
  );
}
