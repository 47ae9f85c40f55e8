/**
 * Note tools - rendered notes, index notes, note list and raw bodies
 */

import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ZettelNotes } from '../../core/read/notes.js';
import type { Note } from '../../core/read/types.js';
import { MAX_LIMIT } from '../../core/read/constants.js';
import { runTool } from './results.js';

const NoteOutputSchema = {
  id: z.string().describe('Note UUID (empty for an index note without :ID:)'),
  title: z.string(),
  filename: z.string(),
  is_public: z.boolean().describe('Whether the note has #+access: public'),
  is_home: z.boolean().describe('Whether the note has #+access: home'),
  html_body: z.string().describe('Rendered HTML'),
};

type NoteOutput = {
  id: string;
  title: string;
  filename: string;
  is_public: boolean;
  is_home: boolean;
  html_body: string;
};

function toNoteOutput(note: Note): NoteOutput {
  return {
    id: note.id,
    title: note.title,
    filename: note.filename,
    is_public: note.isPublic,
    is_home: note.isHome,
    html_body: note.htmlBody,
  };
}

const basePathInput = z.string().default('/zk')
  .describe('Route prefix for note links; "/note" marks links to non-public notes');

/**
 * Register note tools with the MCP server
 */
export function registerNoteTools(server: McpServer, getNotes: () => ZettelNotes): void {
  server.registerTool(
    'get_note',
    {
      title: 'Get Note',
      description: 'Render a note by UUID to HTML. id: links become <base_path>/<uuid>.',
      inputSchema: {
        id: z.string().describe('Note UUID'),
        base_path: basePathInput,
      },
      outputSchema: NoteOutputSchema,
    },
    async ({ id, base_path }) => runTool(async () => toNoteOutput(await getNotes().renderNote(id, base_path)))
  );

  server.registerTool(
    'get_index_note',
    {
      title: 'Get Index Note',
      description: 'Render the configured zettelkasten index note (WEBDAV_ZK_PATH).',
      inputSchema: {
        base_path: basePathInput,
      },
      outputSchema: NoteOutputSchema,
    },
    async ({ base_path }) => runTool(async () => toNoteOutput(await getNotes().renderIndexNote(base_path)))
  );

  server.registerTool(
    'get_home_note',
    {
      title: 'Get Home Note',
      description: 'Render the home index note (WEBDAV_HOME_PATH) with links under /home.',
      inputSchema: {},
      outputSchema: NoteOutputSchema,
    },
    async () => runTool(async () => toNoteOutput(await getNotes().renderHomeIndexNote()))
  );

  server.registerTool(
    'list_notes',
    {
      title: 'List Notes',
      description: 'List every note with an id in the notes root, sorted by title.',
      inputSchema: {
        limit: z.coerce.number().default(MAX_LIMIT).describe('Maximum number of notes to return'),
        offset: z.coerce.number().default(0).describe('Number of notes to skip (for pagination)'),
      },
      outputSchema: {
        total: z.number().describe('Number of notes found'),
        returned_count: z.number().describe('Number of notes returned'),
        notes: z.array(z.object({
          id: z.string(),
          title: z.string(),
          is_public: z.boolean(),
        })),
      },
    },
    async ({ limit: requestedLimit, offset }) => runTool(async () => {
      const limit = Math.min(requestedLimit, MAX_LIMIT);
      const all = await getNotes().listNotes();
      const notes = all.slice(offset, offset + limit).map((note) => ({
        id: note.id,
        title: note.title,
        is_public: note.isPublic,
      }));
      return { total: all.length, returned_count: notes.length, notes };
    })
  );

  server.registerTool(
    'get_chat_note',
    {
      title: 'Get Chat Note',
      description: 'Get the raw Org body of a note, for use as conversation context.',
      inputSchema: {
        id: z.string().describe('Note UUID'),
      },
      outputSchema: {
        id: z.string(),
        title: z.string(),
        raw_body: z.string().describe('Unrendered Org source'),
      },
    },
    async ({ id }) => runTool(async () => {
      const note = await getNotes().getChatNote(id);
      return { id: note.id, title: note.title, raw_body: note.rawBody };
    })
  );
}
