/** Nest and egg lookups. */
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import {
  attributesOf,
  serversByNest,
  summarizeEggs,
  type PanelConsole,
} from '@hostpanel/api-client';
import { runTool } from '../helpers.js';

export function registerNestsTools(server: McpServer, { panel }: PanelConsole) {
  server.tool('nests_list', 'List nests (server families)', {}, async () =>
    runTool('nests_list', async () => (await panel.listNests()).map(attributesOf)),
  );

  server.tool(
    'nests_get',
    'Get one nest',
    { nestId: z.number().int().positive().describe('Numeric nest id') },
    async ({ nestId }) => runTool('nests_get', async () => attributesOf(await panel.getNest(nestId))),
  );

  server.tool(
    'nests_servers',
    'Servers grouped by nest; nests without servers are left out',
    {},
    async () =>
      runTool('nests_servers', async () =>
        (await serversByNest(panel)).map((group) => ({ ...group, servers: group.servers.map(attributesOf) })),
      ),
  );

  server.tool('eggs_overview', 'Count eggs per nest', {}, async () =>
    runTool('eggs_overview', () => summarizeEggs(panel)),
  );

  server.tool(
    'eggs_list',
    'List the eggs (server templates) of a nest, or of every nest',
    { nestId: z.number().int().positive().optional().describe('Numeric nest id; all nests when left out') },
    async ({ nestId }) =>
      runTool('eggs_list', async () => {
        const eggs = nestId === undefined ? await panel.listAllEggs() : await panel.listEggs(nestId);
        return eggs.map(attributesOf);
      }),
  );

  server.tool(
    'eggs_get',
    'Get one egg with its variables',
    {
      nestId: z.number().int().positive().describe('Numeric nest id'),
      eggId: z.number().int().positive().describe('Numeric egg id'),
    },
    async ({ nestId, eggId }) =>
      runTool('eggs_get', async () => attributesOf(await panel.getEgg(nestId, eggId))),
  );
}
