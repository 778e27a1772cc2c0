/** Server (instance) management tools. */
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import {
  attributesOf,
  serversInNest,
  serversOnNode,
  serversOwnedBy,
  serversUsingEgg,
  summarizeServers,
  type PanelConsole,
} from '@hostpanel/api-client';
import { runTool } from '../helpers.js';

export function registerServersTools(server: McpServer, { panel }: PanelConsole) {
  server.tool(
    'servers_list',
    'List servers, optionally only those of one owner, egg, nest or node',
    {
      name: z.string().optional().describe('Filter by name (panel-side filter)'),
      ownerId: z.number().int().positive().optional().describe('Numeric owner user id'),
      eggId: z.number().int().positive().optional().describe('Numeric egg id'),
      nodeId: z.number().int().positive().optional().describe('Numeric node id'),
      nestId: z.number().int().positive().optional().describe('Numeric nest id'),
    },
    async ({ name, ownerId, eggId, nodeId, nestId }) =>
      runTool('servers_list', async () => {
        let servers = await panel.listServers({ 'filter[name]': name });
        if (ownerId !== undefined) servers = serversOwnedBy(servers, ownerId);
        if (eggId !== undefined) servers = serversUsingEgg(servers, eggId);
        if (nodeId !== undefined) servers = serversOnNode(servers, nodeId);
        if (nestId !== undefined) servers = await serversInNest(panel, servers, nestId);
        return servers.map(attributesOf);
      }),
  );

  server.tool(
    'servers_get',
    'Get one server with its allocations, owner, egg, node and databases',
    { serverId: z.number().int().positive().describe('Numeric server id') },
    async ({ serverId }) => runTool('servers_get', async () => attributesOf(await panel.getServer(serverId))),
  );

  server.tool(
    'servers_overview',
    'Count servers and total their memory and disk limits (MB)',
    {},
    async () => runTool('servers_overview', async () => summarizeServers(await panel.listServers())),
  );

  server.tool(
    'servers_suspend',
    'Suspend a server',
    { serverId: z.number().int().positive().describe('Numeric server id') },
    async ({ serverId }) => runTool('servers_suspend', () => panel.suspendServer(serverId)),
  );

  server.tool(
    'servers_unsuspend',
    'Unsuspend a server',
    { serverId: z.number().int().positive().describe('Numeric server id') },
    async ({ serverId }) => runTool('servers_unsuspend', () => panel.unsuspendServer(serverId)),
  );

  server.tool(
    'servers_reinstall',
    'Reinstall a server from its egg',
    { serverId: z.number().int().positive().describe('Numeric server id') },
    async ({ serverId }) => runTool('servers_reinstall', () => panel.reinstallServer(serverId)),
  );

  server.tool(
    'servers_delete',
    'Delete a server; force removes it even when its node is unreachable',
    {
      serverId: z.number().int().positive().describe('Numeric server id'),
      force: z.boolean().optional().describe('Delete without contacting the node daemon'),
    },
    async ({ serverId, force }) => runTool('servers_delete', () => panel.deleteServer(serverId, force ?? false)),
  );

  server.tool(
    'servers_databases',
    'List the databases of a server',
    { serverId: z.number().int().positive().describe('Numeric server id') },
    async ({ serverId }) =>
      runTool('servers_databases', async () => (await panel.listServerDatabases(serverId)).map(attributesOf)),
  );
}
