/** Mount and database host tools. */
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import {
  attributesOf,
  buildDatabaseHostPayload,
  buildMountPayload,
  countOverview,
  databasesOnHost,
  mountAttachments,
  MOUNT_RELATIONS,
  summarizeMounts,
  type PanelConsole,
} from '@hostpanel/api-client';
import { runTool } from '../helpers.js';

const mountShape = {
  name: z.string().min(1).describe('Mount name'),
  source: z.string().min(1).describe('Path on the node'),
  target: z.string().min(1).describe('Path inside the server container'),
  description: z.string().optional().describe('Mount description'),
  readOnly: z.string().optional().describe('yes / no'),
};

const databaseHostShape = {
  name: z.string().min(1).describe('Display name'),
  host: z.string().min(1).describe('Database server address'),
  port: z.string().describe('Database server port'),
  username: z.string().min(1).describe('Account the panel connects with'),
  password: z.string().optional().describe('Password; leave out to keep the current one'),
};

export function registerMountsTools(server: McpServer, { panel }: PanelConsole) {
  server.tool('mounts_list', 'List mounts', {}, async () =>
    runTool('mounts_list', async () => (await panel.listMounts()).map(attributesOf)),
  );

  server.tool(
    'mounts_overview',
    'Count mounts, read-only and read-write',
    {},
    async () => runTool('mounts_overview', async () => summarizeMounts(await panel.listMounts())),
  );

  server.tool(
    'mounts_attached',
    'List the servers, nodes or eggs a mount is attached to',
    {
      mountId: z.number().int().positive().describe('Numeric mount id'),
      relation: z.enum(MOUNT_RELATIONS).describe('Which attachments to list'),
    },
    async ({ mountId, relation }) =>
      runTool('mounts_attached', () => mountAttachments(panel, mountId, relation)),
  );

  server.tool(
    'mounts_get',
    'Get one mount',
    { mountId: z.number().int().positive().describe('Numeric mount id') },
    async ({ mountId }) => runTool('mounts_get', async () => attributesOf(await panel.getMount(mountId))),
  );

  server.tool('mounts_create', 'Create a mount', mountShape, async (input) =>
    runTool('mounts_create', async () => attributesOf(await panel.createMount(buildMountPayload(input)))),
  );

  server.tool(
    'mounts_update',
    'Replace a mount',
    { mountId: z.number().int().positive().describe('Numeric mount id'), ...mountShape },
    async ({ mountId, ...input }) =>
      runTool('mounts_update', async () =>
        attributesOf(await panel.updateMount(mountId, buildMountPayload(input))),
      ),
  );

  server.tool(
    'mounts_delete',
    'Delete a mount',
    { mountId: z.number().int().positive().describe('Numeric mount id') },
    async ({ mountId }) => runTool('mounts_delete', () => panel.deleteMount(mountId)),
  );

  server.tool('database_hosts_list', 'List database hosts', {}, async () =>
    runTool('database_hosts_list', async () => (await panel.listDatabaseHosts()).map(attributesOf)),
  );

  server.tool('database_hosts_overview', 'Count database hosts', {}, async () =>
    runTool('database_hosts_overview', async () => countOverview(await panel.listDatabaseHosts())),
  );

  server.tool(
    'database_hosts_databases',
    'List server databases living on one host (checks every server in turn)',
    { hostId: z.number().int().positive().describe('Numeric database host id') },
    async ({ hostId }) => runTool('database_hosts_databases', () => databasesOnHost(panel, hostId)),
  );

  server.tool(
    'database_hosts_get',
    'Get one database host',
    { hostId: z.number().int().positive().describe('Numeric database host id') },
    async ({ hostId }) =>
      runTool('database_hosts_get', async () => attributesOf(await panel.getDatabaseHost(hostId))),
  );

  server.tool('database_hosts_create', 'Create a database host', databaseHostShape, async (input) =>
    runTool('database_hosts_create', async () =>
      attributesOf(await panel.createDatabaseHost(buildDatabaseHostPayload(input))),
    ),
  );

  server.tool(
    'database_hosts_update',
    'Update a database host',
    { hostId: z.number().int().positive().describe('Numeric database host id'), ...databaseHostShape },
    async ({ hostId, ...input }) =>
      runTool('database_hosts_update', async () =>
        attributesOf(await panel.updateDatabaseHost(hostId, buildDatabaseHostPayload(input))),
      ),
  );

  server.tool(
    'database_hosts_delete',
    'Delete a database host',
    { hostId: z.number().int().positive().describe('Numeric database host id') },
    async ({ hostId }) => runTool('database_hosts_delete', () => panel.deleteDatabaseHost(hostId)),
  );
}
