/** Edits of an existing server; each has a prefill tool returning the current values. */
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { PanelConsole } from '@hostpanel/api-client';
import { runTool } from '../helpers.js';

const serverId = z.number().int().positive().describe('Numeric server id');
const whole = (label: string) => z.string().describe(`${label} (whole number)`);

export function registerEditTools(server: McpServer, { edits }: PanelConsole) {
  server.tool(
    'servers_edit_details_prefill',
    'Current name, description and external id of a server',
    { serverId },
    async ({ serverId: id }) => runTool('servers_edit_details_prefill', () => edits.prefillDetails(id)),
  );

  server.tool(
    'servers_edit_details',
    'Rename a server or change its description / external id; the owner is kept',
    {
      serverId,
      name: z.string().describe('Server name (max 191)'),
      description: z.string().optional().describe('Description (max 255)'),
      externalId: z.string().optional().describe('External id (max 191)'),
    },
    async ({ serverId: id, ...form }) => runTool('servers_edit_details', () => edits.submitDetails(id, form)),
  );

  server.tool(
    'servers_edit_build_prefill',
    'Current resource limits of a server',
    { serverId },
    async ({ serverId: id }) => runTool('servers_edit_build_prefill', () => edits.prefillBuild(id)),
  );

  server.tool(
    'servers_edit_build',
    'Change the resource limits of a server; the primary allocation is kept',
    {
      serverId,
      memory: whole('Memory in MB, 0 = unlimited'),
      disk: whole('Disk in MB, 0 = unlimited'),
      cpu: whole('CPU %, 0 = unlimited'),
      swap: whole('Swap in MB, -1 = unlimited'),
      io: whole('IO weight, 10-1000'),
    },
    async ({ serverId: id, ...form }) => runTool('servers_edit_build', () => edits.submitBuild(id, form)),
  );

  server.tool(
    'servers_edit_startup_prefill',
    'Current startup command, image, egg and environment (KEY=VALUE lines) of a server',
    { serverId },
    async ({ serverId: id }) => runTool('servers_edit_startup_prefill', () => edits.prefillStartup(id)),
  );

  server.tool(
    'servers_edit_startup',
    'Change the startup command and environment; egg and image are kept',
    {
      serverId,
      startup: z.string().describe('Startup command'),
      environment: z.string().optional().describe('KEY=VALUE per line'),
    },
    async ({ serverId: id, ...form }) => runTool('servers_edit_startup', () => edits.submitStartup(id, form)),
  );
}
