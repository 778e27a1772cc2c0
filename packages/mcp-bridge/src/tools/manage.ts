/** Runtime control of a server: live status, power, reinstall. */
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import {
  controlIdentifierFor,
  fetchServerStatus,
  POWER_SIGNALS,
  type PanelConsole,
} from '@hostpanel/api-client';
import { runTool } from '../helpers.js';

export function registerManageTools(server: McpServer, { panel, control }: PanelConsole) {
  server.tool(
    'manage_status',
    'Live state and resource usage of a server',
    { serverId: z.number().int().positive().describe('Numeric server id') },
    async ({ serverId }) => runTool('manage_status', () => fetchServerStatus(panel, control, serverId)),
  );

  server.tool(
    'manage_power',
    'Send a power signal to a server',
    {
      serverId: z.number().int().positive().describe('Numeric server id'),
      signal: z.enum(POWER_SIGNALS).describe('Power signal'),
    },
    async ({ serverId, signal }) =>
      runTool('manage_power', async () => {
        const identifier = await controlIdentifierFor(panel, serverId);
        await control.sendPowerSignal(identifier, signal);
        return { serverId, identifier, signal, mode: control.mode };
      }),
  );

  server.tool(
    'manage_reinstall',
    'Reinstall a server through the control API',
    { serverId: z.number().int().positive().describe('Numeric server id') },
    async ({ serverId }) =>
      runTool('manage_reinstall', async () => {
        const identifier = await controlIdentifierFor(panel, serverId);
        await control.reinstall(identifier);
        return { serverId, identifier, reinstalling: true };
      }),
  );
}
