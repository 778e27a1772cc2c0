/**
 * Builds the MCP server with every console tool registered.
 */
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { PanelConsole } from '@hostpanel/api-client';

import { registerServersTools } from './tools/servers.js';
import { registerWizardTools } from './tools/wizard.js';
import { registerEditTools } from './tools/edits.js';
import { registerManageTools } from './tools/manage.js';
import { registerUsersTools } from './tools/users.js';
import { registerNodesTools } from './tools/nodes.js';
import { registerNestsTools } from './tools/nests.js';
import { registerMountsTools } from './tools/mounts.js';

export const BRIDGE_NAME = 'hostpanel-mcp-bridge';
export const BRIDGE_VERSION = '0.1.0';

export function createBridgeServer(panelConsole: PanelConsole): McpServer {
  const server = new McpServer({ name: BRIDGE_NAME, version: BRIDGE_VERSION });

  registerServersTools(server, panelConsole);
  registerWizardTools(server, panelConsole);
  registerEditTools(server, panelConsole);
  registerManageTools(server, panelConsole);
  registerUsersTools(server, panelConsole);
  registerNodesTools(server, panelConsole);
  registerNestsTools(server, panelConsole);
  registerMountsTools(server, panelConsole);

  return server;
}
