/** Node and allocation tools. */
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import {
  attributesOf,
  buildAllocationPayload,
  buildNodePayload,
  summarizeNodes,
  type PanelConsole,
} from '@hostpanel/api-client';
import { runTool } from '../helpers.js';

const nodeShape = {
  name: z.string().min(1).describe('Node name'),
  locationId: z.string().describe('Numeric location id'),
  fqdn: z.string().min(1).describe('Public hostname of the node daemon'),
  memory: z.string().describe('Total memory in MB'),
  disk: z.string().describe('Total disk in MB'),
};

export function registerNodesTools(server: McpServer, { panel }: PanelConsole) {
  server.tool('nodes_list', 'List nodes', {}, async () =>
    runTool('nodes_list', async () => (await panel.listNodes()).map(attributesOf)),
  );

  server.tool(
    'nodes_overview',
    'Count nodes and total their memory and disk (MB)',
    {},
    async () => runTool('nodes_overview', async () => summarizeNodes(await panel.listNodes())),
  );

  server.tool(
    'nodes_get',
    'Get one node',
    { nodeId: z.number().int().positive().describe('Numeric node id') },
    async ({ nodeId }) => runTool('nodes_get', async () => attributesOf(await panel.getNode(nodeId))),
  );

  server.tool('nodes_create', 'Create a node (https, SFTP 2022, daemon 8080)', nodeShape, async (input) =>
    runTool('nodes_create', async () => attributesOf(await panel.createNode(buildNodePayload(input)))),
  );

  server.tool(
    'nodes_update',
    'Update a node',
    { nodeId: z.number().int().positive().describe('Numeric node id'), ...nodeShape },
    async ({ nodeId, ...input }) =>
      runTool('nodes_update', async () =>
        attributesOf(await panel.updateNode(nodeId, buildNodePayload(input))),
      ),
  );

  server.tool(
    'nodes_delete',
    'Delete a node',
    { nodeId: z.number().int().positive().describe('Numeric node id') },
    async ({ nodeId }) => runTool('nodes_delete', () => panel.deleteNode(nodeId)),
  );

  server.tool(
    'allocations_list',
    'List the allocations (IP:port pairs) of a node',
    {
      nodeId: z.number().int().positive().describe('Numeric node id'),
      freeOnly: z.boolean().optional().describe('Only allocations no server holds'),
    },
    async ({ nodeId, freeOnly }) =>
      runTool('allocations_list', async () => {
        const allocations = (await panel.listAllocations(nodeId)).map(attributesOf);
        return freeOnly ? allocations.filter((a) => a['assigned'] !== true) : allocations;
      }),
  );

  server.tool(
    'allocations_create',
    'Add allocations to a node',
    {
      nodeId: z.number().int().positive().describe('Numeric node id'),
      ip: z.string().min(1).describe('IP address to bind'),
      ports: z.string().min(1).describe('Ports and ranges, e.g. "25565, 25570-25580"'),
      alias: z.string().optional().describe('Hostname shown instead of the IP'),
    },
    async ({ nodeId, ip, ports, alias }) =>
      runTool('allocations_create', async () => {
        const payload = buildAllocationPayload(ip, ports, alias);
        await panel.createAllocations(nodeId, payload);
        return { nodeId, ip, created: payload.ports };
      }),
  );

  server.tool(
    'allocations_delete',
    'Remove an allocation from a node',
    {
      nodeId: z.number().int().positive().describe('Numeric node id'),
      allocationId: z.number().int().positive().describe('Numeric allocation id'),
    },
    async ({ nodeId, allocationId }) =>
      runTool('allocations_delete', () => panel.deleteAllocation(nodeId, allocationId)),
  );
}
