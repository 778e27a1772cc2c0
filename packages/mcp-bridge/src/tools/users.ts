/** Panel user and role tools. */
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import {
  attributesOf,
  buildRolePayload,
  buildUserPayload,
  countOverview,
  summarizeUsers,
  toggleRootAdmin,
  type PanelConsole,
} from '@hostpanel/api-client';
import { runTool } from '../helpers.js';

const userShape = {
  email: z.string().email().describe('Email address'),
  username: z.string().min(1).describe('Login name'),
  firstName: z.string().min(1).describe('First name'),
  lastName: z.string().min(1).describe('Last name'),
  password: z.string().optional().describe('Password; leave out to keep the current one'),
};

const roleShape = {
  name: z.string().min(1).describe('Role name'),
  description: z.string().optional().describe('Role description'),
};

export function registerUsersTools(server: McpServer, { panel }: PanelConsole) {
  server.tool(
    'users_list',
    'List panel users',
    { email: z.string().optional().describe('Filter by email (panel-side filter)') },
    async ({ email }) =>
      runTool('users_list', async () =>
        (await panel.listUsers({ 'filter[email]': email })).map(attributesOf),
      ),
  );

  server.tool(
    'users_get',
    'Get one panel user',
    { userId: z.number().int().positive().describe('Numeric user id') },
    async ({ userId }) => runTool('users_get', async () => attributesOf(await panel.getUser(userId))),
  );

  server.tool('users_create', 'Create a panel user', userShape, async (input) =>
    runTool('users_create', async () => attributesOf(await panel.createUser(buildUserPayload(input)))),
  );

  server.tool(
    'users_update',
    'Update a panel user',
    { userId: z.number().int().positive().describe('Numeric user id'), ...userShape },
    async ({ userId, ...input }) =>
      runTool('users_update', async () =>
        attributesOf(await panel.updateUser(userId, buildUserPayload(input))),
      ),
  );

  server.tool(
    'users_delete',
    'Delete a panel user',
    { userId: z.number().int().positive().describe('Numeric user id') },
    async ({ userId }) => runTool('users_delete', () => panel.deleteUser(userId)),
  );

  server.tool(
    'users_toggle_admin',
    'Grant or revoke root admin for a user; returns the new setting',
    { userId: z.number().int().positive().describe('Numeric user id') },
    async ({ userId }) =>
      runTool('users_toggle_admin', async () => ({ userId, rootAdmin: await toggleRootAdmin(panel, userId) })),
  );

  server.tool('users_overview', 'Count users, admins and regular users', {}, async () =>
    runTool('users_overview', async () => summarizeUsers(await panel.listUsers())),
  );

  server.tool('roles_overview', 'Count admin roles', {}, async () =>
    runTool('roles_overview', async () => countOverview(await panel.listRoles())),
  );

  server.tool('roles_list', 'List admin roles', {}, async () =>
    runTool('roles_list', async () => (await panel.listRoles()).map(attributesOf)),
  );

  server.tool(
    'roles_get',
    'Get one admin role',
    { roleId: z.number().int().positive().describe('Numeric role id') },
    async ({ roleId }) => runTool('roles_get', async () => attributesOf(await panel.getRole(roleId))),
  );

  server.tool('roles_create', 'Create an admin role', roleShape, async ({ name, description }) =>
    runTool('roles_create', async () =>
      attributesOf(await panel.createRole(buildRolePayload(name, description))),
    ),
  );

  server.tool(
    'roles_update',
    'Update an admin role',
    { roleId: z.number().int().positive().describe('Numeric role id'), ...roleShape },
    async ({ roleId, name, description }) =>
      runTool('roles_update', async () =>
        attributesOf(await panel.updateRole(roleId, buildRolePayload(name, description))),
      ),
  );

  server.tool(
    'roles_delete',
    'Delete an admin role',
    { roleId: z.number().int().positive().describe('Numeric role id') },
    async ({ roleId }) => runTool('roles_delete', () => panel.deleteRole(roleId)),
  );
}
