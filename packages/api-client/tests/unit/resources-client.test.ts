/**
 * Unit tests for PanelClient paths, verbs and error propagation.
 */
import { describe, it, expect } from 'vitest';
import { PanelTransport } from '../../src/lib/transport.js';
import { PanelClient, SERVER_INCLUDE } from '../../src/modules/resources/client.js';
import {
  countOverview,
  databasesOnHost,
  mountAttachments,
  serversByNest,
  serversInNest,
  serversOnNode,
  serversOwnedBy,
  serversUsingEgg,
  summarizeEggs,
  summarizeMounts,
  summarizeNodes,
  summarizeServers,
  summarizeUsers,
  toggleRootAdmin,
} from '../../src/modules/resources/queries.js';
import { ApiError } from '../../src/types/index.js';
import type { JsonObject } from '@hostpanel/shared';
import {
  APP_BASE,
  createRouteStub,
  errorResponse,
  jsonResponse,
  listPage,
  type RouteHandler,
} from '../helpers/panel-stub.js';

function clientWith(routes: Record<string, RouteHandler>) {
  const stub = createRouteStub(routes);
  const transport = new PanelTransport({ baseUrl: APP_BASE, apiKey: 'test-secret', fetch: stub.fetch });
  return { client: new PanelClient(transport), calls: stub.calls };
}

const ok: RouteHandler = () => jsonResponse({ attributes: {} });

describe('PanelClient servers', () => {
  it('fetches a server with its relationships included', async () => {
    const { client, calls } = clientWith({
      'GET /api/application/servers/12': () => jsonResponse({ attributes: { id: 12, name: 'alpha' } }),
    });

    const server = await client.getServer(12);

    expect(server).toEqual({ attributes: { id: 12, name: 'alpha' } });
    expect(calls[0]?.url.searchParams.get('include')).toBe(SERVER_INCLUDE);
  });

  it('passes list filters through to the paginator', async () => {
    const { client, calls } = clientWith({
      'GET /api/application/servers': () => jsonResponse(listPage([{ id: 1 }])),
    });

    await client.listServers({ 'filter[name]': 'alpha' });

    expect(calls[0]?.url.searchParams.get('filter[name]')).toBe('alpha');
  });

  it('sends edits to their own sub-resources with PATCH', async () => {
    const { client, calls } = clientWith({
      'PATCH /api/application/servers/3/details': ok,
      'PATCH /api/application/servers/3/build': ok,
      'PATCH /api/application/servers/3/startup': ok,
    });

    await client.updateServerDetails(3, { name: 'beta', user: 1, description: '' });
    await client.updateServerBuild(3, {
      allocation: 9,
      limits: { memory: 1024, swap: 0, disk: 5120, io: 500, cpu: 100 },
      feature_limits: { databases: 5, backups: 3, allocations: 1 },
    });
    await client.updateServerStartup(3, {
      startup: 'run.sh',
      egg: 4,
      image: 'ghcr.io/example/java:17',
      environment: {},
      skip_scripts: false,
    });

    expect(calls.map((c) => c.route)).toEqual([
      'PATCH /api/application/servers/3/details',
      'PATCH /api/application/servers/3/build',
      'PATCH /api/application/servers/3/startup',
    ]);
    expect(calls[0]?.body).toEqual({ name: 'beta', user: 1, description: '' });
  });

  it('uses the force path only when asked', async () => {
    const { client, calls } = clientWith({
      'DELETE /api/application/servers/5': () => new Response(null, { status: 204 }),
      'DELETE /api/application/servers/5/force': () => new Response(null, { status: 204 }),
    });

    await client.deleteServer(5);
    await client.deleteServer(5, true);

    expect(calls.map((c) => c.route)).toEqual([
      'DELETE /api/application/servers/5',
      'DELETE /api/application/servers/5/force',
    ]);
  });

  it('posts suspend, unsuspend and reinstall actions', async () => {
    const { client, calls } = clientWith({
      'POST /api/application/servers/8/suspend': () => new Response(null, { status: 204 }),
      'POST /api/application/servers/8/unsuspend': () => new Response(null, { status: 204 }),
      'POST /api/application/servers/8/reinstall': () => new Response(null, { status: 204 }),
    });

    await client.suspendServer(8);
    await client.unsuspendServer(8);
    await client.reinstallServer(8);

    expect(calls.every((c) => c.method === 'POST' && c.body === undefined)).toBe(true);
    expect(calls).toHaveLength(3);
  });

  it('lets API errors through unchanged', async () => {
    const { client } = clientWith({});

    const error = await client.getServer(404).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ApiError);
    expect(error).toMatchObject({
      statusCode: 404,
      message: 'No route for GET /api/application/servers/404',
      code: 'NotFoundHttpException',
    });
  });
});

describe('PanelClient other resources', () => {
  it('replaces mounts with PUT', async () => {
    const { client, calls } = clientWith({ 'PUT /api/application/mounts/2': ok });

    await client.updateMount(2, {
      name: 'maps',
      source: '/srv/maps',
      target: '/maps',
      description: '',
      read_only: true,
      user_mountable: false,
    });

    expect(calls[0]?.method).toBe('PUT');
  });

  it('addresses allocations under their node', async () => {
    const { client, calls } = clientWith({
      'POST /api/application/nodes/2/allocations': () => new Response(null, { status: 204 }),
      'DELETE /api/application/nodes/2/allocations/40': () => new Response(null, { status: 204 }),
    });

    await client.createAllocations(2, { ip: '10.0.0.5', ports: ['25565'] });
    await client.deleteAllocation(2, 40);

    expect(calls.map((c) => c.route)).toEqual([
      'POST /api/application/nodes/2/allocations',
      'DELETE /api/application/nodes/2/allocations/40',
    ]);
    expect(calls[0]?.body).toEqual({ ip: '10.0.0.5', ports: ['25565'] });
  });

  it('loads an egg with its variables', async () => {
    const { client, calls } = clientWith({
      'GET /api/application/nests/3/eggs/4': () => jsonResponse({ attributes: { id: 4 } }),
    });

    await client.getEgg(3, 4);

    expect(calls[0]?.url.searchParams.get('include')).toBe('variables');
  });

  it('flattens eggs across every nest in order', async () => {
    const { client, calls } = clientWith({
      'GET /api/application/nests': () => jsonResponse(listPage([{ id: 1 }, { id: 2 }])),
      'GET /api/application/nests/1/eggs': () => jsonResponse(listPage([{ id: 10 }, { id: 11 }])),
      'GET /api/application/nests/2/eggs': () => jsonResponse(listPage([{ id: 20 }])),
    });

    const eggs = await client.listAllEggs();

    expect(eggs).toEqual([
      { object: 'item', attributes: { id: 10 } },
      { object: 'item', attributes: { id: 11 } },
      { object: 'item', attributes: { id: 20 } },
    ]);
    expect(calls).toHaveLength(3);
  });
});

describe('resource queries', () => {
  const servers: { attributes: JsonObject }[] = [
    { attributes: { id: 1, user: 3, egg: 4, node: 2, limits: { memory: 1024, disk: 5120 } } },
    { attributes: { id: 2, user: 5, egg: 4, node: 7, limits: { memory: 2048, disk: 0 } } },
    { attributes: { id: 3, user: 3, egg: 9, node: 2 } },
  ];

  it('sums memory and disk limits', () => {
    expect(summarizeServers(servers)).toEqual({ count: 3, totalMemory: 3072, totalDisk: 5120 });
  });

  it('filters servers by owner, egg and node', () => {
    expect(serversOwnedBy(servers, 3).map((s) => s['attributes'])).toEqual([
      servers[0]?.attributes,
      servers[2]?.attributes,
    ]);
    expect(serversUsingEgg(servers, 4)).toHaveLength(2);
    expect(serversOnNode(servers, 7)).toEqual([servers[1]]);
  });

  it('counts admins and regular users', () => {
    const users: JsonObject[] = [
      { attributes: { root_admin: true } },
      { attributes: { root_admin: false } },
      { attributes: {} },
    ];
    expect(summarizeUsers(users)).toEqual({ count: 3, admins: 1, regular: 2 });
  });

  it('flips root_admin and resends identity fields', async () => {
    const { client, calls } = clientWith({
      'GET /api/application/users/3': () =>
        jsonResponse({
          attributes: {
            id: 3,
            email: 'alice@example.com',
            username: 'alice',
            first_name: 'Alice',
            last_name: 'Liddell',
            root_admin: false,
          },
        }),
      'PATCH /api/application/users/3': ok,
    });

    await expect(toggleRootAdmin(client, 3)).resolves.toBe(true);
    expect(calls[1]?.body).toEqual({
      email: 'alice@example.com',
      username: 'alice',
      first_name: 'Alice',
      last_name: 'Liddell',
      root_admin: true,
    });
  });

  it('does not patch when the user lookup fails', async () => {
    const { client, calls } = clientWith({
      'GET /api/application/users/9': () => errorResponse(404, 'User not found'),
    });

    await expect(toggleRootAdmin(client, 9)).rejects.toBeInstanceOf(ApiError);
    expect(calls).toHaveLength(1);
  });
});

describe('resource overviews', () => {
  it('totals node memory and disk', () => {
    const nodes: JsonObject[] = [
      { attributes: { memory: 8192, disk: 100000 } },
      { attributes: { memory: 4096, disk: 50000 } },
      { attributes: {} },
    ];
    expect(summarizeNodes(nodes)).toEqual({ count: 3, totalMemory: 12288, totalDisk: 150000 });
  });

  it('splits mounts into read-only and read-write', () => {
    const mounts: JsonObject[] = [
      { attributes: { read_only: true } },
      { attributes: { read_only: false } },
      { attributes: {} },
    ];
    expect(summarizeMounts(mounts)).toEqual({ count: 3, readOnly: 1, readWrite: 2 });
  });

  it('counts plain listings', () => {
    expect(countOverview([{ attributes: { id: 1 } }, { attributes: { id: 2 } }])).toEqual({ count: 2 });
  });

  it('counts eggs nest by nest', async () => {
    const { client, calls } = clientWith({
      'GET /api/application/nests': () =>
        jsonResponse(listPage([{ id: 1, name: 'Minecraft' }, { id: 2, name: 'Rust' }])),
      'GET /api/application/nests/1/eggs': () => jsonResponse(listPage([{ id: 4 }, { id: 5 }])),
      'GET /api/application/nests/2/eggs': () => jsonResponse(listPage([])),
    });

    await expect(summarizeEggs(client)).resolves.toEqual({
      nests: 2,
      totalEggs: 2,
      perNest: [
        { nestId: 1, name: 'Minecraft', eggs: 2 },
        { nestId: 2, name: 'Rust', eggs: 0 },
      ],
    });
    expect(calls.map((c) => c.route)).toEqual([
      'GET /api/application/nests',
      'GET /api/application/nests/1/eggs',
      'GET /api/application/nests/2/eggs',
    ]);
  });
});

describe('nest lookups', () => {
  it('keeps servers whose egg belongs to the nest', async () => {
    const { client } = clientWith({
      'GET /api/application/nests/1/eggs': () => jsonResponse(listPage([{ id: 4 }, { id: 5 }])),
    });
    const servers = [
      { attributes: { id: 1, egg: 4 } },
      { attributes: { id: 2, egg: 9 } },
      { attributes: { id: 3, egg: 5 } },
    ];

    const inNest = await serversInNest(client, servers, 1);

    expect(inNest).toEqual([servers[0], servers[2]]);
  });

  it('groups servers by nest and leaves out empty nests', async () => {
    const { client } = clientWith({
      'GET /api/application/nests': () =>
        jsonResponse(listPage([{ id: 1, name: 'Minecraft' }, { id: 2, name: 'Rust' }])),
      'GET /api/application/servers': () =>
        jsonResponse(listPage([{ id: 1, name: 'alpha', egg: 4 }, { id: 2, name: 'beta', egg: 9 }])),
      'GET /api/application/nests/1/eggs': () => jsonResponse(listPage([{ id: 4 }])),
      'GET /api/application/nests/2/eggs': () => jsonResponse(listPage([{ id: 7 }])),
    });

    const groups = await serversByNest(client);

    expect(groups).toHaveLength(1);
    expect(groups[0]).toMatchObject({ nestId: 1, name: 'Minecraft' });
    expect(groups[0]?.servers.map((s) => s['attributes'])).toEqual([{ id: 1, name: 'alpha', egg: 4 }]);
  });
});

describe('mount attachments', () => {
  const mount = {
    object: 'mount',
    attributes: {
      id: 2,
      name: 'shared-maps',
      relationships: {
        servers: { object: 'list', data: [{ object: 'server', attributes: { id: 1, name: 'alpha' } }] },
        nodes: {
          object: 'list',
          data: [
            { object: 'node', attributes: { id: 3, name: '' } },
            { object: 'node', attributes: { id: 7, ip: '10.0.0.5', port: 25565 } },
          ],
        },
        eggs: { object: 'list', data: [] },
      },
    },
  };

  it('asks for the related objects and lists the chosen relation', async () => {
    const { client, calls } = clientWith({ 'GET /api/application/mounts/2': () => jsonResponse(mount) });

    const attached = await mountAttachments(client, 2, 'servers');

    expect(calls[0]?.url.searchParams.get('include')).toBe('servers,nodes,eggs');
    expect(attached).toEqual({
      mountId: 2,
      mount: 'shared-maps',
      relation: 'servers',
      items: [{ id: 1, name: 'alpha' }],
    });
  });

  it('names nameless items by address, else by id', async () => {
    const { client } = clientWith({ 'GET /api/application/mounts/2': () => jsonResponse(mount) });

    const attached = await mountAttachments(client, 2, 'nodes');

    expect(attached.items).toEqual([
      { id: 3, name: '3' },
      { id: 7, name: '10.0.0.5:25565' },
    ]);
    await expect(mountAttachments(client, 2, 'eggs')).resolves.toMatchObject({ items: [] });
  });
});

describe('databases by host', () => {
  it('walks every server in turn and keeps databases on the host', async () => {
    const { client, calls } = clientWith({
      'GET /api/application/servers': () =>
        jsonResponse(listPage([{ id: 1, name: 'alpha' }, { id: 2, name: 'beta' }])),
      'GET /api/application/servers/1/databases': () =>
        jsonResponse(
          listPage([
            { id: 10, database: 's1_main', host: 3 },
            { id: 11, database: 's1_logs', host: 4 },
          ]),
        ),
      'GET /api/application/servers/2/databases': () =>
        jsonResponse(listPage([{ id: 12, database: 's2_main', host: { id: 3 } }])),
    });

    const found = await databasesOnHost(client, 3);

    expect(found).toEqual([
      { serverId: 1, serverName: 'alpha', database: { id: 10, database: 's1_main', host: 3 } },
      { serverId: 2, serverName: 'beta', database: { id: 12, database: 's2_main', host: { id: 3 } } },
    ]);
    expect(calls.map((c) => c.route)).toEqual([
      'GET /api/application/servers',
      'GET /api/application/servers/1/databases',
      'GET /api/application/servers/2/databases',
    ]);
  });
});
