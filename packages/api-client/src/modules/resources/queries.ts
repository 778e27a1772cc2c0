/**
 * Read-side helpers that combine listings: overviews and "servers of X".
 * Helpers that need several lookups make them one after another.
 */
import type { JsonObject } from '@hostpanel/shared';
import {
  attributesOf,
  getBoolean,
  getNumber,
  getObject,
  getString,
  relationshipAttributes,
} from '../../lib/document.js';
import type { PanelClient } from './client.js';

export interface CountOverview {
  count: number;
}

/** Roles and database hosts only report how many there are. */
export function countOverview(items: readonly JsonObject[]): CountOverview {
  return { count: items.length };
}

export interface ServerOverview {
  count: number;
  /** MB, summed over `limits.memory`. */
  totalMemory: number;
  /** MB, summed over `limits.disk`. */
  totalDisk: number;
}

export function summarizeServers(servers: JsonObject[]): ServerOverview {
  let totalMemory = 0;
  let totalDisk = 0;
  for (const server of servers) {
    const limits = getObject(attributesOf(server), 'limits');
    totalMemory += getNumber(limits, 'memory') ?? 0;
    totalDisk += getNumber(limits, 'disk') ?? 0;
  }
  return { count: servers.length, totalMemory, totalDisk };
}

export interface NodeOverview {
  count: number;
  /** MB, summed over each node's `memory`. */
  totalMemory: number;
  /** MB, summed over each node's `disk`. */
  totalDisk: number;
}

export function summarizeNodes(nodes: JsonObject[]): NodeOverview {
  let totalMemory = 0;
  let totalDisk = 0;
  for (const node of nodes) {
    const attrs = attributesOf(node);
    totalMemory += getNumber(attrs, 'memory') ?? 0;
    totalDisk += getNumber(attrs, 'disk') ?? 0;
  }
  return { count: nodes.length, totalMemory, totalDisk };
}

export interface MountOverview {
  count: number;
  readOnly: number;
  readWrite: number;
}

export function summarizeMounts(mounts: JsonObject[]): MountOverview {
  const readOnly = mounts.filter((m) => getBoolean(attributesOf(m), 'read_only') === true).length;
  return { count: mounts.length, readOnly, readWrite: mounts.length - readOnly };
}

export interface NestEggCount {
  nestId: number;
  name: string;
  eggs: number;
}

export interface EggOverview {
  nests: number;
  totalEggs: number;
  perNest: NestEggCount[];
}

export async function summarizeEggs(client: PanelClient): Promise<EggOverview> {
  const perNest: NestEggCount[] = [];
  for (const nest of await client.listNests()) {
    const attrs = attributesOf(nest);
    const nestId = getNumber(attrs, 'id');
    if (nestId === undefined) continue;
    const eggs = await client.listEggs(nestId);
    perNest.push({ nestId, name: getString(attrs, 'name') ?? '', eggs: eggs.length });
  }
  return {
    nests: perNest.length,
    totalEggs: perNest.reduce((sum, nest) => sum + nest.eggs, 0),
    perNest,
  };
}

export interface UserOverview {
  count: number;
  admins: number;
  regular: number;
}

export function summarizeUsers(users: JsonObject[]): UserOverview {
  const admins = users.filter((u) => getBoolean(attributesOf(u), 'root_admin') === true).length;
  return { count: users.length, admins, regular: users.length - admins };
}

function whereAttribute(servers: JsonObject[], key: string, id: number): JsonObject[] {
  return servers.filter((s) => getNumber(attributesOf(s), key) === id);
}

export function serversOwnedBy(servers: JsonObject[], userId: number): JsonObject[] {
  return whereAttribute(servers, 'user', userId);
}

export function serversUsingEgg(servers: JsonObject[], eggId: number): JsonObject[] {
  return whereAttribute(servers, 'egg', eggId);
}

export function serversOnNode(servers: JsonObject[], nodeId: number): JsonObject[] {
  return whereAttribute(servers, 'node', nodeId);
}

async function eggIdsOf(client: PanelClient, nestId: number): Promise<Set<number>> {
  const ids = new Set<number>();
  for (const egg of await client.listEggs(nestId)) {
    const id = getNumber(attributesOf(egg), 'id');
    if (id !== undefined) ids.add(id);
  }
  return ids;
}

/** Servers whose egg belongs to the nest. */
export async function serversInNest(
  client: PanelClient,
  servers: JsonObject[],
  nestId: number,
): Promise<JsonObject[]> {
  const eggIds = await eggIdsOf(client, nestId);
  return servers.filter((s) => {
    const egg = getNumber(attributesOf(s), 'egg');
    return egg !== undefined && eggIds.has(egg);
  });
}

export interface NestServers {
  nestId: number;
  name: string;
  servers: JsonObject[];
}

/** Servers grouped by nest, in nest order; nests without servers are left out. */
export async function serversByNest(client: PanelClient): Promise<NestServers[]> {
  const nests = await client.listNests();
  const servers = await client.listServers();
  const groups: NestServers[] = [];
  for (const nest of nests) {
    const attrs = attributesOf(nest);
    const nestId = getNumber(attrs, 'id');
    if (nestId === undefined) continue;
    const members = await serversInNest(client, servers, nestId);
    if (members.length > 0) groups.push({ nestId, name: getString(attrs, 'name') ?? '', servers: members });
  }
  return groups;
}

export const MOUNT_RELATIONS = ['servers', 'nodes', 'eggs'] as const;
export type MountRelation = (typeof MOUNT_RELATIONS)[number];

export interface AttachedItem {
  id: number | null;
  /** The item's name, else `ip:port`, else its id. */
  name: string;
}

export interface MountAttachments {
  mountId: number;
  mount: string;
  relation: MountRelation;
  items: AttachedItem[];
}

function attachedItem(attrs: JsonObject): AttachedItem {
  const id = getNumber(attrs, 'id') ?? null;
  const ip = getString(attrs, 'ip');
  const port = getNumber(attrs, 'port');
  const name =
    getString(attrs, 'name') || (ip !== undefined && port !== undefined ? `${ip}:${port}` : String(id ?? '?'));
  return { id, name };
}

export async function mountAttachments(
  client: PanelClient,
  mountId: number,
  relation: MountRelation,
): Promise<MountAttachments> {
  const attrs = attributesOf(await client.getMount(mountId));
  return {
    mountId,
    mount: getString(attrs, 'name') ?? '',
    relation,
    items: relationshipAttributes(attrs, relation).map(attachedItem),
  };
}

export interface HostedDatabase {
  serverId: number;
  serverName: string;
  database: JsonObject;
}

/** The host id of a database, whether given as a number or an expanded `host` block. */
function databaseHostId(attrs: JsonObject): number | undefined {
  return getNumber(attrs, 'host') ?? getNumber(getObject(attrs, 'host'), 'id');
}

/** Every server database living on the host, walking servers one at a time. */
export async function databasesOnHost(client: PanelClient, hostId: number): Promise<HostedDatabase[]> {
  const found: HostedDatabase[] = [];
  for (const server of await client.listServers()) {
    const attrs = attributesOf(server);
    const serverId = getNumber(attrs, 'id');
    if (serverId === undefined) continue;
    for (const database of await client.listServerDatabases(serverId)) {
      const dbAttrs = attributesOf(database);
      if (databaseHostId(dbAttrs) === hostId) {
        found.push({ serverId, serverName: getString(attrs, 'name') ?? '', database: dbAttrs });
      }
    }
  }
  return found;
}

/**
 * Flips a user's `root_admin` flag, resending the identity fields unchanged.
 * Returns the new flag.
 */
export async function toggleRootAdmin(client: PanelClient, userId: number): Promise<boolean> {
  const attrs = attributesOf(await client.getUser(userId));
  const rootAdmin = !(getBoolean(attrs, 'root_admin') ?? false);
  await client.updateUser(userId, {
    email: getString(attrs, 'email') ?? '',
    username: getString(attrs, 'username') ?? '',
    first_name: getString(attrs, 'first_name') ?? '',
    last_name: getString(attrs, 'last_name') ?? '',
    root_admin: rootAdmin,
  });
  return rootAdmin;
}
