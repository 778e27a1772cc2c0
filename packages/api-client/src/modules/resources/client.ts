/**
 * Typed operation surface over the management API (`/api/application`).
 * Path construction and payload passing only. No business logic and no
 * error handling: Transport / Paginator failures reach the caller unchanged.
 */
import type {
  AllocationPayload,
  CreateServerPayload,
  DatabaseHostPayload,
  JsonObject,
  MountPayload,
  NodePayload,
  QueryParams,
  RolePayload,
  ServerBuildPayload,
  ServerDetailsPayload,
  ServerStartupPayload,
  UserPayload,
} from '@hostpanel/shared';
import { asObject, attributesOf, getNumber } from '../../lib/document.js';
import { Paginator } from '../../lib/paginator.js';
import type { PanelTransport } from '../../lib/transport.js';

/** Related objects expanded on a single server fetch. */
export const SERVER_INCLUDE = 'allocations,user,egg,nest,variables,location,node,databases';

/** Everything a mount can be attached to. */
export const MOUNT_INCLUDE = 'servers,nodes,eggs';

export class PanelClient {
  private readonly paginator: Paginator;

  constructor(private readonly transport: PanelTransport) {
    this.paginator = new Paginator(transport);
  }

  // ---------- servers ----------

  async listServers(filters?: QueryParams): Promise<JsonObject[]> {
    return this.paginator.listAll('/servers', filters);
  }

  async getServer(serverId: number): Promise<JsonObject> {
    return this.fetch(`/servers/${serverId}`, { include: SERVER_INCLUDE });
  }

  async createServer(payload: CreateServerPayload): Promise<JsonObject> {
    return this.send('POST', '/servers', payload);
  }

  async updateServerDetails(serverId: number, payload: ServerDetailsPayload): Promise<JsonObject> {
    return this.send('PATCH', `/servers/${serverId}/details`, payload);
  }

  async updateServerBuild(serverId: number, payload: ServerBuildPayload): Promise<JsonObject> {
    return this.send('PATCH', `/servers/${serverId}/build`, payload);
  }

  async updateServerStartup(serverId: number, payload: ServerStartupPayload): Promise<JsonObject> {
    return this.send('PATCH', `/servers/${serverId}/startup`, payload);
  }

  async suspendServer(serverId: number): Promise<JsonObject> {
    return this.send('POST', `/servers/${serverId}/suspend`);
  }

  async unsuspendServer(serverId: number): Promise<JsonObject> {
    return this.send('POST', `/servers/${serverId}/unsuspend`);
  }

  async reinstallServer(serverId: number): Promise<JsonObject> {
    return this.send('POST', `/servers/${serverId}/reinstall`);
  }

  /** `force` removes the server even when the node daemon cannot be reached. */
  async deleteServer(serverId: number, force = false): Promise<JsonObject> {
    const path = force ? `/servers/${serverId}/force` : `/servers/${serverId}`;
    return this.send('DELETE', path);
  }

  async listServerDatabases(serverId: number): Promise<JsonObject[]> {
    return this.paginator.listAll(`/servers/${serverId}/databases`);
  }

  // ---------- users ----------

  async listUsers(filters?: QueryParams): Promise<JsonObject[]> {
    return this.paginator.listAll('/users', filters);
  }

  async getUser(userId: number): Promise<JsonObject> {
    return this.fetch(`/users/${userId}`);
  }

  async createUser(payload: UserPayload): Promise<JsonObject> {
    return this.send('POST', '/users', payload);
  }

  async updateUser(userId: number, payload: UserPayload): Promise<JsonObject> {
    return this.send('PATCH', `/users/${userId}`, payload);
  }

  async deleteUser(userId: number): Promise<JsonObject> {
    return this.send('DELETE', `/users/${userId}`);
  }

  // ---------- roles ----------

  async listRoles(): Promise<JsonObject[]> {
    return this.paginator.listAll('/roles');
  }

  async getRole(roleId: number): Promise<JsonObject> {
    return this.fetch(`/roles/${roleId}`);
  }

  async createRole(payload: RolePayload): Promise<JsonObject> {
    return this.send('POST', '/roles', payload);
  }

  async updateRole(roleId: number, payload: RolePayload): Promise<JsonObject> {
    return this.send('PATCH', `/roles/${roleId}`, payload);
  }

  async deleteRole(roleId: number): Promise<JsonObject> {
    return this.send('DELETE', `/roles/${roleId}`);
  }

  // ---------- nodes & allocations ----------

  async listNodes(): Promise<JsonObject[]> {
    return this.paginator.listAll('/nodes');
  }

  async getNode(nodeId: number): Promise<JsonObject> {
    return this.fetch(`/nodes/${nodeId}`);
  }

  async createNode(payload: NodePayload): Promise<JsonObject> {
    return this.send('POST', '/nodes', payload);
  }

  async updateNode(nodeId: number, payload: NodePayload): Promise<JsonObject> {
    return this.send('PATCH', `/nodes/${nodeId}`, payload);
  }

  async deleteNode(nodeId: number): Promise<JsonObject> {
    return this.send('DELETE', `/nodes/${nodeId}`);
  }

  async listAllocations(nodeId: number): Promise<JsonObject[]> {
    return this.paginator.listAll(`/nodes/${nodeId}/allocations`);
  }

  async createAllocations(nodeId: number, payload: AllocationPayload): Promise<JsonObject> {
    return this.send('POST', `/nodes/${nodeId}/allocations`, payload);
  }

  async deleteAllocation(nodeId: number, allocationId: number): Promise<JsonObject> {
    return this.send('DELETE', `/nodes/${nodeId}/allocations/${allocationId}`);
  }

  // ---------- nests & eggs ----------

  async listNests(): Promise<JsonObject[]> {
    return this.paginator.listAll('/nests');
  }

  async getNest(nestId: number): Promise<JsonObject> {
    return this.fetch(`/nests/${nestId}`);
  }

  async listEggs(nestId: number): Promise<JsonObject[]> {
    return this.paginator.listAll(`/nests/${nestId}/eggs`);
  }

  /** Egg detail with its declared variables expanded. */
  async getEgg(nestId: number, eggId: number): Promise<JsonObject> {
    return this.fetch(`/nests/${nestId}/eggs/${eggId}`, { include: 'variables' });
  }

  /** Every egg of every nest, nest by nest in server order. */
  async listAllEggs(): Promise<JsonObject[]> {
    const eggs: JsonObject[] = [];
    for (const nest of await this.listNests()) {
      const nestId = getNumber(attributesOf(nest), 'id');
      if (nestId === undefined) continue;
      eggs.push(...(await this.listEggs(nestId)));
    }
    return eggs;
  }

  // ---------- mounts ----------

  async listMounts(): Promise<JsonObject[]> {
    return this.paginator.listAll('/mounts');
  }

  async getMount(mountId: number): Promise<JsonObject> {
    return this.fetch(`/mounts/${mountId}`, { include: MOUNT_INCLUDE });
  }

  async createMount(payload: MountPayload): Promise<JsonObject> {
    return this.send('POST', '/mounts', payload);
  }

  /** Mounts are replaced wholesale, hence PUT. */
  async updateMount(mountId: number, payload: MountPayload): Promise<JsonObject> {
    return this.send('PUT', `/mounts/${mountId}`, payload);
  }

  async deleteMount(mountId: number): Promise<JsonObject> {
    return this.send('DELETE', `/mounts/${mountId}`);
  }

  // ---------- database hosts ----------

  async listDatabaseHosts(): Promise<JsonObject[]> {
    return this.paginator.listAll('/database-hosts');
  }

  async getDatabaseHost(hostId: number): Promise<JsonObject> {
    return this.fetch(`/database-hosts/${hostId}`);
  }

  async createDatabaseHost(payload: DatabaseHostPayload): Promise<JsonObject> {
    return this.send('POST', '/database-hosts', payload);
  }

  async updateDatabaseHost(hostId: number, payload: DatabaseHostPayload): Promise<JsonObject> {
    return this.send('PATCH', `/database-hosts/${hostId}`, payload);
  }

  async deleteDatabaseHost(hostId: number): Promise<JsonObject> {
    return this.send('DELETE', `/database-hosts/${hostId}`);
  }

  // ---------- plumbing ----------

  private async fetch(path: string, query?: QueryParams): Promise<JsonObject> {
    return asObject(await this.transport.get(path, query));
  }

  private async send(
    method: 'POST' | 'PATCH' | 'PUT' | 'DELETE',
    path: string,
    body?: Record<string, unknown>,
  ): Promise<JsonObject> {
    return asObject(await this.transport.request(method, path, body === undefined ? {} : { body }));
  }
}
