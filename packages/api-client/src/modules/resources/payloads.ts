/**
 * Builders for the management API request bodies, from raw form values.
 * Malformed operator input becomes a ValidationError before any request.
 */
import type {
  AllocationPayload,
  DatabaseHostPayload,
  MountPayload,
  NodePayload,
  RolePayload,
  UserPayload,
} from '@hostpanel/shared';
import { ValidationError } from '../../types/index.js';

/** Strict base-10 integer parse; `'12abc'` and `'1.5'` are rejected. */
export function parseInteger(raw: string, field: string): number {
  const text = raw.trim();
  if (!/^-?\d+$/.test(text)) {
    throw new ValidationError(`${field} must be a whole number`, field);
  }
  return Number(text);
}

/** `yes`, `true` and `1` (any case) are true; everything else is false. */
export function parseYesNo(raw: string | undefined): boolean {
  return ['yes', 'true', '1'].includes((raw ?? '').trim().toLowerCase());
}

export const MIN_PORT = 1;
export const MAX_PORT = 65535;

function checkPort(port: number, part: string): void {
  if (port < MIN_PORT || port > MAX_PORT) {
    throw new ValidationError(`Port out of range (${MIN_PORT}-${MAX_PORT}): ${part}`, 'ports');
  }
}

/**
 * Expands `"25565, 25570-25572"` into `["25565", "25570", "25571", "25572"]`.
 * Whitespace is ignored and empty parts are skipped. Both ends of a range are
 * bounds-checked before it is expanded.
 */
export function parsePortList(raw: string): string[] {
  const ports: string[] = [];
  for (const part of raw.replace(/\s+/g, '').split(',')) {
    if (!part) continue;
    const range = /^(\d+)-(\d+)$/.exec(part);
    if (range) {
      const start = Number(range[1]);
      const end = Number(range[2]);
      checkPort(start, part);
      checkPort(end, part);
      if (end < start) throw new ValidationError(`Invalid port range: ${part}`, 'ports');
      for (let port = start; port <= end; port++) ports.push(String(port));
    } else if (/^\d+$/.test(part)) {
      const port = Number(part);
      checkPort(port, part);
      ports.push(String(port));
    } else {
      throw new ValidationError(`Invalid port format: ${part}`, 'ports');
    }
  }
  if (ports.length === 0) throw new ValidationError('At least one port is required', 'ports');
  return ports;
}

export interface NodeInput {
  name: string;
  locationId: string;
  fqdn: string;
  memory: string;
  disk: string;
}

/** New nodes are served over https with the daemon's stock ports. */
export function buildNodePayload(input: NodeInput): NodePayload {
  return {
    name: input.name,
    location_id: parseInteger(input.locationId, 'locationId'),
    fqdn: input.fqdn,
    scheme: 'https',
    memory: parseInteger(input.memory, 'memory'),
    memory_overallocate: 0,
    disk: parseInteger(input.disk, 'disk'),
    disk_overallocate: 0,
    daemonSftp: 2022,
    daemonListen: 8080,
  };
}

export function buildAllocationPayload(ip: string, ports: string, alias?: string): AllocationPayload {
  const payload: AllocationPayload = { ip, ports: parsePortList(ports) };
  if (alias) payload.alias = alias;
  return payload;
}

export interface UserInput {
  email: string;
  username: string;
  firstName: string;
  lastName: string;
  /** Blank keeps the current password on update. */
  password?: string;
}

export function buildUserPayload(input: UserInput): UserPayload {
  const payload: UserPayload = {
    email: input.email,
    username: input.username,
    first_name: input.firstName,
    last_name: input.lastName,
  };
  if (input.password) payload.password = input.password;
  return payload;
}

export function buildRolePayload(name: string, description?: string): RolePayload {
  return { name, description: description ?? '' };
}

export interface MountInput {
  name: string;
  source: string;
  target: string;
  description?: string;
  readOnly?: string;
}

export function buildMountPayload(input: MountInput): MountPayload {
  return {
    name: input.name,
    source: input.source,
    target: input.target,
    description: input.description ?? '',
    read_only: parseYesNo(input.readOnly),
    user_mountable: false,
  };
}

export interface DatabaseHostInput {
  name: string;
  host: string;
  port: string;
  username: string;
  /** Blank keeps the current password on update. */
  password?: string;
}

export function buildDatabaseHostPayload(input: DatabaseHostInput): DatabaseHostPayload {
  const payload: DatabaseHostPayload = {
    name: input.name,
    host: input.host,
    port: parseInteger(input.port, 'port'),
    username: input.username,
  };
  if (input.password) payload.password = input.password;
  return payload;
}
