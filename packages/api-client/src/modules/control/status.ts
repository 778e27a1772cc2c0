/**
 * Status report for one server: management attributes (name, limits,
 * primary allocation) joined with live usage from the control API.
 */
import type { JsonObject, ServerState } from '@hostpanel/shared';
import { ValidationError } from '../../types/index.js';
import {
  attributesOf,
  getNumber,
  getObject,
  getString,
  relationshipAttributes,
} from '../../lib/document.js';
import { formatBytes, formatMegabytes, formatUptime } from '../../lib/format.js';
import type { PanelClient } from '../resources/client.js';
import { resolveIdentifier, type ControlClient } from './client.js';

const BYTES_PER_MB = 1_048_576;

export interface UsageFigure {
  percent: number;
  used: string;
  limit: string;
}

export interface ServerStatusReport {
  id: number | null;
  name: string;
  identifier: string;
  state: ServerState;
  online: boolean;
  /** `alias-or-ip:port` of the first allocation, or `N/A`. */
  address: string;
  cpu: UsageFigure;
  memory: UsageFigure;
  disk: UsageFigure;
  network: { rx: string; tx: string };
  uptime: string;
}

const KNOWN_STATES: readonly ServerState[] = ['running', 'starting', 'stopping', 'offline'];

export function normalizeState(raw: string | undefined): ServerState {
  const state = (raw ?? 'offline').toLowerCase();
  return KNOWN_STATES.find((known) => known === state) ?? 'unknown';
}

function percentOf(usedBytes: number, limitMb: number): number {
  return limitMb > 0 ? (usedBytes / (limitMb * BYTES_PER_MB)) * 100 : 0;
}

function primaryAddress(attributes: JsonObject): string {
  const first = relationshipAttributes(attributes, 'allocations')[0];
  if (!first) return 'N/A';
  const host = getString(first, 'alias') || getString(first, 'ip') || '?';
  return `${host}:${getNumber(first, 'port') ?? '?'}`;
}

/**
 * `attributes` comes from the management API, `stats` from `getLiveStats`.
 * Missing stats read as an offline server with zero usage.
 */
export function buildStatusReport(attributes: JsonObject, stats: JsonObject): ServerStatusReport {
  const limits = getObject(attributes, 'limits');
  const memLimit = getNumber(limits, 'memory') ?? 0;
  const diskLimit = getNumber(limits, 'disk') ?? 0;
  const cpuLimit = getNumber(limits, 'cpu') ?? 0;

  const state = normalizeState(getString(stats, 'current_state'));
  const usage = getObject(stats, 'resources');
  const cpuAbsolute = getNumber(usage, 'cpu_absolute') ?? 0;
  const memBytes = getNumber(usage, 'memory_bytes') ?? 0;
  const diskBytes = getNumber(usage, 'disk_bytes') ?? 0;

  return {
    id: getNumber(attributes, 'id') ?? null,
    name: getString(attributes, 'name') ?? 'Unknown',
    identifier: resolveIdentifier(attributes) ?? '',
    state,
    online: state === 'running',
    address: primaryAddress(attributes),
    cpu: {
      percent: Math.min(cpuAbsolute, 100),
      used: `${cpuAbsolute.toFixed(1)}%`,
      limit: cpuLimit > 0 ? `${cpuLimit}%` : 'Unlimited',
    },
    memory: {
      percent: percentOf(memBytes, memLimit),
      used: formatBytes(memBytes),
      limit: formatMegabytes(memLimit),
    },
    disk: {
      percent: percentOf(diskBytes, diskLimit),
      used: formatBytes(diskBytes),
      limit: formatMegabytes(diskLimit),
    },
    network: {
      rx: formatBytes(getNumber(usage, 'network_rx_bytes') ?? 0),
      tx: formatBytes(getNumber(usage, 'network_tx_bytes') ?? 0),
    },
    uptime: formatUptime(getNumber(usage, 'uptime') ?? 0),
  };
}

/** Looks a server up by numeric id and returns its control identifier. */
export async function controlIdentifierFor(client: PanelClient, serverId: number): Promise<string> {
  const identifier = resolveIdentifier(attributesOf(await client.getServer(serverId)));
  if (!identifier) {
    throw new ValidationError(`Server ${serverId} has neither an identifier nor a UUID`, 'serverId');
  }
  return identifier;
}

export async function fetchServerStatus(
  client: PanelClient,
  control: ControlClient,
  serverId: number,
): Promise<ServerStatusReport> {
  const attributes = attributesOf(await client.getServer(serverId));
  const identifier = resolveIdentifier(attributes);
  const stats = identifier ? await control.getLiveStats(identifier) : {};
  return buildStatusReport(attributes, stats);
}
