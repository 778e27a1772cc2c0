/**
 * Edits on an existing server: details, build limits, startup + environment.
 * Each edit is a prefill (current values as form strings) and a submit that
 * re-reads the server for the fields the edit carries through unchanged
 * (owner, primary allocation, egg, image).
 */
import { z } from 'zod';
import type {
  JsonObject,
  ServerBuildPayload,
  ServerDetailsPayload,
  ServerStartupPayload,
} from '@hostpanel/shared';
import { attributesOf, displayValue, getNumber, getObject, getString } from '../../lib/document.js';
import { silentLogger, type Logger } from '../../lib/logger.js';
import { DEFAULT_FEATURE_LIMITS, currentStartup } from '../provisioning/derive.js';
import { basicsSchema, parseForm, resourcesSchema } from '../provisioning/schemas.js';
import { DEFAULT_RESOURCES } from '../provisioning/session.js';
import type { PanelClient } from '../resources/client.js';

export type DetailsForm = { name: string; description: string; externalId: string };
export type BuildForm = { memory: string; disk: string; cpu: string; swap: string; io: string };
export type StartupForm = { startup: string; environment: string };

export interface StartupPrefill extends StartupForm {
  eggId: number;
  image: string;
}

const startupSchema = z.object({
  startup: z
    .string({ required_error: 'Startup command is required' })
    .min(1, 'Startup command is required')
    .max(1000, 'Startup command must be at most 1000 characters'),
  environment: z.string().max(4000, 'Environment must be at most 4000 characters').default(''),
});

/** `KEY=VALUE` per line; blank lines and lines without `=` are skipped. */
export function parseEnvironmentLines(text: string): Record<string, string> {
  const environment: Record<string, string> = {};
  for (const raw of text.split(/\r?\n/)) {
    const line = raw.trim();
    const eq = line.indexOf('=');
    if (eq === -1) continue;
    const key = line.slice(0, eq).trim();
    if (key) environment[key] = line.slice(eq + 1).trim();
  }
  return environment;
}

export function renderEnvironmentLines(environment: JsonObject): string {
  return Object.entries(environment)
    .map(([key, value]) => `${key}=${displayValue(value)}`)
    .join('\n');
}

export class ServerEditService {
  private readonly log: Logger;

  constructor(
    private readonly client: PanelClient,
    logger: Logger = silentLogger,
  ) {
    this.log = logger;
  }

  async prefillDetails(serverId: number): Promise<DetailsForm> {
    const attributes = await this.load(serverId);
    return {
      name: getString(attributes, 'name') ?? '',
      description: getString(attributes, 'description') ?? '',
      externalId: getString(attributes, 'external_id') ?? '',
    };
  }

  async submitDetails(serverId: number, form: Partial<DetailsForm>): Promise<ServerDetailsPayload> {
    const values = parseForm(basicsSchema, toValues(form));
    const attributes = await this.load(serverId);
    const payload: ServerDetailsPayload = {
      name: values.name,
      user: getNumber(attributes, 'user') ?? 0,
      description: values.description,
    };
    if (values.externalId) payload.external_id = values.externalId;

    await this.client.updateServerDetails(serverId, payload);
    this.log.info({ serverId }, 'server details updated');
    return payload;
  }

  async prefillBuild(serverId: number): Promise<BuildForm> {
    const limits = getObject(await this.load(serverId), 'limits');
    const limit = (key: keyof typeof DEFAULT_RESOURCES): string =>
      String(getNumber(limits, key) ?? DEFAULT_RESOURCES[key]);
    return {
      memory: limit('memory'),
      disk: limit('disk'),
      cpu: limit('cpu'),
      swap: limit('swap'),
      io: limit('io'),
    };
  }

  async submitBuild(serverId: number, form: Partial<BuildForm>): Promise<ServerBuildPayload> {
    const limits = parseForm(resourcesSchema, toValues(form));
    const attributes = await this.load(serverId);
    const payload: ServerBuildPayload = {
      allocation: getNumber(attributes, 'allocation') ?? 0,
      limits,
      feature_limits: { ...DEFAULT_FEATURE_LIMITS },
    };

    await this.client.updateServerBuild(serverId, payload);
    this.log.info({ serverId }, 'server build updated');
    return payload;
  }

  async prefillStartup(serverId: number): Promise<StartupPrefill> {
    const attributes = await this.load(serverId);
    const container = getObject(attributes, 'container');
    return {
      startup: currentStartup(attributes),
      environment: renderEnvironmentLines(getObject(container, 'environment')),
      eggId: getNumber(attributes, 'egg') ?? 0,
      image: getString(container, 'image') ?? '',
    };
  }

  async submitStartup(serverId: number, form: Partial<StartupForm>): Promise<ServerStartupPayload> {
    const values = parseForm(startupSchema, toValues(form));
    const attributes = await this.load(serverId);
    const payload: ServerStartupPayload = {
      startup: values.startup,
      egg: getNumber(attributes, 'egg') ?? 0,
      image: getString(getObject(attributes, 'container'), 'image') ?? '',
      environment: parseEnvironmentLines(values.environment),
      skip_scripts: false,
    };

    await this.client.updateServerStartup(serverId, payload);
    this.log.info({ serverId }, 'server startup updated');
    return payload;
  }

  private async load(serverId: number): Promise<JsonObject> {
    return attributesOf(await this.client.getServer(serverId));
  }
}

/** Drops fields the caller left out so schema defaults apply. */
function toValues(form: Partial<Record<string, string>>): Record<string, string> {
  const values: Record<string, string> = {};
  for (const [key, value] of Object.entries(form)) {
    if (value !== undefined) values[key] = value;
  }
  return values;
}
