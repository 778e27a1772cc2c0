/**
 * Pure derivations used by the creation wizard: image choices and
 * environment from an egg, IO clamping, and the final create payload.
 */
import type { CreateServerPayload, FeatureLimits, JsonObject } from '@hostpanel/shared';
import {
  displayValue,
  getObject,
  getString,
  isJsonObject,
  relationshipAttributes,
} from '../../lib/document.js';
import type { CreationSession } from './session.js';

/** Offered when an egg declares no image at all. */
export const FALLBACK_IMAGE = 'ghcr.io/pterodactyl/yolks:java_17';

export const IO_WEIGHT_MIN = 10;
export const IO_WEIGHT_MAX = 1000;

export const DEFAULT_FEATURE_LIMITS: FeatureLimits = {
  databases: 5,
  backups: 3,
  allocations: 1,
};

/**
 * Image choices for an egg, label → image tag:
 * 1. its `docker_images` map
 * 2. else its single `docker_image`, labelled by the tag after the last `:`
 * 3. else `{ default: FALLBACK_IMAGE }`
 */
export function deriveImageMap(eggAttributes: JsonObject): Record<string, string> {
  const images: Record<string, string> = {};

  const declared = eggAttributes['docker_images'];
  if (isJsonObject(declared)) {
    for (const [label, tag] of Object.entries(declared)) {
      if (typeof tag === 'string') images[label] = tag;
    }
  }

  const single = getString(eggAttributes, 'docker_image');
  if (Object.keys(images).length === 0 && single) {
    const label = single.includes(':') ? single.slice(single.lastIndexOf(':') + 1) : single;
    images[label] = single;
  }

  if (Object.keys(images).length === 0) {
    images['default'] = FALLBACK_IMAGE;
  }

  return images;
}

/** `env_variable → default_value` for every declared variable; null defaults become `''`. */
export function collectEnvironment(eggAttributes: JsonObject): Record<string, string> {
  const environment: Record<string, string> = {};
  for (const variable of relationshipAttributes(eggAttributes, 'variables')) {
    const key = getString(variable, 'env_variable');
    if (key) environment[key] = displayValue(variable['default_value']);
  }
  return environment;
}

export function clampIoWeight(value: number): number {
  return Math.max(IO_WEIGHT_MIN, Math.min(IO_WEIGHT_MAX, value));
}

/** Startup command of an existing server: container override first. */
export function currentStartup(serverAttributes: JsonObject): string {
  const container = getObject(serverAttributes, 'container');
  return getString(container, 'startup_command') || getString(serverAttributes, 'startup') || '';
}

/**
 * Body of `POST /servers`. Description and external id are left out
 * entirely when empty.
 */
export function buildCreatePayload(session: CreationSession): CreateServerPayload {
  const payload: CreateServerPayload = {
    name: session.name,
    user: session.userId,
    egg: session.eggId,
    docker_image: session.dockerImage,
    startup: session.startup,
    environment: { ...session.environment },
    limits: {
      memory: session.memory,
      swap: session.swap,
      disk: session.disk,
      io: session.io,
      cpu: session.cpu,
    },
    feature_limits: { ...DEFAULT_FEATURE_LIMITS },
    allocation: { default: session.allocationId },
    start_on_completion: false,
    skip_scripts: false,
  };
  if (session.description) payload.description = session.description;
  if (session.externalId) payload.external_id = session.externalId;
  return payload;
}
