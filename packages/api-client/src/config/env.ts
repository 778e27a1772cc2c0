import { z } from 'zod';
import type { ControlCredentialMode } from '@hostpanel/shared';
import { ConfigError } from '../types/index.js';

/**
 * Zod schema for all environment variables.
 * Validation fails fast at startup if any required var is missing or invalid.
 */
const envSchema = z.object({
  PANEL_NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PANEL_LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),

  // Panel
  PANEL_URL: z
    .string()
    .url()
    .transform((url) => url.replace(/\/+$/, '')),
  PANEL_APPLICATION_KEY: z.string().min(1),
  PANEL_CLIENT_KEY: z.string().min(1).optional(),
  // Unset: owner-scoped when a client key is configured, admin-override otherwise
  PANEL_CONTROL_MODE: z.enum(['owner', 'admin']).optional(),

  PANEL_REQUEST_TIMEOUT_MS: z.coerce.number().int().min(1000).default(30000),
  // Idle lifetime of an in-progress creation wizard
  PANEL_WIZARD_IDLE_TIMEOUT_MS: z.coerce.number().int().min(1000).default(180000),
});

export type Env = z.infer<typeof envSchema>;

let _env: Env | null = null;

/** Treat blank values as unset so `FOO=` in a .env file falls back to the default. */
function withoutBlanks(raw: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (value !== undefined && value.trim() !== '') out[key] = value;
  }
  return out;
}

/**
 * Parse and validate environment variables.
 * Throws a ConfigError listing every problem on failure.
 * Returns cached result on subsequent calls.
 */
export function parseEnv(raw: NodeJS.ProcessEnv = process.env): Env {
  if (_env !== null) return _env;

  const result = envSchema.safeParse(withoutBlanks(raw));

  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  - ${e.path.join('.')}: ${e.message}`)
      .join('\n');
    throw new ConfigError(`Invalid environment configuration:\n${errors}\n\nCheck your .env file.`);
  }

  if (result.data.PANEL_CONTROL_MODE === 'owner' && result.data.PANEL_CLIENT_KEY === undefined) {
    throw new ConfigError(
      'Invalid environment configuration:\n  - PANEL_CLIENT_KEY: required when PANEL_CONTROL_MODE=owner',
    );
  }

  _env = result.data;
  return _env;
}

/** Picks the control credential mode from which keys are configured. */
export function resolveControlMode(
  env: Pick<Env, 'PANEL_CONTROL_MODE' | 'PANEL_CLIENT_KEY'>,
): ControlCredentialMode {
  if (env.PANEL_CONTROL_MODE === 'admin') return 'admin-override';
  if (env.PANEL_CONTROL_MODE === 'owner') return 'owner-scoped';
  return env.PANEL_CLIENT_KEY !== undefined ? 'owner-scoped' : 'admin-override';
}

/** Reset cached env (tests only) */
export function _resetEnvCache(): void {
  _env = null;
}
