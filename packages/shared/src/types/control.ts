/**
 * Control API (`/api/client`) types: live stats and power actions.
 */

export type PowerSignal = 'start' | 'stop' | 'restart' | 'kill';

/**
 * How control requests authenticate:
 * - owner-scoped: a per-account client key, acting as the server's owner
 * - admin-override: the management key plus the ownership-bypass flag
 */
export type ControlCredentialMode = 'owner-scoped' | 'admin-override';

export type ServerState = 'running' | 'starting' | 'stopping' | 'offline' | 'unknown';
