/**
 * Per-instance runtime control over the control API (`/api/client`):
 * live stats, power signals, reinstall.
 *
 * One component, two deployments (ControlCredentialMode):
 * - owner-scoped: transport carries a per-account client key
 * - admin-override: transport carries the management key and every request
 *   sets the ownership-bypass flag
 */
import type { ControlCredentialMode, JsonObject, PowerSignal, QueryParams } from '@hostpanel/shared';
import { asObject, getObject, getString } from '../../lib/document.js';
import type { PanelTransport } from '../../lib/transport.js';

/** Query flag that lets the management key act on servers it does not own. */
export const ADMIN_BYPASS_PARAM = 'admin_bypass';

export const POWER_SIGNALS = ['start', 'stop', 'restart', 'kill'] as const satisfies readonly PowerSignal[];

/** Length of the short identifier derived from a server UUID. */
const SHORT_IDENTIFIER_LENGTH = 8;

/**
 * The control API addresses servers by short identifier. Prefers the
 * explicit `identifier`, else the first 8 characters of `uuid`.
 */
export function resolveIdentifier(attributes: JsonObject): string | undefined {
  const identifier = getString(attributes, 'identifier');
  if (identifier) return identifier;
  const uuid = getString(attributes, 'uuid');
  return uuid ? uuid.slice(0, SHORT_IDENTIFIER_LENGTH) : undefined;
}

export class ControlClient {
  constructor(
    private readonly transport: PanelTransport,
    readonly mode: ControlCredentialMode,
  ) {}

  /** `attributes` block of `/servers/{id}/resources` (state + usage). */
  async getLiveStats(identifier: string): Promise<JsonObject> {
    const body = asObject(await this.transport.get(`/servers/${identifier}/resources`, this.query()));
    return getObject(body, 'attributes');
  }

  async sendPowerSignal(identifier: string, signal: PowerSignal): Promise<void> {
    await this.transport.request('POST', `/servers/${identifier}/power`, {
      body: { signal },
      query: this.query(),
    });
  }

  async reinstall(identifier: string): Promise<void> {
    await this.transport.request('POST', `/servers/${identifier}/reinstall`, {
      query: this.query(),
    });
  }

  private query(): QueryParams {
    return this.mode === 'admin-override' ? { [ADMIN_BYPASS_PARAM]: true } : {};
  }
}
