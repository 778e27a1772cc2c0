/**
 * Wires one console: a transport per API surface, the clients over them,
 * the wizard session store and the edit service. `close()` releases all of
 * it once.
 */
import type { ControlCredentialMode } from '@hostpanel/shared';
import { resolveControlMode, type Env } from './config/index.js';
import { silentLogger, type Logger } from './lib/logger.js';
import { PanelTransport } from './lib/transport.js';
import { ControlClient } from './modules/control/client.js';
import { WizardSessionStore } from './modules/provisioning/session-store.js';
import { CreationWorkflow } from './modules/provisioning/workflow.js';
import { PanelClient } from './modules/resources/client.js';
import { ServerEditService } from './modules/server-edits/service.js';

export type ConsoleConfig = Pick<
  Env,
  | 'PANEL_URL'
  | 'PANEL_APPLICATION_KEY'
  | 'PANEL_CLIENT_KEY'
  | 'PANEL_CONTROL_MODE'
  | 'PANEL_REQUEST_TIMEOUT_MS'
  | 'PANEL_WIZARD_IDLE_TIMEOUT_MS'
>;

export interface PanelConsole {
  readonly panel: PanelClient;
  readonly control: ControlClient;
  readonly wizards: WizardSessionStore;
  readonly edits: ServerEditService;
  readonly controlMode: ControlCredentialMode;
  close(): void;
}

export function createPanelConsole(
  config: ConsoleConfig,
  logger: Logger = silentLogger,
  fetchImpl?: typeof fetch,
): PanelConsole {
  const controlMode = resolveControlMode(config);

  const management = new PanelTransport({
    baseUrl: `${config.PANEL_URL}/api/application`,
    apiKey: config.PANEL_APPLICATION_KEY,
    timeoutMs: config.PANEL_REQUEST_TIMEOUT_MS,
    logger: logger.child({ api: 'application' }),
    fetch: fetchImpl,
  });

  const controlKey =
    controlMode === 'owner-scoped' && config.PANEL_CLIENT_KEY !== undefined
      ? config.PANEL_CLIENT_KEY
      : config.PANEL_APPLICATION_KEY;
  const controlTransport = new PanelTransport({
    baseUrl: `${config.PANEL_URL}/api/client`,
    apiKey: controlKey,
    timeoutMs: config.PANEL_REQUEST_TIMEOUT_MS,
    logger: logger.child({ api: 'client' }),
    fetch: fetchImpl,
  });

  const panel = new PanelClient(management);
  const control = new ControlClient(controlTransport, controlMode);
  const wizards = new WizardSessionStore({
    idleTimeoutMs: config.PANEL_WIZARD_IDLE_TIMEOUT_MS,
    createWorkflow: () => new CreationWorkflow(panel, logger.child({ component: 'wizard' })),
    logger,
  });
  const edits = new ServerEditService(panel, logger);

  let closed = false;
  return {
    panel,
    control,
    wizards,
    edits,
    controlMode,
    close() {
      if (closed) return;
      closed = true;
      wizards.closeAll();
      management.close();
      controlTransport.close();
      logger.info('panel console closed');
    },
  };
}
