/**
 * Host panel MCP bridge: exposes the console as MCP tools over stdio.
 *
 * Requires PANEL_URL + PANEL_APPLICATION_KEY; PANEL_CLIENT_KEY switches
 * power/status tools to the owner-scoped control key.
 * Logs go to stderr; stdout carries the protocol.
 */
import 'dotenv/config';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { createLogger, createPanelConsole, describeError, getConfig } from '@hostpanel/api-client';
import { createBridgeServer } from './server.js';

async function main() {
  const config = getConfig();
  const logger = createLogger(config);
  const panelConsole = createPanelConsole(config, logger);
  const server = createBridgeServer(panelConsole);

  let stopping = false;
  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    if (stopping) return;
    stopping = true;
    logger.info({ signal }, 'shutting down');
    panelConsole.close();
    await server.close();
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).then(
        () => process.exit(0),
        (e: unknown) => {
          logger.error({ err: e }, 'shutdown failed');
          process.exit(1);
        },
      );
    });
  }

  await server.connect(new StdioServerTransport());
  logger.info({ panel: config.PANEL_URL, controlMode: panelConsole.controlMode }, 'mcp bridge ready');
}

main().catch((e: unknown) => {
  process.stderr.write(`Fatal: ${describeError(e)}\n`);
  process.exit(1);
});
