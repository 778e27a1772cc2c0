export * from './config/index.js';
export * from './types/index.js';
export { createLogger, buildLoggerOptions, silentLogger, type Logger } from './lib/logger.js';
export * from './lib/document.js';
export * from './lib/format.js';
export * from './lib/transport.js';
export * from './lib/paginator.js';

export * from './modules/resources/client.js';
export * from './modules/resources/payloads.js';
export * from './modules/resources/queries.js';

export * from './modules/control/client.js';
export * from './modules/control/status.js';

export * from './modules/provisioning/session.js';
export * from './modules/provisioning/derive.js';
export * from './modules/provisioning/schemas.js';
export * from './modules/provisioning/prompts.js';
export * from './modules/provisioning/stages.js';
export * from './modules/provisioning/workflow.js';
export * from './modules/provisioning/session-store.js';

export * from './modules/server-edits/service.js';

export * from './console.js';
