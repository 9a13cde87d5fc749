/**
 * @broker-daemon/shared - Configuration, schemas, and logging
 *
 * Shared by the daemon and by handler scripts that want the same logger setup.
 */

export * from './schemas/index.js';
export * from './config.js';
export * from './logger.js';
export * from './utils/load-env.js';
