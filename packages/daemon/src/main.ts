#!/usr/bin/env node
/**
 * Broker Event Daemon - entry point
 *
 * Integrates:
 * - HandlerLoader / EventRegistry: handler scripts from BROKER_DAEMON_HANDLERS
 * - WsGatewayConnection: session with the broker gateway
 * - ConnectionManager: connect-with-retry and the dispatch loop
 * - EventBridge: optional mirroring of every event onto SignalHub
 */

import { realpathSync } from 'fs';
import { pathToFileURL } from 'url';
import {
  ConfigError,
  createLogger,
  loadConfig,
  loadEnvFromRoot,
  type DaemonConfig,
  type Logger,
} from '@broker-daemon/shared';
import { WsGatewayConnection } from './connection/ws-gateway-connection.js';
import { ConnectionManager } from './daemon/connection-manager.js';
import { ConnectionFailureError, describeError } from './errors.js';
import { EventBridge } from './events/event-bridge.js';
import { EventRegistry } from './registry/event-registry.js';

/**
 * One daemon: registry, connection and manager built from a config
 */
class BrokerEventDaemon {
  readonly registry: EventRegistry;
  readonly manager: ConnectionManager;

  constructor(
    private readonly config: DaemonConfig,
    private readonly logger: Logger
  ) {
    this.registry = new EventRegistry({ logger: logger.child({ component: 'registry' }) });
    this.manager = new ConnectionManager({
      connection: new WsGatewayConnection({ logger: logger.child({ component: 'connection' }) }),
      connectionConfig: config.connection,
      retryPolicy: config.retry,
      registry: this.registry,
      logger: logger.child({ component: 'manager' }),
    });
  }

  async start(): Promise<void> {
    this.logger.info('Starting broker event daemon...');

    if (this.config.eventBridge) {
      EventBridge.useLogger(this.logger.child({ component: 'event-bridge' }));
      EventBridge.patch();
    }

    const report = await this.registry.discoverHandlers(this.config.handlerPaths);
    this.logger.info('Handler discovery finished', {
      files: report.loaded.length,
      failed: report.failed.length,
      registrations: report.registrations,
      setupHooks: report.setupHooks,
    });

    await this.manager.start();
  }

  async stop(): Promise<void> {
    await this.manager.stop();
    if (EventBridge.isPatched()) {
      EventBridge.unpatch();
    }
  }
}

/**
 * Main entry point
 */
async function main(): Promise<void> {
  loadEnvFromRoot();

  let config: DaemonConfig;
  try {
    config = loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error('❌ Invalid configuration:');
      error.issues.forEach((issue) => console.error(`   ${issue}`));
      process.exit(1);
    }
    throw error;
  }

  const logger = createLogger({
    service: 'broker-daemon',
    level: config.log.level,
    console: config.log.console,
    file: config.log.file,
    logDir: config.log.dir,
    telegramToken: config.log.telegramToken,
    telegramChatId: config.log.telegramChatId,
    telegramLevels: config.log.telegramLevels,
  });

  const daemon = new BrokerEventDaemon(config, logger);

  // Handle graceful shutdown
  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`Received ${signal}, shutting down`);
    try {
      await daemon.stop();
    } finally {
      await logger.close();
    }
    process.exit(0);
  };
  const onSignal = (signal: string) => {
    shutdown(signal).catch((error) => {
      console.error('❌ Shutdown failed:', error);
      process.exit(1);
    });
  };

  process.on('SIGINT', () => onSignal('SIGINT'));
  process.on('SIGTERM', () => onSignal('SIGTERM'));

  try {
    await daemon.start();
    if (!shuttingDown) {
      logger.info('Gateway session ended');
      await logger.close();
    }
  } catch (error) {
    if (error instanceof ConnectionFailureError) {
      logger.error(`${error.message}: ${describeError(error.cause)}`);
    } else {
      logger.error('Broker event daemon failed', { error: describeError(error) });
    }
    await logger.close();
    process.exit(1);
  }
}

/**
 * Whether the module at `moduleUrl` is the script Node was started with,
 * also when started through a symlink such as an npm bin link
 */
function isEntryPoint(moduleUrl: string, scriptPath: string | undefined = process.argv[1]): boolean {
  if (!scriptPath) return false;
  try {
    return pathToFileURL(realpathSync(scriptPath)).href === moduleUrl;
  } catch {
    return false;
  }
}

// Run if executed directly
if (isEntryPoint(import.meta.url)) {
  main().catch((error) => {
    console.error('❌ Fatal error:', error);
    process.exit(1);
  });
}

export { BrokerEventDaemon, isEntryPoint, main };
