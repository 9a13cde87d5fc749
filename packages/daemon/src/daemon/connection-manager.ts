/**
 * Connection Manager - owns the gateway connection lifecycle
 *
 * Connects with a bounded, fixed-delay retry policy, hands the live connection
 * to the EventRegistry for binding, and runs the dispatch loop.
 *
 * @example
 * ```typescript
 * const manager = new ConnectionManager({
 *   connection: new WsGatewayConnection({ logger }),
 *   connectionConfig: config.connection,
 *   retryPolicy: config.retry,
 *   registry,
 *   logger,
 * });
 *
 * await manager.start(); // until the gateway closes the session
 * ```
 */

import type { ConnectionConfig, Logger, RetryPolicy } from '@broker-daemon/shared';
import type { GatewayConnection } from '../connection/types.js';
import type { EventRegistry } from '../registry/event-registry.js';
import { ConnectionFailureError, TeardownError, describeError } from '../errors.js';

export type ConnectionState = 'disconnected' | 'connecting' | 'connected';

export type Sleep = (ms: number) => Promise<void>;

export interface ConnectionManagerOptions {
  connection: GatewayConnection;
  connectionConfig: ConnectionConfig;
  retryPolicy: RetryPolicy;
  /** Bound to the connection on the first successful connect */
  registry?: EventRegistry;
  logger: Logger;
  /** Delay between attempts; defaults to a timer */
  sleep?: Sleep;
}

const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export class ConnectionManager {
  readonly connection: GatewayConnection;
  private readonly connectionConfig: ConnectionConfig;
  private readonly retryPolicy: RetryPolicy;
  private readonly registry?: EventRegistry;
  private readonly logger: Logger;
  private readonly sleep: Sleep;

  private state: ConnectionState = 'disconnected';
  private connecting: Promise<void> | null = null;
  private handlersBound = false;
  private stopping = false;

  constructor(options: ConnectionManagerOptions) {
    this.connection = options.connection;
    this.connectionConfig = options.connectionConfig;
    this.retryPolicy = options.retryPolicy;
    this.registry = options.registry;
    this.logger = options.logger;
    this.sleep = options.sleep ?? defaultSleep;
  }

  getState(): ConnectionState {
    return this.state;
  }

  /**
   * Connect, trying up to `maxRetries + 1` times with `retryDelay` seconds
   * between attempts. Concurrent calls share one attempt sequence. A stop()
   * during the sequence ends it without a session.
   *
   * @throws {ConnectionFailureError} When every attempt failed
   */
  connect(): Promise<void> {
    if (this.state === 'connected' && this.connection.isConnected()) {
      return Promise.resolve();
    }
    if (!this.connecting) {
      this.stopping = false;
      this.connecting = this.establish().finally(() => {
        this.connecting = null;
      });
    }
    return this.connecting;
  }

  /**
   * Connect if needed, seal the registry and run the dispatch loop until the
   * session ends. With `autoReconnect`, a dropped session is re-established and
   * the loop re-entered until stop() is called.
   */
  async start(): Promise<void> {
    this.stopping = false;
    await this.connect();
    if (this.stopping) {
      this.logger.info('Stopped before the dispatch loop started');
      return;
    }
    this.registry?.seal();

    for (;;) {
      this.logger.info('Dispatch loop started');
      try {
        await this.connection.run();
      } finally {
        this.state = 'disconnected';
      }

      if (this.stopping || !this.retryPolicy.autoReconnect) break;

      this.logger.warn('Gateway session ended, reconnecting');
      await this.connect();
      if (this.stopping) break;
    }

    this.logger.info('Dispatch loop ended');
  }

  async stop(): Promise<void> {
    this.stopping = true;
    this.logger.info('Stopping broker event daemon');
    await this.disconnect();
  }

  /**
   * Tear down the session if there is one. Never throws: teardown errors are logged.
   */
  async disconnect(): Promise<void> {
    if (!this.hasSession()) {
      this.logger.debug('Disconnect requested while not connected');
      return;
    }

    try {
      await this.connection.disconnect();
      this.logger.info('Disconnected from gateway');
    } catch (cause) {
      const failure = new TeardownError(`Error during disconnect: ${describeError(cause)}`, { cause });
      this.logger.error(failure.message);
    } finally {
      this.state = 'disconnected';
    }
  }

  private hasSession(): boolean {
    if (this.state === 'connected') return true;
    try {
      return this.connection.isConnected();
    } catch (error) {
      // Unknown state: attempt teardown anyway
      this.logger.warn('Could not read connection state', { error: describeError(error) });
      return true;
    }
  }

  private async establish(): Promise<void> {
    const { host, port, clientId } = this.connectionConfig;
    const { maxRetries, retryDelay } = this.retryPolicy;
    let lastError: unknown;

    this.state = 'connecting';

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      if (attempt > 0) {
        await this.sleep(retryDelay * 1000);
        if (this.stopping) {
          this.logger.info('Stopped while retrying, giving up the connection', { attempt });
          this.state = 'disconnected';
          return;
        }
      }

      try {
        this.logger.info(`Connecting to gateway at ${host}:${port}`, { clientId, attempt });
        await this.connection.connect(this.connectionConfig);
        if (!this.connection.isConnected()) {
          throw new Error('Gateway session is not live after connect');
        }
      } catch (error) {
        lastError = error;
        this.logger.error(`Connection attempt ${attempt} failed: ${describeError(error)}`, {
          attempt,
          maxRetries,
        });
        continue;
      }

      this.state = 'connected';
      if (this.stopping) {
        this.logger.info('Stopped while connecting, closing the new session');
        await this.disconnect();
        return;
      }

      this.logger.info(`Connected to gateway at ${host}:${port}`, { clientId, attempt });
      await this.bindHandlers();
      return;
    }

    this.state = 'disconnected';
    throw new ConnectionFailureError(maxRetries + 1, { cause: lastError });
  }

  /**
   * Bind the registry and run setup hooks, once per manager
   */
  private async bindHandlers(): Promise<void> {
    if (!this.registry || this.handlersBound) return;
    this.handlersBound = true;

    const report = this.registry.bindToConnection(this.connection);
    const setupFailures = await this.registry.runSetupHooks(this.connection);

    this.logger.info('Handlers bound to connection', {
      bound: report.bound,
      missingEvents: report.missingEvents,
      failures: report.failures.length + setupFailures.length,
    });
  }
}
