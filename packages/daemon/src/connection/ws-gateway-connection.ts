import WebSocket from 'ws';
import type { ConnectionConfig, Logger } from '@broker-daemon/shared';
import { GatewayEvent } from '../events/gateway-event.js';
import { DEFAULT_EVENT_NAMES } from './event-names.js';
import { parseServerFrame, serializeFrame, type ServerFrame } from './protocol.js';
import type { GatewayConnection } from './types.js';

/**
 * Configuration for WsGatewayConnection
 */
export interface WsGatewayConnectionConfig {
  logger: Logger;
  /** Events exposed to handlers */
  eventNames?: readonly string[];
  /** Full WebSocket URL; defaults to ws://host:port from the connect options */
  endpoint?: string;
}

interface PendingConnect {
  resolve: () => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

/**
 * WsGatewayConnection - WebSocket client for a JSON event gateway
 *
 * Handles the hello/welcome handshake and turns every `event` frame into an
 * emission of the same-named GatewayEvent.
 *
 * @example
 * ```typescript
 * const connection = new WsGatewayConnection({ logger });
 *
 * connection.getEvent('orderStatusEvent')?.connect((trade) => {
 *   console.log('Order status:', trade);
 * });
 *
 * await connection.connect(config.connection);
 * await connection.run(); // until the gateway closes the session
 * ```
 */
export class WsGatewayConnection implements GatewayConnection {
  private readonly logger: Logger;
  private readonly endpoint?: string;
  private readonly events = new Map<string, GatewayEvent>();
  private ws: WebSocket | null = null;
  private connected = false;
  private pending: PendingConnect | null = null;
  private closeWaiters: Array<() => void> = [];

  constructor(config: WsGatewayConnectionConfig) {
    this.logger = config.logger;
    this.endpoint = config.endpoint;

    for (const name of config.eventNames ?? DEFAULT_EVENT_NAMES) {
      this.events.set(name, new GatewayEvent(name, this.logger));
    }
  }

  isConnected(): boolean {
    return this.connected && this.ws?.readyState === WebSocket.OPEN;
  }

  getEvent(name: string): GatewayEvent | undefined {
    return this.events.get(name);
  }

  eventNames(): string[] {
    return [...this.events.keys()];
  }

  /**
   * Open the socket and complete the handshake
   *
   * @throws {Error} On socket error, gateway refusal, or no welcome within `timeout` seconds
   */
  async connect(options: ConnectionConfig): Promise<void> {
    if (this.isConnected()) {
      return;
    }

    const url = this.endpoint ?? `ws://${options.host}:${options.port}`;
    const timeoutMs = options.timeout * 1000;

    return new Promise((resolve, reject) => {
      const ws = new WebSocket(url, { handshakeTimeout: timeoutMs });
      this.ws = ws;
      this.pending = {
        resolve,
        reject,
        timer: setTimeout(() => {
          this.failPending(new Error(`Timed out after ${options.timeout}s waiting for gateway at ${url}`));
          ws.terminate();
        }, timeoutMs),
      };

      ws.on('open', () => {
        ws.send(
          serializeFrame({
            type: 'hello',
            clientId: options.clientId,
            readonly: options.readonly,
            account: options.account,
          })
        );
      });

      ws.on('message', (data) => {
        this.handleMessage(ws, data.toString());
      });

      ws.on('error', (error) => {
        this.logger.error('Gateway socket error', { url, error: error.message });
        this.failPending(error);
      });

      ws.on('close', () => {
        this.handleClose(ws);
      });
    });
  }

  /**
   * Resolves when the session ends
   *
   * @throws {Error} If not connected
   */
  async run(): Promise<void> {
    if (!this.isConnected()) {
      throw new Error('Not connected');
    }

    return new Promise((resolve) => {
      this.closeWaiters.push(resolve);
    });
  }

  /**
   * Say goodbye and close the socket. Resolves once the socket is closed.
   */
  async disconnect(): Promise<void> {
    const ws = this.ws;
    if (!ws || ws.readyState === WebSocket.CLOSED) {
      return;
    }

    return new Promise((resolve) => {
      ws.once('close', () => resolve());
      if (ws.readyState === WebSocket.OPEN) {
        ws.send(serializeFrame({ type: 'bye' }));
      }
      ws.close();
    });
  }

  private handleMessage(ws: WebSocket, raw: string): void {
    let frame: ServerFrame;
    try {
      frame = parseServerFrame(raw);
    } catch (error) {
      this.logger.warn('Dropping gateway frame', {
        error: error instanceof Error ? error.message : String(error),
      });
      return;
    }

    switch (frame.type) {
      case 'welcome': {
        const pending = this.pending;
        if (!pending) return;
        this.pending = null;
        clearTimeout(pending.timer);
        this.connected = true;
        this.logger.info('Gateway session established', { serverVersion: frame.serverVersion });
        pending.resolve();
        this.events.get('connectedEvent')?.emit();
        return;
      }

      case 'error':
        if (this.pending) {
          this.failPending(new Error(`Gateway refused connection: ${frame.message}`));
          ws.close();
          return;
        }
        this.logger.error('Gateway error', { code: frame.code, message: frame.message });
        this.events.get('errorEvent')?.emit(frame.code, frame.message);
        return;

      case 'event': {
        const event = this.events.get(frame.event);
        if (!event) {
          this.logger.debug('No such event on connection, dropping', { event: frame.event });
          return;
        }
        event.emit(...frame.args);
        return;
      }
    }
  }

  private handleClose(ws: WebSocket): void {
    if (this.ws !== ws) return;

    const wasConnected = this.connected;
    this.ws = null;
    this.connected = false;
    this.failPending(new Error('Gateway closed the connection during handshake'));

    for (const resolve of this.closeWaiters.splice(0)) {
      resolve();
    }

    if (wasConnected) {
      this.logger.info('Gateway session closed');
      this.events.get('disconnectedEvent')?.emit();
    }
  }

  private failPending(error: Error): void {
    const pending = this.pending;
    if (!pending) return;
    this.pending = null;
    clearTimeout(pending.timer);
    pending.reject(error);
  }
}
