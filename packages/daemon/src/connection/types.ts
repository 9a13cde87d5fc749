import type { ConnectionConfig } from '@broker-daemon/shared';
import type { EventListener } from '../events/gateway-event.js';

/**
 * Named event on a connection that subscribers can attach to
 */
export interface EventSource {
  readonly name: string;
  connect(listener: EventListener): unknown;
  disconnect(listener: EventListener): unknown;
}

/**
 * Broker gateway connection as seen by the daemon
 */
export interface GatewayConnection {
  /**
   * Open the session. Rejects when the gateway cannot be reached or refuses the client.
   */
  connect(options: ConnectionConfig): Promise<void>;
  /**
   * Close the session. May throw or reject; callers isolate teardown errors.
   */
  disconnect(): Promise<void> | void;
  isConnected(): boolean;
  /**
   * Dispatch loop: resolves once the session ends, rejects on a fatal error
   */
  run(): Promise<void>;
  /**
   * Event with exactly this name, if the connection has one
   */
  getEvent(name: string): EventSource | undefined;
}
