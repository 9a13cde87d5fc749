import { vi } from 'vitest';
import { createSilentLogger, type ConnectionConfig } from '@broker-daemon/shared';
import type { EventListener } from '../events/gateway-event.js';
import { GatewayEvent } from '../events/gateway-event.js';
import type { EventSource, GatewayConnection } from '../connection/types.js';

/**
 * In-process GatewayConnection whose outcomes tests script
 */
export class FakeConnection implements GatewayConnection {
  readonly events = new Map<string, GatewayEvent>();
  /** Outcome of each connect() call in turn; missing entries succeed */
  connectOutcomes: Array<'ok' | Error> = [];
  disconnectError: Error | null = null;
  connected = false;
  private endRun: (() => void) | null = null;
  private failRun: ((error: Error) => void) | null = null;

  readonly connect = vi.fn(async (_options: ConnectionConfig): Promise<void> => {
    const outcome = this.connectOutcomes.shift() ?? 'ok';
    if (outcome instanceof Error) {
      throw outcome;
    }
    this.connected = true;
  });

  readonly disconnect = vi.fn(async (): Promise<void> => {
    if (this.disconnectError) {
      throw this.disconnectError;
    }
    this.connected = false;
    this.endRun?.();
  });

  readonly run = vi.fn(
    () =>
      new Promise<void>((resolve, reject) => {
        this.endRun = () => {
          this.endRun = null;
          resolve();
        };
        this.failRun = reject;
      })
  );

  constructor(eventNames: readonly string[] = ['barUpdateEvent', 'orderStatusEvent']) {
    const logger = createSilentLogger();
    for (const name of eventNames) {
      this.events.set(name, new GatewayEvent(name, logger));
    }
  }

  isConnected(): boolean {
    return this.connected;
  }

  getEvent(name: string): EventSource | undefined {
    return this.events.get(name);
  }

  /** Fire an event as the gateway would */
  fire(name: string, ...args: unknown[]): void {
    this.events.get(name)?.emit(...args);
  }

  /** Simulate the gateway dropping the session */
  drop(): void {
    this.connected = false;
    this.endRun?.();
  }

  /** Make the running loop fail */
  crash(error: Error): void {
    this.connected = false;
    this.failRun?.(error);
  }
}

/**
 * Event source whose subscriptions tests can count or break
 */
export function createRecordingEvent(name: string, failOn?: (listener: EventListener) => boolean) {
  const listeners: EventListener[] = [];
  const source: EventSource = {
    name,
    connect: vi.fn((listener: EventListener) => {
      if (failOn?.(listener)) {
        throw new Error(`cannot subscribe to ${name}`);
      }
      listeners.push(listener);
    }),
    disconnect: vi.fn(),
  };
  return { source, listeners };
}
