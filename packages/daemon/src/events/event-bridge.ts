/**
 * Event bridge from gateway events to SignalHub signals.
 *
 * While patched, every GatewayEvent emission in the process is republished on
 * the signal of the same name, after the event's own subscribers have run.
 */

import { createLogger, type Logger } from '@broker-daemon/shared';
import { GatewayEvent, type EmissionSink } from './gateway-event.js';
import { SignalHub, type Signal } from './signal-hub.js';
import { BridgeError, describeError } from '../errors.js';

export class EventBridge {
  private static patched = false;
  private static logger: Logger | null = null;

  private static readonly mirror: EmissionSink = (event, args) => {
    try {
      SignalHub.getInstance().signal(event.name).send(event, ...args);
    } catch (error) {
      const failure = new BridgeError(`Error in signal bridge for event ${event.name}: ${describeError(error)}`, {
        cause: error,
      });
      EventBridge.getLogger().error(failure.message, { event: event.name });
    }
  };

  /**
   * Use this logger for bridge messages (defaults to a console logger)
   */
  static useLogger(logger: Logger): void {
    EventBridge.logger = logger;
  }

  /**
   * Start mirroring every event emission onto SignalHub. No-op when already patched.
   */
  static patch(): void {
    if (EventBridge.patched) {
      EventBridge.getLogger().warn('EventBridge is already patched');
      return;
    }

    GatewayEvent.addSink(EventBridge.mirror);
    EventBridge.patched = true;
    EventBridge.getLogger().info('EventBridge patch applied');
  }

  /**
   * Restore plain event emission. No-op when not patched.
   */
  static unpatch(): void {
    if (!EventBridge.patched) {
      EventBridge.getLogger().warn('EventBridge is not patched');
      return;
    }

    GatewayEvent.removeSink(EventBridge.mirror);
    EventBridge.patched = false;
    EventBridge.getLogger().info('EventBridge patch removed');
  }

  static isPatched(): boolean {
    return EventBridge.patched;
  }

  /**
   * Signal that mirrors the event with this name
   */
  static getSignal(eventName: string): Signal {
    return SignalHub.getInstance().signal(eventName);
  }

  private static getLogger(): Logger {
    if (!EventBridge.logger) {
      EventBridge.logger = createLogger({ service: 'event-bridge', file: false });
    }
    return EventBridge.logger;
  }
}
