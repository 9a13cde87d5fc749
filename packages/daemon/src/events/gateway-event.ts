import type { Logger } from '@broker-daemon/shared';

/**
 * Subscriber of a gateway event. Receives the event payload positionally.
 */
export type EventListener = (...args: unknown[]) => unknown;

/**
 * Receives every emission of every GatewayEvent in the process, after the
 * event's own subscribers have run.
 */
export type EmissionSink = (event: GatewayEvent, args: readonly unknown[]) => void;

// Process-wide: sinks see events of every connection
const sinks: EmissionSink[] = [];

/**
 * GatewayEvent - named notification channel on a gateway connection
 *
 * Subscribers run in subscription order. A subscriber that throws is logged and
 * the remaining subscribers still run. After the subscribers, every registered
 * emission sink receives the same payload.
 *
 * @example
 * ```typescript
 * const barUpdate = new GatewayEvent('barUpdateEvent', logger);
 * barUpdate.connect((bars, hasNewBar) => console.log(bars, hasNewBar));
 * barUpdate.emit(bars, true);
 * ```
 */
export class GatewayEvent {
  private listeners: EventListener[] = [];

  constructor(
    readonly name: string,
    private readonly logger: Logger
  ) {}

  /**
   * Append a subscriber. The same listener may be connected more than once.
   */
  connect(listener: EventListener): this {
    this.listeners.push(listener);
    return this;
  }

  /**
   * Remove the first matching subscription
   *
   * @returns Whether a subscription was removed
   */
  disconnect(listener: EventListener): boolean {
    const index = this.listeners.indexOf(listener);
    if (index === -1) return false;
    this.listeners.splice(index, 1);
    return true;
  }

  listenerCount(): number {
    return this.listeners.length;
  }

  /**
   * Notify subscribers, then emission sinks
   */
  emit(...args: unknown[]): void {
    // Snapshot: subscribers may (dis)connect while being notified
    for (const listener of [...this.listeners]) {
      try {
        listener(...args);
      } catch (error) {
        this.logger.error(`Subscriber of ${this.name} failed`, {
          event: this.name,
          listener: listener.name || '<anonymous>',
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    for (const sink of [...sinks]) {
      sink(this, args);
    }
  }

  /**
   * Register a process-wide emission sink
   */
  static addSink(sink: EmissionSink): void {
    sinks.push(sink);
  }

  /**
   * Remove a previously registered sink
   *
   * @returns Whether the sink was registered
   */
  static removeSink(sink: EmissionSink): boolean {
    const index = sinks.indexOf(sink);
    if (index === -1) return false;
    sinks.splice(index, 1);
    return true;
  }

  static hasSink(sink: EmissionSink): boolean {
    return sinks.includes(sink);
  }
}
