import { EventEmitter } from 'events';

/**
 * Receiver of a mirrored event: the emitting event first, then its payload
 */
export type SignalReceiver = (sender: unknown, ...args: unknown[]) => void;

/**
 * Named channel on the SignalHub
 */
export interface Signal {
  readonly name: string;
  connect(receiver: SignalReceiver): void;
  disconnect(receiver: SignalReceiver): void;
  /**
   * Deliver to every receiver. Errors thrown by receivers propagate to the sender.
   *
   * @returns Whether any receiver was connected
   */
  send(sender: unknown, ...args: unknown[]): boolean;
  receiverCount(): number;
}

/**
 * SignalHub - process-wide publish/subscribe namespace keyed by signal name
 *
 * Looking up a name that was never used creates the signal, so senders and
 * receivers can meet without either side declaring it first.
 *
 * @example
 * ```typescript
 * const hub = SignalHub.getInstance();
 *
 * hub.signal('orderStatusEvent').connect((sender, trade) => {
 *   console.log('Order status:', trade);
 * });
 * ```
 */
export class SignalHub extends EventEmitter {
  private static instance: SignalHub;
  private signals = new Map<string, Signal>();

  private constructor() {
    super();
    this.setMaxListeners(100); // Many handler scripts may watch the same signal
  }

  /**
   * Get singleton instance
   */
  static getInstance(): SignalHub {
    if (!SignalHub.instance) {
      SignalHub.instance = new SignalHub();
    }
    return SignalHub.instance;
  }

  /**
   * Get or create the signal for a name
   */
  signal(name: string): Signal {
    const existing = this.signals.get(name);
    if (existing) return existing;

    const created: Signal = {
      name,
      connect: (receiver) => {
        this.on(name, receiver);
      },
      disconnect: (receiver) => {
        this.off(name, receiver);
      },
      // A signal named 'error' with no receivers must not hit EventEmitter's unhandled-error throw
      send: (sender, ...args) => this.listenerCount(name) > 0 && this.emit(name, sender, ...args),
      receiverCount: () => this.listenerCount(name),
    };
    this.signals.set(name, created);
    return created;
  }

  /**
   * Drop every receiver and forget every signal
   */
  reset(): void {
    this.removeAllListeners();
    this.signals.clear();
  }
}
