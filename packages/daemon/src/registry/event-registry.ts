/**
 * Event Registry
 *
 * Collects handler registrations (event name -> ordered handlers), fills itself
 * from handler files found by the HandlerLoader, and attaches the handlers to a
 * live gateway connection.
 *
 * @example
 * ```typescript
 * const registry = new EventRegistry({ logger });
 *
 * registry.collect('orderStatusEvent')((connection, trade) => {
 *   console.log('Order status:', trade);
 * });
 *
 * await registry.discoverHandlers(config.handlerPaths);
 * registry.bindToConnection(connection);
 * ```
 */

import { types } from 'util';
import type { Logger } from '@broker-daemon/shared';
import type { GatewayConnection } from '../connection/types.js';
import type { EventListener } from '../events/gateway-event.js';
import { HandlerLoader, type LoadResult } from '../loader/handler-loader.js';
import { HandlerBindError, HandlerLoadError, RegistrySealedError, describeError } from '../errors.js';
import type {
  Collect,
  CollectOptions,
  EventHandler,
  HandlerDescriptor,
  HandlerKind,
  HandlerRegistration,
  SetupHook,
} from './types.js';

export interface EventRegistryOptions {
  logger: Logger;
  /** Defaults to a HandlerLoader sharing the registry's logger */
  loader?: HandlerLoader;
}

export interface DiscoveryReport {
  /** Files whose handlers were registered */
  loaded: string[];
  /** Files that failed to load or register */
  failed: LoadResult[];
  /** Registrations in the table after discovery */
  registrations: number;
  setupHooks: number;
}

export interface BindReport {
  /** Subscriptions made */
  bound: number;
  /** Event names with handlers but no such event on the connection */
  missingEvents: string[];
  failures: HandlerBindError[];
}

const UNKNOWN_SOURCE = '<unknown>';

// Last event each handler was collected for
const eventTags = new WeakMap<EventHandler, string>();

/**
 * Event name a handler was last collected for
 */
export function getHandlerEvent(handler: EventHandler): string | undefined {
  return eventTags.get(handler);
}

/**
 * Classify a handler by its declared shape
 */
export function classifyHandler(handler: EventHandler): HandlerKind {
  return types.isAsyncFunction(handler) ? 'async' : 'sync';
}

interface SetupEntry {
  hook: SetupHook;
  source: string;
}

export class EventRegistry {
  private readonly logger: Logger;
  private readonly loader: HandlerLoader;
  private readonly table = new Map<string, HandlerRegistration[]>();
  private readonly setupHooks: SetupEntry[] = [];
  private sealed = false;

  constructor(options: EventRegistryOptions) {
    this.logger = options.logger;
    this.loader = options.loader ?? new HandlerLoader(options.logger);
  }

  /**
   * Registration capability: `collect(eventName)(handler)` appends the handler to
   * the event's list (duplicates kept) and returns it unchanged.
   *
   * @throws {RegistrySealedError} Once the dispatch loop has started
   */
  collect(eventName: string, options: CollectOptions = {}): <H extends EventHandler>(handler: H) => H {
    return (handler) => {
      this.assertOpen('collect handlers');
      this.append(this.createRegistration(eventName, handler, options));
      return handler;
    };
  }

  /**
   * Register handler descriptors loaded from `source`
   */
  register(descriptors: readonly HandlerDescriptor[], source: string = UNKNOWN_SOURCE): number {
    this.assertOpen('register handlers');
    for (const descriptor of descriptors) {
      this.append(this.createDescriptorRegistration(descriptor, source));
    }
    return descriptors.length;
  }

  /**
   * Clear the table, load every handler file under the search paths, and
   * register what each file contributes. A file's registrations are committed
   * only when the whole file registered cleanly.
   *
   * @throws {RegistrySealedError} Once the dispatch loop has started
   */
  async discoverHandlers(searchPaths: readonly string[]): Promise<DiscoveryReport> {
    this.assertOpen('discover handlers');
    this.clear();

    if (searchPaths.length === 0) {
      this.logger.warn('No handler paths configured');
    }

    const results = await this.loader.discover(searchPaths);
    const loaded: string[] = [];
    const failed: LoadResult[] = [];

    for (const result of results) {
      if (result.error || !result.exports) {
        this.logger.warn('Skipped handler file', { path: result.path, error: result.error?.message });
        failed.push(result);
        continue;
      }

      try {
        const staged = await this.stage(result.path, result.exports.descriptors, result.exports.register);
        staged.forEach((registration) => this.append(registration));
        if (result.exports.setup) {
          this.setupHooks.push({ hook: result.exports.setup, source: result.path });
        }
        loaded.push(result.path);
        this.logger.info(`Successfully loaded handlers from ${result.path}`, {
          registrations: staged.length,
          setup: result.exports.setup !== undefined,
        });
      } catch (cause) {
        const error = new HandlerLoadError(result.path, { cause });
        this.logger.error(error.message);
        failed.push({ path: result.path, exports: result.exports, error });
      }
    }

    return { loaded, failed, registrations: this.count, setupHooks: this.setupHooks.length };
  }

  /**
   * Attach every registration to the same-named event on the connection.
   *
   * Each handler is wrapped so it receives the connection as first argument.
   * A missing event or a failing attachment is logged and skipped. Not
   * idempotent: binding twice subscribes every handler twice.
   */
  bindToConnection(connection: GatewayConnection): BindReport {
    const report: BindReport = { bound: 0, missingEvents: [], failures: [] };

    for (const [eventName, registrations] of this.table) {
      if (registrations.length === 0) continue;

      const event = connection.getEvent(eventName);
      if (!event) {
        this.logger.warn(`Event ${eventName} not found on connection`, { handlers: registrations.length });
        report.missingEvents.push(eventName);
        continue;
      }

      for (const registration of registrations) {
        try {
          event.connect(this.createWrapper(registration, connection));
          report.bound++;
          this.logger.info(
            `Successfully bound handler ${registration.name} from ${registration.source} to ${eventName}`,
            { kind: registration.kind }
          );
        } catch (cause) {
          const failure = new HandlerBindError(eventName, registration.name, registration.source, { cause });
          this.logger.error(failure.message);
          report.failures.push(failure);
        }
      }
    }

    return report;
  }

  /**
   * Run every collected setup(connection, logger) hook, in discovery order
   *
   * @returns Hooks that threw or rejected
   */
  async runSetupHooks(connection: GatewayConnection): Promise<HandlerBindError[]> {
    const failures: HandlerBindError[] = [];

    for (const { hook, source } of this.setupHooks) {
      const name = hook.name || 'setup';
      try {
        await hook(connection, this.logger.child({ handlerSource: source }));
        this.logger.info(`Ran setup hook from ${source}`);
      } catch (cause) {
        const failure = new HandlerBindError('setup', name, source, { cause });
        this.logger.error(failure.message);
        failures.push(failure);
      }
    }

    return failures;
  }

  /**
   * Registrations for one event, in binding order
   */
  getHandlers(eventName: string): readonly HandlerRegistration[] {
    return [...(this.table.get(eventName) ?? [])];
  }

  eventNames(): string[] {
    return [...this.table.keys()];
  }

  get count(): number {
    let total = 0;
    for (const registrations of this.table.values()) {
      total += registrations.length;
    }
    return total;
  }

  get setupHookCount(): number {
    return this.setupHooks.length;
  }

  /**
   * Drop every registration and setup hook
   *
   * @throws {RegistrySealedError} Once the dispatch loop has started
   */
  clear(): void {
    this.assertOpen('clear the registry');
    this.table.clear();
    this.setupHooks.length = 0;
  }

  /**
   * Make the registry read-only; called when the dispatch loop starts
   */
  seal(): void {
    this.sealed = true;
  }

  isSealed(): boolean {
    return this.sealed;
  }

  /**
   * Unseal and clear, for reuse by another daemon in the same process
   */
  reset(): void {
    this.sealed = false;
    this.clear();
  }

  private async stage(
    source: string,
    descriptors: readonly HandlerDescriptor[],
    register?: (collect: Collect) => unknown
  ): Promise<HandlerRegistration[]> {
    const staged = descriptors.map((descriptor) => this.createDescriptorRegistration(descriptor, source));

    if (register) {
      const collect: Collect = (eventName, options = {}) => (handler) => {
        staged.push(this.createRegistration(eventName, handler, { source, ...options }));
        return handler;
      };
      await register(collect);
    }

    return staged;
  }

  private createDescriptorRegistration(descriptor: HandlerDescriptor, source: string): HandlerRegistration {
    return this.createRegistration(descriptor.event, descriptor.handler, {
      kind: descriptor.kind,
      name: descriptor.name,
      source,
    });
  }

  private createRegistration(eventName: string, handler: EventHandler, options: CollectOptions): HandlerRegistration {
    eventTags.set(handler, eventName);
    return {
      eventName,
      handler,
      kind: options.kind ?? classifyHandler(handler),
      source: options.source ?? UNKNOWN_SOURCE,
      name: options.name ?? (handler.name || '<anonymous>'),
    };
  }

  private append(registration: HandlerRegistration): void {
    const list = this.table.get(registration.eventName);
    if (list) {
      list.push(registration);
    } else {
      this.table.set(registration.eventName, [registration]);
    }
  }

  /**
   * Subscriber that calls the handler with the connection prepended.
   *
   * Sync handlers run inline; what they throw reaches the emitting event.
   * Async handlers start inline and are not awaited; a rejection is logged here.
   */
  private createWrapper(registration: HandlerRegistration, connection: GatewayConnection): EventListener {
    const { handler, kind } = registration;
    const observe = (result: unknown): void => {
      if (isPromiseLike(result)) {
        Promise.resolve(result).catch((error: unknown) => {
          this.logger.error(`Handler ${registration.name} from ${registration.source} failed`, {
            event: registration.eventName,
            kind,
            error: describeError(error),
          });
        });
      }
    };

    if (kind === 'async') {
      return (...args) => observe(handler(connection, ...args));
    }

    return (...args) => {
      const result = handler(connection, ...args);
      // A sync-tagged handler may still hand back a promise
      observe(result);
      return result;
    };
  }

  private assertOpen(operation: string): void {
    if (this.sealed) {
      throw new RegistrySealedError(operation);
    }
  }
}

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    'then' in value &&
    typeof value.then === 'function'
  );
}
