import { z } from 'zod';
import type { Logger } from '@broker-daemon/shared';
import type { GatewayConnection } from '../connection/types.js';

export type HandlerKind = 'sync' | 'async';

/**
 * Handler callback: the live connection first, then the event payload.
 *
 * Declared through a method so handlers with concrete payload parameter types
 * (`(connection, reqId: number, bar: Bar) => void`) remain assignable.
 */
export type EventHandler = {
  handle(connection: GatewayConnection, ...args: unknown[]): unknown;
}['handle'];

/**
 * One handler registered for one event
 */
export interface HandlerRegistration {
  readonly eventName: string;
  readonly handler: EventHandler;
  readonly kind: HandlerKind;
  /** File the handler was loaded from */
  readonly source: string;
  /** Function name, or the name given at registration */
  readonly name: string;
}

/**
 * What a handler module exports to have a handler registered
 */
export interface HandlerDescriptor {
  event: string;
  handler: EventHandler;
  kind?: HandlerKind;
  name?: string;
}

export interface CollectOptions {
  kind?: HandlerKind;
  name?: string;
  source?: string;
}

/**
 * Registration capability: `collect(eventName)(handler)` registers and returns the handler unchanged
 */
export type Collect = (eventName: string, options?: CollectOptions) => <H extends EventHandler>(handler: H) => H;

/**
 * Entry point run once the connection is live, for handlers that subscribe themselves
 */
export type SetupHook = (connection: GatewayConnection, logger: Logger) => unknown;

export const HandlerDescriptorSchema = z.object({
  event: z.string().min(1),
  handler: z.custom<EventHandler>((value) => typeof value === 'function', { message: 'handler must be a function' }),
  kind: z.enum(['sync', 'async']).optional(),
  name: z.string().min(1).optional(),
});

/**
 * Everything a loaded handler module contributes
 */
export interface HandlerModuleExports {
  descriptors: HandlerDescriptor[];
  register?: (collect: Collect) => unknown;
  setup?: SetupHook;
}

/**
 * Describe a handler for a module's `handlers` export
 *
 * @example
 * ```typescript
 * export const handlers = [
 *   defineHandler('orderStatusEvent', (connection, trade) => {
 *     console.log(trade);
 *   }),
 * ];
 * ```
 */
export function defineHandler(
  event: string,
  handler: EventHandler,
  options: { kind?: HandlerKind; name?: string } = {}
): HandlerDescriptor {
  return { event, handler, ...options };
}
