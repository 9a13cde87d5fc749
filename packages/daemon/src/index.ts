/**
 * @broker-daemon/daemon - event-handler daemon for a broker gateway
 *
 * Handler scripts import `defineHandler` and the handler types from here.
 */

export * from './errors.js';

export { GatewayEvent, type EventListener, type EmissionSink } from './events/gateway-event.js';
export { SignalHub, type Signal, type SignalReceiver } from './events/signal-hub.js';
export { EventBridge } from './events/event-bridge.js';

export type { EventSource, GatewayConnection } from './connection/types.js';
export { DEFAULT_EVENT_NAMES } from './connection/event-names.js';
export { WsGatewayConnection, type WsGatewayConnectionConfig } from './connection/ws-gateway-connection.js';
export {
  ServerFrameSchema,
  parseServerFrame,
  serializeFrame,
  type ClientFrame,
  type ServerFrame,
} from './connection/protocol.js';

export {
  defineHandler,
  HandlerDescriptorSchema,
  type Collect,
  type CollectOptions,
  type EventHandler,
  type HandlerDescriptor,
  type HandlerKind,
  type HandlerModuleExports,
  type HandlerRegistration,
  type SetupHook,
} from './registry/types.js';
export {
  EventRegistry,
  classifyHandler,
  getHandlerEvent,
  type BindReport,
  type DiscoveryReport,
  type EventRegistryOptions,
} from './registry/event-registry.js';
export {
  HandlerLoader,
  collectHandlerFiles,
  isHandlerFile,
  readHandlerModule,
  type LoadResult,
} from './loader/handler-loader.js';

export {
  ConnectionManager,
  type ConnectionManagerOptions,
  type ConnectionState,
  type Sleep,
} from './daemon/connection-manager.js';
