/**
 * Daemon error taxonomy
 *
 * Only ConnectionFailureError crosses the daemon's public boundary. The other
 * classes describe isolated failures: they are logged and reported, never thrown
 * out of discovery, binding, teardown or event mirroring.
 */

export class DaemonError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Every connection attempt of the retry policy failed
 */
export class ConnectionFailureError extends DaemonError {
  constructor(readonly attempts: number, options?: { cause?: unknown }) {
    super(`Failed to connect after ${attempts} attempts`, options);
  }
}

/**
 * One handler file could not be loaded
 */
export class HandlerLoadError extends DaemonError {
  constructor(readonly path: string, options?: { cause?: unknown }) {
    super(`Failed to load handlers from ${path}: ${describeError(options?.cause)}`, options);
  }
}

/**
 * One handler could not be attached, or its event does not exist on the connection
 */
export class HandlerBindError extends DaemonError {
  constructor(
    readonly eventName: string,
    readonly handlerName: string,
    readonly source: string,
    options?: { cause?: unknown }
  ) {
    super(`Error binding handler ${handlerName} from ${source} to ${eventName}: ${describeError(options?.cause)}`, options);
  }
}

export class TeardownError extends DaemonError {}

export class BridgeError extends DaemonError {}

/**
 * The registry was mutated after the dispatch loop started
 */
export class RegistrySealedError extends DaemonError {
  constructor(operation: string) {
    super(`Cannot ${operation}: the event registry is sealed while the dispatch loop runs`);
  }
}

export function describeError(error: unknown): string {
  if (error === undefined) return 'unknown error';
  return error instanceof Error ? error.message : String(error);
}
