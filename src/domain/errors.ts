/**
 * Base class for errors raised by the monitor service.
 */
export class LibraError extends Error {
  constructor(message: string, public readonly code: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'LibraError';
  }
}

/**
 * The event store could not be reached or answered with an error.
 *
 * Transient by contract: callers retry on the next cycle or surface a
 * degraded response.
 */
export class StoreUnavailableError extends LibraError {
  constructor(public readonly operation: string, cause?: unknown) {
    super(`Event store unavailable during ${operation}`, 'STORE_UNAVAILABLE', { cause });
    this.name = 'StoreUnavailableError';
  }
}

/**
 * A registered observer threw or rejected while handling a batch.
 * Only ever logged; dispatch continues with the next observer.
 */
export class ObserverFailure extends LibraError {
  constructor(public readonly observerIndex: number, cause: unknown) {
    super(`Observer #${observerIndex} failed while handling a batch`, 'OBSERVER_FAILURE', { cause });
    this.name = 'ObserverFailure';
  }
}

/** Environment variables failed validation at startup. */
export class ConfigError extends LibraError {
  constructor(public readonly issues: readonly string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`, 'CONFIG_INVALID');
    this.name = 'ConfigError';
  }
}
