export type { ScaleEvent, NewScaleEvent, ScaleAction, PriorityAction } from './event.js';
export { PRIORITY_ACTIONS, isPriorityAction } from './event.js';
export type { EventStore } from './store.js';
export { LibraError, StoreUnavailableError, ObserverFailure, ConfigError } from './errors.js';
