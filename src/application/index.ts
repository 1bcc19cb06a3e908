export { ChangeMonitor } from './change-monitor.js';
export type { BatchObserver, ChangeMonitorOptions } from './change-monitor.js';
export { LatestStateResolver, compareCurrentState, selectCurrentState } from './latest-state.js';
export type { DeviceStates } from './latest-state.js';
export { listRecentEvents, getLatestRecord, DEFAULT_RECENT_LIMIT, MAX_RECENT_LIMIT } from './query-events.js';
export type { ListRecentParams } from './query-events.js';
export { createLoggingObserver } from './observers.js';
export { newEventSchema, generatorCatalogSchema } from './event-schema.js';
export type { NewEventInput, GeneratorCatalog } from './event-schema.js';
export { ReadingGenerator, loadGeneratorCatalog, ACTION_WEIGHTS, DEFAULT_CATALOG_PATH } from './reading-generator.js';
export type { Random, ReadingOverrides, ScenarioContext } from './reading-generator.js';
export { generateReadings } from './generate-readings.js';
export { sleep } from './sleep.js';
export type { Log } from './logger.js';
export type { GeneratorMode, GenerateOptions, GenerateDeps, ReadingSink, Sleep } from './generate-readings.js';
