export { default as queryRoutes } from './query-routes.js';
export type { QueryRoutesOptions } from './query-routes.js';
export { default as healthRoutes } from './health-routes.js';
export { default as streamRoutes } from './stream-routes.js';
