export { default as monitorPlugin } from './monitor-plugin.js';
export type { MonitorPluginOptions } from './monitor-plugin.js';
