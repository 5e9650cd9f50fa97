/**
 * gridfacts — Grid Infrastructure topology facts from srvctl/crsctl output.
 */

export * from './schema/index.js';
export * from './parsers/index.js';
export * from './exec/index.js';
export * from './host/index.js';
export * from './core/index.js';
export * from './report/index.js';
export { loadConfigFile, resolveRuntimeConfig } from './config/index.js';
export type { RuntimeConfig, ConfigOverrides } from './config/index.js';
