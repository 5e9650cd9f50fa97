/**
 * Configuration module.
 * Loads and validates runtime config from env, CLI flags, and config files.
 * Zod-validated.
 */

export { TIMEOUTS, LIMITS, PATHS, TOOL_NAMES } from './defaults.js';
export type { ToolName } from './defaults.js';
export { loadConfigFile, resolveRuntimeConfig } from './loader.js';
export type { RuntimeConfig, ConfigOverrides } from './loader.js';
