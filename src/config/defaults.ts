/**
 * Default configuration values.
 * All values are overridable via config file, environment or CLI flags.
 */

export const TIMEOUTS = {
  COMMAND_TIMEOUT: 60_000,
  HOST_LOOKUP_TIMEOUT: 5_000,
} as const;

export const LIMITS = {
  MAX_EXEC_BUFFER: 4 * 1024 * 1024,
} as const;

export const PATHS = {
  CONFIG_FILE: '.gridfacts.yaml',
  OLR_LOC: '/etc/oracle/olr.loc',
  ORATAB: '/etc/oratab',
} as const;

export const TOOL_NAMES = ['srvctl', 'crsctl', 'cemutlo', 'olsnodes'] as const;

export type ToolName = (typeof TOOL_NAMES)[number];
