/**
 * Core orchestration module.
 * Coordinates home discovery → mode/version → topology → listeners.
 * Command output comes in through a CommandRunner; no process APIs here.
 */

export { gatherFacts } from './assembler.js';
export type { GatherOptions } from './assembler.js';
export { createFactsContext, isolate } from './context.js';
export type { FactsContext, FactsContextInput, Resolved } from './context.js';
export { resolveNetworks, resolveVips, resolveScans } from './topology.js';
export {
  resolveLocalListeners,
  resolveScanListeners,
  toListener,
  toScanListener,
} from './listeners.js';
export { detectCrsMode, resolveVersions } from './version.js';
export {
  PreconditionFailedError,
  MalformedRecordError,
  CommandTimeoutError,
  exitCodeOf,
  toErrorMessage,
} from './errors.js';
