/**
 * Record parsers.
 * Pure functions over captured command output — no IO.
 * Each folds a line sequence into zero or more records.
 */

export { labeledValue, optionalLabeledValue, parseEndpoints } from './fields.js';
export { parseNetworks } from './network.js';
export { parseVips } from './vip.js';
export type { VipDraft } from './vip.js';
export { parseScans } from './scan.js';
export type { ScanDraft } from './scan.js';
export { parseEnabledListeners, parseListenerConfig } from './listener.js';
export type { ListenerConfig } from './listener.js';
export {
  extractScanEndpoints,
  SCAN_ENDPOINT_FORMATS,
  currentEndpointFormat,
  legacyPortFormat,
} from './scanListener.js';
export type { ScanEndpointFormat } from './scanListener.js';
export {
  extractBracketedVersion,
  parseRestartVersions,
  RESTART_VERSION_QUERIES,
} from './version.js';
export type { RestartVersionQuery } from './version.js';
