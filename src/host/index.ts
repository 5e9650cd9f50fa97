/**
 * Host environment module.
 * Locates the Grid Infrastructure home and its tools; resolves host names.
 */

export { createSystemHostResolver, toShortHostname } from './hostname.js';
export type { HostResolver, SystemHostResolverOptions } from './hostname.js';
export {
  discoverGridHome,
  parseCrsHomeFromProcesses,
  parseOlrLoc,
  parseOratabCrsHome,
} from './home.js';
export type { GridHome, HomeSource, HomeDiscoveryInput } from './home.js';
export { deriveToolPaths, verifyToolPaths } from './tools.js';
export type { ToolPaths } from './tools.js';
