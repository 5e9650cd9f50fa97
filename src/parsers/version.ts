import type { VersionInfo } from '../schema/index.js';

export const RESTART_VERSION_QUERIES = [
  'releaseversion',
  'releasepatch',
  'softwareversion',
  'softwarepatch',
] as const;

export type RestartVersionQuery = (typeof RESTART_VERSION_QUERIES)[number];

// Anchored at end of line, one trailing period allowed: softwarepatch
// output reads `... is [2701864972].`
const BRACKETED_VERSION = /\[([0-9.]+)\]\.?$/;

/**
 * Token inside the bracket group that ends the line, e.g.
 * `... on the local node is [19.0.0.0.0]` → `19.0.0.0.0`.
 */
export function extractBracketedVersion(line: string): string | undefined {
  return BRACKETED_VERSION.exec(line)?.[1];
}

/**
 * Fold `crsctl query has <query>` first lines into version info. A line
 * without a bracketed version is kept verbatim. `version` mirrors the
 * first query that yielded one.
 */
export function parseRestartVersions(
  outputs: ReadonlyArray<readonly [RestartVersionQuery, string]>,
): VersionInfo {
  const info: VersionInfo = {};
  let alias: string | undefined;

  for (const [query, line] of outputs) {
    const version = extractBracketedVersion(line);
    info[query] = version ?? line;
    if (version !== undefined && alias === undefined) alias = version;
  }

  if (alias !== undefined) info['version'] = alias;
  return info;
}
