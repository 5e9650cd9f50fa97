import { commandLines, firstLine, formatCommand } from '../exec/index.js';
import type { CommandRunner } from '../exec/index.js';
import type { ToolPaths } from '../host/index.js';
import { parseRestartVersions, RESTART_VERSION_QUERIES } from '../parsers/index.js';
import type { RestartVersionQuery } from '../parsers/index.js';
import type { VersionInfo } from '../schema/index.js';
import { CommandTimeoutError } from './errors.js';

// ── Mode ─────────────────────────────────────────────────────

/**
 * Clusterware (CRS) when olsnodes lists at least one node; Oracle
 * Restart when it prints nothing or fails.
 *
 * @throws CommandTimeoutError when olsnodes does not finish
 */
export async function detectCrsMode(
  tools: ToolPaths,
  runner: CommandRunner,
): Promise<boolean> {
  const argv = [tools.olsnodes];
  const result = await runner.run(argv);
  if (result.status === 'timeout') {
    throw new CommandTimeoutError(formatCommand(argv), result.timeoutMs);
  }
  return commandLines(result).some((line) => line.length > 0);
}

// ── Version ──────────────────────────────────────────────────

export async function resolveVersions(
  tools: ToolPaths,
  runner: CommandRunner,
  isCrs: boolean,
): Promise<VersionInfo> {
  if (isCrs) {
    const result = await runner.run([tools.crsctl, 'query', 'crs', 'activeversion']);
    return { version: firstLine(result) };
  }

  const outputs: Array<readonly [RestartVersionQuery, string]> = [];
  for (const query of RESTART_VERSION_QUERIES) {
    const result = await runner.run([tools.crsctl, 'query', 'has', query]);
    outputs.push([query, firstLine(result)]);
  }
  return parseRestartVersions(outputs);
}
