import { commandLines, firstLine } from '../exec/index.js';
import type { CommandRunner } from '../exec/index.js';
import { deriveToolPaths, discoverGridHome, verifyToolPaths } from '../host/index.js';
import type { HostResolver, ToolPaths } from '../host/index.js';
import type { ClusterFacts, FactIssue } from '../schema/index.js';
import * as log from '../utils/logger.js';
import { createFactsContext } from './context.js';
import { resolveLocalListeners, resolveScanListeners } from './listeners.js';
import { resolveNetworks, resolveScans, resolveVips } from './topology.js';
import { detectCrsMode, resolveVersions } from './version.js';

// ── Public types ─────────────────────────────────────────────

export interface GatherOptions {
  runner: CommandRunner;
  host: HostResolver;
  oracleHome?: string;
  env?: NodeJS.ProcessEnv;
  olrLoc: string;
  oratab: string;
  /** Replaces the executable check on the derived tool paths. */
  checkTools?: (tools: ToolPaths) => Promise<void>;
}

// ── Main entry ───────────────────────────────────────────────

/**
 * Collect every Grid Infrastructure fact for this host. Fails before any
 * parsing when the home or its tools are unusable; malformed records
 * only drop the affected entities and are reported in `issues`.
 */
export async function gatherFacts(options: GatherOptions): Promise<ClusterFacts> {
  const { runner, host } = options;

  // 1. Home and tools
  log.section('Grid Infrastructure home');
  const home = await discoverGridHome({
    runner,
    olrLoc: options.olrLoc,
    oratab: options.oratab,
    ...(options.oracleHome !== undefined ? { configured: options.oracleHome } : {}),
    ...(options.env !== undefined ? { env: options.env } : {}),
  });
  log.home(home.path, home.source);

  const tools = deriveToolPaths(home.path);
  await (options.checkTools ?? verifyToolPaths)(tools);

  // 2. Mode, name, version
  log.section('Cluster');
  const isCrs = await detectCrsMode(tools, runner);
  log.info(isCrs ? 'Clusterware mode' : 'Oracle Restart mode');

  const clusterName = firstLine(await runner.run([tools.cemutlo, '-n']));
  const versions = await resolveVersions(tools, runner, isCrs);

  // 3. Topology — each step reads the mappings resolved before it
  log.section('Topology');
  const issues: FactIssue[] = [];
  let ctx = createFactsContext({ tools, runner, host, isCrs });

  const networks = await resolveNetworks(ctx);
  issues.push(...networks.issues);
  ctx = { ...ctx, networks: networks.value };

  const vips = await resolveVips(ctx);
  issues.push(...vips.issues);
  ctx = { ...ctx, vips: vips.value };

  const scans = await resolveScans(ctx);
  issues.push(...scans.issues);
  ctx = { ...ctx, scans: scans.value };

  // 4. Listeners
  log.section('Listeners');
  const localListeners = await resolveLocalListeners(ctx);
  issues.push(...localListeners.issues);

  const scanListeners = await resolveScanListeners(ctx);
  issues.push(...scanListeners.issues);

  // 5. Databases
  const databases = commandLines(
    await runner.run([tools.srvctl, 'config', 'database']),
  ).filter((line) => line.length > 0);
  log.found(databases.length, 'database(s)');

  if (issues.length > 0) {
    log.warn(`${String(issues.length)} record(s) could not be parsed`);
  }

  return {
    clusterName,
    versions,
    vips: [...ctx.vips.values()],
    networks: [...ctx.networks.values()],
    scans: [...ctx.scans.values()],
    localListeners: localListeners.value,
    scanListeners: scanListeners.value,
    databases,
    crsHome: home.path,
    isCrs,
    hostname: ctx.hostname,
    issues,
  };
}
