import { commandLines, formatCommand } from '../exec/index.js';
import { parseNetworks, parseScans, parseVips } from '../parsers/index.js';
import type { Network, NetworkId, Scan, Vip } from '../schema/index.js';
import type { HostResolver } from '../host/index.js';
import * as log from '../utils/logger.js';
import { isolate } from './context.js';
import type { FactsContext, Resolved } from './context.js';

// ── Networks ─────────────────────────────────────────────────

export async function resolveNetworks(
  ctx: FactsContext,
): Promise<Resolved<Map<NetworkId, Network>>> {
  const argv = [ctx.tools.srvctl, 'config', 'network'];
  const lines = commandLines(await ctx.runner.run(argv));

  const resolved = await isolate(
    'network',
    formatCommand(argv),
    new Map<NetworkId, Network>(),
    () => parseNetworks(lines),
  );
  log.found(resolved.value.size, 'network(s)');
  return resolved;
}

// ── VIPs ─────────────────────────────────────────────────────

export async function resolveVips(
  ctx: FactsContext,
): Promise<Resolved<Map<NetworkId, Vip>>> {
  const argv = [ctx.tools.srvctl, 'config', 'vip', '-n', ctx.hostname];
  const lines = commandLines(await ctx.runner.run(argv));

  const resolved = await isolate(
    'vip',
    formatCommand(argv),
    new Map<NetworkId, Vip>(),
    () => buildVips(lines, ctx.host),
  );
  log.found(resolved.value.size, 'VIP(s)');
  return resolved;
}

async function buildVips(
  lines: readonly string[],
  host: HostResolver,
): Promise<Map<NetworkId, Vip>> {
  const vips = new Map<NetworkId, Vip>();
  for (const [networkId, draft] of parseVips(lines)) {
    vips.set(networkId, { ...draft, fqdn: await host.toFqdn(draft.name) });
  }
  return vips;
}

// ── SCANs ────────────────────────────────────────────────────

export async function resolveScans(
  ctx: FactsContext,
): Promise<Resolved<Map<NetworkId, Scan>>> {
  const argv = [ctx.tools.srvctl, 'config', 'scan', '-all'];
  const lines = commandLines(await ctx.runner.run(argv));

  const resolved = await isolate(
    'scan',
    formatCommand(argv),
    new Map<NetworkId, Scan>(),
    () => buildScans(lines, ctx.host),
  );
  log.found(resolved.value.size, 'SCAN(s)');
  return resolved;
}

async function buildScans(
  lines: readonly string[],
  host: HostResolver,
): Promise<Map<NetworkId, Scan>> {
  const scans = new Map<NetworkId, Scan>();
  for (const [networkId, draft] of parseScans(lines)) {
    scans.set(networkId, {
      networkId,
      name: draft.name,
      fqdn: await host.toFqdn(draft.name),
      ipv4: [...draft.ipv4],
      ipv6: [...draft.ipv6],
    });
  }
  return scans;
}
