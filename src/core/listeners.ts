import { commandLines, formatCommand } from '../exec/index.js';
import {
  extractScanEndpoints,
  parseEndpoints,
  parseEnabledListeners,
  parseListenerConfig,
} from '../parsers/index.js';
import type { ListenerConfig } from '../parsers/index.js';
import type {
  FactIssue,
  Listener,
  NetworkId,
  Scan,
  ScanListener,
  VipMap,
} from '../schema/index.js';
import * as log from '../utils/logger.js';
import { isolate } from './context.js';
import type { FactsContext, Resolved } from './context.js';

// ── Cross-reference ──────────────────────────────────────────

/**
 * Build a listener record; address fields come from the VIP on the
 * listener's network and stay unset when there is none.
 */
export function toListener(
  queriedName: string,
  config: ListenerConfig,
  vips: VipMap,
): Listener {
  const vip =
    config.networkId !== undefined ? vips.get(config.networkId) : undefined;
  const addressFields =
    vip !== undefined
      ? {
          address: vip.fqdn,
          ...(vip.ipv4 !== undefined ? { ipv4: vip.ipv4 } : {}),
          ...(vip.ipv6 !== undefined ? { ipv6: vip.ipv6 } : {}),
        }
      : {};

  return {
    name: config.name ?? queriedName,
    type: config.type ?? '',
    ...(config.networkId !== undefined ? { networkId: config.networkId } : {}),
    endpoints: config.endpoints ?? '',
    protocolPorts: config.protocolPorts,
    ...addressFields,
  };
}

export function toScanListener(
  networkId: NetworkId,
  endpoints: string,
  scan: Scan,
): ScanListener {
  return {
    networkId,
    scanAddress: scan.fqdn,
    endpoints,
    protocolPorts: parseEndpoints(endpoints),
    ipv4: [...scan.ipv4],
    ipv6: [...scan.ipv6],
  };
}

// ── Local listeners ──────────────────────────────────────────

export async function resolveLocalListeners(
  ctx: FactsContext,
): Promise<Resolved<Listener[]>> {
  const statusArgv = [
    ctx.tools.srvctl,
    'status',
    'listener',
    ...(ctx.isCrs ? ['-n', ctx.hostname] : []),
  ];
  const statusCommand = formatCommand(statusArgv);
  const issues: FactIssue[] = [];
  const names: string[] = [];

  // Each status line is isolated on its own.
  for (const line of commandLines(await ctx.runner.run(statusArgv))) {
    const found = await isolate<string[]>('listener', statusCommand, [], () =>
      parseEnabledListeners([line]),
    );
    issues.push(...found.issues);
    for (const name of found.value) {
      if (!names.includes(name)) names.push(name);
    }
  }

  const listeners: Listener[] = [];

  for (const name of names) {
    const argv = [ctx.tools.srvctl, 'config', 'listener', '-l', name];
    const lines = commandLines(await ctx.runner.run(argv));

    const listener = await isolate<Listener | undefined>(
      'listener',
      formatCommand(argv),
      undefined,
      () => toListener(name, parseListenerConfig(lines), ctx.vips),
    );
    issues.push(...listener.issues);
    if (listener.value !== undefined) listeners.push(listener.value);
  }

  log.found(listeners.length, 'listener(s)');
  return { value: listeners, issues };
}

// ── SCAN listeners ───────────────────────────────────────────

/**
 * One SCAN listener per network that has a SCAN. Only clusterware
 * installations have SCAN listeners.
 */
export async function resolveScanListeners(
  ctx: FactsContext,
): Promise<Resolved<ScanListener[]>> {
  if (!ctx.isCrs) return { value: [], issues: [] };

  const issues: FactIssue[] = [];
  const scanListeners: ScanListener[] = [];

  for (const networkId of ctx.networks.keys()) {
    const scan = ctx.scans.get(networkId);
    if (scan === undefined) continue;

    const argv = [ctx.tools.srvctl, 'config', 'scan_listener', '-k', networkId];
    const endpoints = extractScanEndpoints(
      commandLines(await ctx.runner.run(argv)),
    );
    if (endpoints === undefined) continue;

    const scanListener = await isolate<ScanListener | undefined>(
      'scan_listener',
      formatCommand(argv),
      undefined,
      () => toScanListener(networkId, endpoints, scan),
    );
    issues.push(...scanListener.issues);
    if (scanListener.value !== undefined) scanListeners.push(scanListener.value);
  }

  log.found(scanListeners.length, 'SCAN listener(s)');
  return { value: scanListeners, issues };
}
