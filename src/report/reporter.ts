import { stringify as stringifyYaml } from 'yaml';

import type {
  ClusterFacts,
  Listener,
  Network,
  Scan,
  ScanListener,
  OutputFormat,
  Vip,
} from '../schema/index.js';
import { JSON_OUTPUT_VERSION } from '../schema/jsonOutput.js';
import type {
  JsonOutput,
  JsonOutputListener,
  JsonOutputNetwork,
  JsonOutputScan,
  JsonOutputScanListener,
  JsonOutputVip,
} from '../schema/jsonOutput.js';

// ── JSON generator ───────────────────────────────────────────

export function generateJSON(facts: ClusterFacts): JsonOutput {
  return {
    format_version: JSON_OUTPUT_VERSION,
    clustername: facts.clusterName,
    hostname: facts.hostname,
    is_crs: facts.isCrs,
    versions: { ...facts.versions },
    vip: facts.vips.map(vipToJSON),
    network: facts.networks.map(networkToJSON),
    scan: facts.scans.map(scanToJSON),
    local_listener: facts.localListeners.map(listenerToJSON),
    scan_listener: facts.scanListeners.map(scanListenerToJSON),
    database_list: [...facts.databases],
    oracle_crs_home: facts.crsHome,
    issues: facts.issues.map((issue) => ({ ...issue })),
  };
}

function networkToJSON(network: Network): JsonOutputNetwork {
  return {
    network: network.id,
    ...(network.ipv4Subnet !== undefined ? { ipv4_subnet: network.ipv4Subnet } : {}),
    ...(network.ipv6Subnet !== undefined ? { ipv6_subnet: network.ipv6Subnet } : {}),
  };
}

function vipToJSON(vip: Vip): JsonOutputVip {
  return {
    network: vip.networkId,
    name: vip.name,
    fqdn: vip.fqdn,
    ...(vip.ipv4 !== undefined ? { ipv4: vip.ipv4 } : {}),
    ...(vip.ipv6 !== undefined ? { ipv6: vip.ipv6 } : {}),
  };
}

function scanToJSON(scan: Scan): JsonOutputScan {
  return {
    network: scan.networkId,
    name: scan.name,
    fqdn: scan.fqdn,
    ipv4: [...scan.ipv4],
    ipv6: [...scan.ipv6],
  };
}

function listenerToJSON(listener: Listener): JsonOutputListener {
  return {
    name: listener.name,
    type: listener.type,
    ...(listener.networkId !== undefined ? { network: listener.networkId } : {}),
    endpoints: listener.endpoints,
    protocol_ports: { ...listener.protocolPorts },
    ...(listener.address !== undefined ? { address: listener.address } : {}),
    ...(listener.ipv4 !== undefined ? { ipv4: listener.ipv4 } : {}),
    ...(listener.ipv6 !== undefined ? { ipv6: listener.ipv6 } : {}),
  };
}

function scanListenerToJSON(scanListener: ScanListener): JsonOutputScanListener {
  return {
    network: scanListener.networkId,
    scan_address: scanListener.scanAddress,
    endpoints: scanListener.endpoints,
    protocol_ports: { ...scanListener.protocolPorts },
    ipv4: [...scanListener.ipv4],
    ipv6: [...scanListener.ipv6],
  };
}

// ── Deterministic serialization ─────────────────────────────
// Keys are sorted lexicographically for stable, diffable output.

export function serializeJSON(output: unknown): string {
  return JSON.stringify(output, sortedReplacer, 2);
}

export function serializeYAML(output: unknown): string {
  return stringifyYaml(output, { sortMapEntries: true });
}

function sortedReplacer(_key: string, value: unknown): unknown {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return value;
  }
  return Object.fromEntries(
    Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)),
  );
}

// ── Text summary ─────────────────────────────────────────────

export function generateText(facts: ClusterFacts): string {
  const lines: string[] = [];

  lines.push(`Cluster:   ${facts.clusterName || '(unknown)'}`);
  lines.push(`Mode:      ${facts.isCrs ? 'clusterware' : 'restart'}`);
  lines.push(`Host:      ${facts.hostname}`);
  lines.push(`Home:      ${facts.crsHome}`);
  for (const [key, value] of Object.entries(facts.versions)) {
    lines.push(`Version:   ${key} = ${value}`);
  }

  section(lines, 'Networks', facts.networks, (n) =>
    `${n.id}  ${n.ipv4Subnet ?? '-'}  ${n.ipv6Subnet ?? '-'}`,
  );
  section(lines, 'VIPs', facts.vips, (v) =>
    `${v.networkId}  ${v.fqdn}  ${v.ipv4 ?? '-'}  ${v.ipv6 ?? '-'}`,
  );
  section(lines, 'SCANs', facts.scans, (s) =>
    `${s.networkId}  ${s.fqdn}  ${[...s.ipv4, ...s.ipv6].join(', ')}`,
  );
  section(lines, 'Listeners', facts.localListeners, (l) =>
    `${l.name}  ${l.endpoints}  ${l.address ?? '-'}`,
  );
  section(lines, 'SCAN listeners', facts.scanListeners, (s) =>
    `${s.networkId}  ${s.scanAddress}  ${s.endpoints}`,
  );
  section(lines, 'Databases', facts.databases, (d) => d);
  section(lines, 'Issues', facts.issues, (i) =>
    `[${i.entity}] ${i.message}: ${i.line}`,
  );

  return lines.join('\n');
}

function section<T>(
  lines: string[],
  title: string,
  items: readonly T[],
  format: (item: T) => string,
): void {
  if (items.length === 0) return;
  lines.push('');
  lines.push(`${title}:`);
  for (const item of items) {
    lines.push(`  ${format(item)}`);
  }
}

// ── Format dispatch ──────────────────────────────────────────

export function renderFacts(facts: ClusterFacts, format: OutputFormat): string {
  switch (format) {
    case 'json':
      return serializeJSON(generateJSON(facts));
    case 'yaml':
      return serializeYAML(generateJSON(facts));
    case 'text':
      return generateText(facts);
  }
}
