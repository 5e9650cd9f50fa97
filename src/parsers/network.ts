import type { Network, NetworkId } from '../schema/index.js';
import { optionalLabeledValue } from './fields.js';

const NETWORK_HEADER = /^Network ([0-9]+) exists/;

/**
 * Parse `srvctl config network` output into networks keyed by id.
 * Lines other than the header and subnet fields are ignored.
 */
export function parseNetworks(lines: readonly string[]): Map<NetworkId, Network> {
  const out = new Map<NetworkId, Network>();
  let current: Network | undefined;

  for (const line of lines) {
    const header = NETWORK_HEADER.exec(line);
    if (header?.[1] !== undefined) {
      if (current !== undefined) out.set(current.id, current);
      current = { id: header[1] };
      continue;
    }
    if (current === undefined) continue;

    const ipv4Subnet = optionalLabeledValue(line, 'Subnet IPv4:');
    if (ipv4Subnet !== undefined) {
      current = { ...current, ipv4Subnet };
      continue;
    }
    const ipv6Subnet = optionalLabeledValue(line, 'Subnet IPv6:');
    if (ipv6Subnet !== undefined) {
      current = { ...current, ipv6Subnet };
    }
  }

  if (current !== undefined) out.set(current.id, current);
  return out;
}
