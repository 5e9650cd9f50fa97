import { MalformedRecordError } from '../core/errors.js';
import type { NetworkId } from '../schema/index.js';

// ── Public types ─────────────────────────────────────────────

/** A SCAN before its name has been resolved to a FQDN. */
export interface ScanDraft {
  readonly networkId: NetworkId;
  readonly name: string;
  readonly ipv4: readonly string[];
  readonly ipv6: readonly string[];
}

// ── Parser ───────────────────────────────────────────────────

const SCAN_HEADER = /^SCAN name: (.+), Network: ([0-9]+)/;
const SCAN_ADDRESS = /^SCAN [0-9]+ (IPv4|IPv6) VIP: (.+)$/;

/**
 * Parse `srvctl config scan -all` output into SCAN drafts keyed by
 * network id. Address lines append, so a round-robin SCAN keeps every
 * address in input order.
 *
 * @throws MalformedRecordError when a `SCAN name:` line has no network
 */
export function parseScans(lines: readonly string[]): Map<NetworkId, ScanDraft> {
  const out = new Map<NetworkId, ScanDraft>();
  let current: ScanDraft | undefined;

  for (const line of lines) {
    if (line.startsWith('SCAN name:')) {
      if (current !== undefined) out.set(current.networkId, current);
      const header = SCAN_HEADER.exec(line);
      const name = header?.[1];
      const networkId = header?.[2];
      if (name === undefined || networkId === undefined) {
        throw new MalformedRecordError('SCAN record without a network number', line);
      }
      current = { networkId, name: name.trim(), ipv4: [], ipv6: [] };
      continue;
    }
    if (current === undefined) continue;

    const address = SCAN_ADDRESS.exec(line);
    const family = address?.[1];
    const value = address?.[2]?.trim();
    if (value === undefined || value.length === 0) continue;

    current =
      family === 'IPv4'
        ? { ...current, ipv4: [...current.ipv4, value] }
        : { ...current, ipv6: [...current.ipv6, value] };
  }

  if (current !== undefined) out.set(current.networkId, current);
  return out;
}
