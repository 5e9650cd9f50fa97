import { MalformedRecordError } from '../core/errors.js';
import type { NetworkId } from '../schema/index.js';
import { labeledValue, optionalLabeledValue } from './fields.js';

// ── Public types ─────────────────────────────────────────────

/** A VIP before its name has been resolved to a FQDN. */
export interface VipDraft {
  readonly networkId: NetworkId;
  readonly name: string;
  readonly ipv4?: string;
  readonly ipv6?: string;
}

// ── Parser ───────────────────────────────────────────────────

const VIP_NETWORK = /network number ([0-9]+),/;

/**
 * Parse `srvctl config vip -n <node>` output into VIP drafts keyed by
 * network id.
 *
 * @throws MalformedRecordError when a `VIP exists:` line carries no
 *   network number
 */
export function parseVips(lines: readonly string[]): Map<NetworkId, VipDraft> {
  const out = new Map<NetworkId, VipDraft>();
  let current: VipDraft | undefined;

  for (const line of lines) {
    if (line.startsWith('VIP exists:')) {
      if (current !== undefined) out.set(current.networkId, current);
      const networkId = VIP_NETWORK.exec(line)?.[1];
      if (networkId === undefined) {
        throw new MalformedRecordError('VIP record without a network number', line);
      }
      current = { networkId, name: '' };
      continue;
    }
    if (current === undefined) continue;

    const name = labeledValue(line, 'VIP Name:');
    if (name !== undefined) {
      current = { ...current, name };
      continue;
    }
    const ipv4 = optionalLabeledValue(line, 'VIP IPv4 Address:');
    if (ipv4 !== undefined) {
      current = { ...current, ipv4 };
      continue;
    }
    const ipv6 = optionalLabeledValue(line, 'VIP IPv6 Address:');
    if (ipv6 !== undefined) {
      current = { ...current, ipv6 };
    }
  }

  if (current !== undefined) out.set(current.networkId, current);
  return out;
}
