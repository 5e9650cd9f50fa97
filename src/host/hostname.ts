import { lookup, lookupService } from 'node:dns/promises';
import { hostname } from 'node:os';

import { TIMEOUTS } from '../config/defaults.js';
import { withTimeout } from '../utils/timeout.js';

// ── HostResolver interface ───────────────────────────────────

export interface HostResolver {
  shortHostname(): string;
  toFqdn(name: string): Promise<string>;
}

// ── System resolver ──────────────────────────────────────────

export interface SystemHostResolverOptions {
  /** Bound on the forward plus reverse lookup of one name. */
  timeoutMs?: number;
}

/**
 * Resolves through the system resolver (hosts file, then DNS). A name
 * that cannot be resolved to a dotted host name in time is returned
 * unchanged.
 */
export function createSystemHostResolver(
  options: SystemHostResolverOptions = {},
): HostResolver {
  const timeoutMs = options.timeoutMs ?? TIMEOUTS.HOST_LOOKUP_TIMEOUT;

  return {
    shortHostname(): string {
      return toShortHostname(hostname());
    },

    async toFqdn(name: string): Promise<string> {
      if (name.includes('.') || name.length === 0) return name;
      try {
        const resolved = await withTimeout(
          lookup(name).then(({ address }) => lookupService(address, 0)),
          timeoutMs,
        );
        return resolved.hostname.includes('.') ? resolved.hostname : name;
      } catch {
        return name;
      }
    },
  };
}

export function toShortHostname(name: string): string {
  return name.split('.')[0] ?? name;
}
