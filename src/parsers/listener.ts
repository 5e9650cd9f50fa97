import { MalformedRecordError } from '../core/errors.js';
import type { NetworkId, ProtocolPorts } from '../schema/index.js';
import { labeledValue, parseEndpoints } from './fields.js';

// ── Status ───────────────────────────────────────────────────

const ENABLED_LISTENER = /^Listener (.+?) is enabled/;

/**
 * Names of enabled listeners in `srvctl status listener` output, in
 * first-seen order without duplicates.
 *
 * @throws MalformedRecordError when an "is enabled" line names no listener
 */
export function parseEnabledListeners(lines: readonly string[]): string[] {
  const names: string[] = [];

  for (const line of lines) {
    if (!line.includes('is enabled')) continue;
    const name = ENABLED_LISTENER.exec(line)?.[1];
    if (name === undefined) {
      throw new MalformedRecordError('Enabled listener without a name', line);
    }
    if (!names.includes(name)) names.push(name);
  }

  return names;
}

// ── Config ───────────────────────────────────────────────────

export interface ListenerConfig {
  readonly name?: string;
  readonly type?: string;
  readonly networkId?: NetworkId;
  readonly endpoints?: string;
  readonly protocolPorts: ProtocolPorts;
}

/**
 * Parse `srvctl config listener -l <name>` output.
 *
 * @throws MalformedRecordError for a non-numeric network or an endpoint
 *   without a port
 */
export function parseListenerConfig(lines: readonly string[]): ListenerConfig {
  let config: ListenerConfig = { protocolPorts: {} };

  for (const line of lines) {
    const name = labeledValue(line, 'Name:');
    if (name !== undefined) {
      config = { ...config, name };
      continue;
    }
    const type = labeledValue(line, 'Type:');
    if (type !== undefined) {
      config = { ...config, type };
      continue;
    }
    const network = labeledValue(line, 'Network:');
    if (network !== undefined) {
      config = { ...config, networkId: parseListenerNetwork(network, line) };
      continue;
    }
    const endpoints = labeledValue(line, 'End points:');
    if (endpoints !== undefined) {
      try {
        config = { ...config, endpoints, protocolPorts: parseEndpoints(endpoints) };
      } catch (err) {
        if (err instanceof MalformedRecordError) {
          throw new MalformedRecordError(err.reason, line);
        }
        throw err;
      }
    }
  }

  return config;
}

// `Network: 1, Owner: grid` → `1`
function parseListenerNetwork(value: string, line: string): NetworkId {
  const comma = value.indexOf(',');
  const id = (comma === -1 ? value : value.slice(0, comma)).trim();
  if (!/^[0-9]+$/.test(id)) {
    throw new MalformedRecordError('Listener network is not a network number', line);
  }
  return id;
}
