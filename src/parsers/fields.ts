import { MalformedRecordError } from '../core/errors.js';
import type { ProtocolPorts } from '../schema/index.js';

// ── Labeled fields ───────────────────────────────────────────

/**
 * Remainder of `line` after a literal `label`, trimmed; undefined when
 * the line does not start with the label.
 */
export function labeledValue(line: string, label: string): string | undefined {
  if (!line.startsWith(label)) return undefined;
  return line.slice(label.length).trim();
}

/** Like labeledValue, but an empty remainder counts as absent. */
export function optionalLabeledValue(
  line: string,
  label: string,
): string | undefined {
  const value = labeledValue(line, label);
  return value !== undefined && value.length > 0 ? value : undefined;
}

// ── Endpoints ────────────────────────────────────────────────

/**
 * Split an endpoint spec such as `TCP:1521/TCPS:2484` into a mapping
 * keyed by lower-cased protocol.
 */
export function parseEndpoints(spec: string): ProtocolPorts {
  const ports: ProtocolPorts = {};

  for (const token of spec.split('/')) {
    const trimmed = token.trim();
    if (trimmed.length === 0) continue;

    const colon = trimmed.indexOf(':');
    if (colon <= 0 || colon === trimmed.length - 1) {
      throw new MalformedRecordError('Endpoint is not PROTOCOL:PORT', spec);
    }
    ports[trimmed.slice(0, colon).toLowerCase()] = trimmed.slice(colon + 1);
  }

  return ports;
}
