// ── Endpoint formats ─────────────────────────────────────────
// `srvctl config scan_listener` changed its output between releases.
// Formats are tried in order; add new ones at the front.

export interface ScanEndpointFormat {
  readonly name: string;
  match(line: string): string | undefined;
}

export const currentEndpointFormat: ScanEndpointFormat = {
  name: 'endpoints',
  match(line) {
    return /^Endpoints: (.+)$/.exec(line)?.[1]?.trim();
  },
};

// 12c, 18c
export const legacyPortFormat: ScanEndpointFormat = {
  name: 'listener-port',
  match(line) {
    return /^SCAN Listener (.+) exists\. Port: (.+)$/.exec(line)?.[2]?.trim();
  },
};

export const SCAN_ENDPOINT_FORMATS: readonly ScanEndpointFormat[] = [
  currentEndpointFormat,
  legacyPortFormat,
];

/**
 * The endpoint spec of the first line any format recognises, or
 * undefined when no line matches.
 */
export function extractScanEndpoints(
  lines: readonly string[],
  formats: readonly ScanEndpointFormat[] = SCAN_ENDPOINT_FORMATS,
): string | undefined {
  for (const line of lines) {
    for (const format of formats) {
      const spec = format.match(line);
      if (spec !== undefined && spec.length > 0) return spec;
    }
  }
  return undefined;
}
