import type { CommandRunner } from '../exec/index.js';
import type { HostResolver, ToolPaths } from '../host/index.js';
import type { FactEntity, FactIssue, NetworkMap, ScanMap, VipMap } from '../schema/index.js';
import * as log from '../utils/logger.js';
import { MalformedRecordError } from './errors.js';

// ── FactsContext ─────────────────────────────────────────────
// Everything a resolver reads. Mappings are filled in order
// networks → vips → scans by replacing the context, never by mutation.

export interface FactsContext {
  readonly tools: ToolPaths;
  readonly runner: CommandRunner;
  readonly host: HostResolver;
  readonly hostname: string;
  readonly isCrs: boolean;
  readonly networks: NetworkMap;
  readonly vips: VipMap;
  readonly scans: ScanMap;
}

export interface FactsContextInput {
  tools: ToolPaths;
  runner: CommandRunner;
  host: HostResolver;
  isCrs: boolean;
  hostname?: string;
}

export function createFactsContext(input: FactsContextInput): FactsContext {
  return {
    tools: input.tools,
    runner: input.runner,
    host: input.host,
    hostname: input.hostname ?? input.host.shortHostname(),
    isCrs: input.isCrs,
    networks: new Map(),
    vips: new Map(),
    scans: new Map(),
  };
}

// ── Resolved values ──────────────────────────────────────────

export interface Resolved<T> {
  value: T;
  issues: FactIssue[];
}

/**
 * Run one resolution step. A malformed record becomes an issue and the
 * step contributes `fallback`; any other error propagates.
 */
export async function isolate<T>(
  entity: FactEntity,
  command: string,
  fallback: T,
  step: () => Promise<T> | T,
): Promise<Resolved<T>> {
  try {
    return { value: await step(), issues: [] };
  } catch (err) {
    if (!(err instanceof MalformedRecordError)) throw err;
    const located = err.withCommand(command);
    log.warn(located.message);
    return {
      value: fallback,
      issues: [
        {
          entity,
          command,
          line: located.line,
          message: located.reason,
        },
      ],
    };
  }
}
