import { readFile } from 'node:fs/promises';

import type { Command } from 'commander';
import { z } from 'zod';

import { exitCodeOf, toErrorMessage } from '../core/index.js';
import { splitOutputLines } from '../exec/index.js';
import {
  extractBracketedVersion,
  extractScanEndpoints,
  parseEndpoints,
  parseEnabledListeners,
  parseListenerConfig,
  parseNetworks,
  parseScans,
  parseVips,
} from '../parsers/index.js';
import { serializeJSON } from '../report/index.js';
import * as log from '../utils/logger.js';

// ── Kinds ────────────────────────────────────────────────────

export const captureKindSchema = z.enum([
  'network',
  'vip',
  'scan',
  'listener-status',
  'listener-config',
  'scan-listener',
  'version',
]);

export type CaptureKind = z.infer<typeof captureKindSchema>;

/**
 * Run one parser over captured command output. Useful for checking
 * output of releases the parsers have not seen yet.
 */
export function parseCapturedOutput(
  kind: CaptureKind,
  lines: readonly string[],
): unknown {
  switch (kind) {
    case 'network':
      return [...parseNetworks(lines).values()];
    case 'vip':
      return [...parseVips(lines).values()];
    case 'scan':
      return [...parseScans(lines).values()];
    case 'listener-status':
      return parseEnabledListeners(lines);
    case 'listener-config':
      return parseListenerConfig(lines);
    case 'scan-listener': {
      const endpoints = extractScanEndpoints(lines);
      return endpoints !== undefined
        ? { endpoints, protocolPorts: parseEndpoints(endpoints) }
        : null;
    }
    case 'version':
      return lines
        .filter((line) => line.length > 0)
        .map((line) => extractBracketedVersion(line) ?? line);
  }
}

// ── Command registration ─────────────────────────────────────

export function registerParseCommand(program: Command): void {
  program
    .command('parse')
    .description('Parse a saved srvctl/crsctl output file and print the records')
    .argument('<kind>', `Output kind: ${captureKindSchema.options.join(', ')}`)
    .argument('<file>', 'File holding the captured output')
    .action(async (kind: string, file: string) => {
      try {
        const parsedKind = captureKindSchema.parse(kind);
        const lines = splitOutputLines(await readFile(file, 'utf-8'));
        const records = parseCapturedOutput(parsedKind, lines);
        process.stdout.write(serializeJSON(records) + '\n');
        process.exitCode = 0;
      } catch (err) {
        log.error(toErrorMessage(err));
        process.exitCode = exitCodeOf(err);
      }
    });
}
