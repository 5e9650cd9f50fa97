import { readFile } from 'node:fs/promises';
import path from 'node:path';

import { isNotFound } from '../config/loader.js';
import { CommandTimeoutError, PreconditionFailedError } from '../core/errors.js';
import { commandLines, formatCommand } from '../exec/index.js';
import type { CommandRunner } from '../exec/index.js';

// ── Public types ─────────────────────────────────────────────

export type HomeSource = 'option' | 'environment' | 'processes' | 'olr.loc' | 'oratab';

export interface GridHome {
  path: string;
  source: HomeSource;
}

export interface HomeDiscoveryInput {
  configured?: string;
  env?: NodeJS.ProcessEnv;
  runner: CommandRunner;
  olrLoc: string;
  oratab: string;
}

// ── Discovery ────────────────────────────────────────────────

const PROCESS_LIST = ['ps', '-eo', 'args'] as const;

/**
 * Locate the Grid Infrastructure home: configured value, running
 * clusterware daemons, olr.loc, the +ASM oratab entry, then ORACLE_HOME.
 *
 * @throws PreconditionFailedError when no source yields a home
 */
export async function discoverGridHome(input: HomeDiscoveryInput): Promise<GridHome> {
  if (input.configured !== undefined) {
    return { path: input.configured, source: 'option' };
  }

  const processes = await input.runner.run(PROCESS_LIST);
  if (processes.status === 'timeout') {
    throw new CommandTimeoutError(formatCommand(PROCESS_LIST), processes.timeoutMs);
  }
  const fromProcesses = parseCrsHomeFromProcesses(commandLines(processes));
  if (fromProcesses !== undefined) {
    return { path: fromProcesses, source: 'processes' };
  }

  const fromOlr = parseOlrLoc(await readOptional(input.olrLoc));
  if (fromOlr !== undefined) {
    return { path: fromOlr, source: 'olr.loc' };
  }

  const fromOratab = parseOratabCrsHome(await readOptional(input.oratab));
  if (fromOratab !== undefined) {
    return { path: fromOratab, source: 'oratab' };
  }

  // ORACLE_HOME last: for the database owner it names a database home.
  const envHome = (input.env ?? process.env)['ORACLE_HOME']?.trim();
  if (envHome !== undefined && envHome.length > 0) {
    return { path: envHome, source: 'environment' };
  }

  throw new PreconditionFailedError(
    'Could not find the Grid Infrastructure home; set ORACLE_HOME or pass --oracle-home',
  );
}

// ── Source parsers ───────────────────────────────────────────

const CLUSTERWARE_DAEMON = /^(\/\S+)\/bin\/(?:ohasd|ocssd|crsd|evmd)\.bin$/;

/** Home of the first running clusterware daemon in `ps -eo args` output. */
export function parseCrsHomeFromProcesses(lines: readonly string[]): string | undefined {
  for (const line of lines) {
    const executable = line.split(/\s+/)[0] ?? '';
    const home = CLUSTERWARE_DAEMON.exec(executable)?.[1];
    if (home !== undefined) return home;
  }
  return undefined;
}

/** `crs_home=` value of an olr.loc file. */
export function parseOlrLoc(text: string): string | undefined {
  for (const line of text.split('\n')) {
    const [key, ...rest] = line.trim().split('=');
    if (key === 'crs_home') {
      const value = rest.join('=').trim();
      if (value.length > 0) return value;
    }
  }
  return undefined;
}

/** Home of the first `+ASM` entry in an oratab file. */
export function parseOratabCrsHome(text: string): string | undefined {
  for (const raw of text.split('\n')) {
    const line = raw.trim();
    if (line.length === 0 || line.startsWith('#')) continue;
    const [sid, home] = line.split(':');
    if (sid?.startsWith('+ASM') && home !== undefined && home.length > 0) {
      return path.normalize(home);
    }
  }
  return undefined;
}

async function readOptional(file: string): Promise<string> {
  try {
    return await readFile(file, 'utf-8');
  } catch (err) {
    if (isNotFound(err)) return '';
    throw err;
  }
}
