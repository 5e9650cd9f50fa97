import { readFile } from 'node:fs/promises';

import { parse as parseYaml } from 'yaml';

import { fileConfigSchema } from '../schema/config.js';
import type { FileConfig, OutputFormat } from '../schema/config.js';
import { PATHS, TIMEOUTS } from './defaults.js';

// ── Public types ─────────────────────────────────────────────

export interface RuntimeConfig {
  oracleHome?: string;
  commandTimeoutMs: number;
  format: OutputFormat;
  olrLoc: string;
  oratab: string;
}

export interface ConfigOverrides {
  oracleHome?: string;
  timeoutSeconds?: number;
  format?: OutputFormat;
}

// ── File loading ─────────────────────────────────────────────

/**
 * Load and validate a `.gridfacts.yaml` (or JSON) config file.
 * A missing file yields an empty config; an unreadable or invalid one throws.
 */
export async function loadConfigFile(configPath: string): Promise<FileConfig> {
  let raw: string;
  try {
    raw = await readFile(configPath, 'utf-8');
  } catch (err) {
    if (isNotFound(err)) return {};
    throw err;
  }

  const parsed: unknown = configPath.endsWith('.json')
    ? JSON.parse(raw)
    : parseYaml(raw);

  return fileConfigSchema.parse(parsed ?? {});
}

// ── Merge ────────────────────────────────────────────────────

/**
 * CLI flags take precedence over the config file, which takes
 * precedence over the environment.
 */
export function resolveRuntimeConfig(
  file: FileConfig,
  overrides: ConfigOverrides,
  env: NodeJS.ProcessEnv = process.env,
): RuntimeConfig {
  const envTimeout = Number(env['GRIDFACTS_COMMAND_TIMEOUT']);
  const timeoutSeconds =
    overrides.timeoutSeconds ??
    file.commandTimeout ??
    (envTimeout > 0 ? envTimeout : undefined);

  // ORACLE_HOME is left to home discovery so it can report its source.
  const oracleHome = nonEmpty(overrides.oracleHome) ?? nonEmpty(file.oracleHome);

  return {
    ...(oracleHome !== undefined ? { oracleHome } : {}),
    commandTimeoutMs:
      timeoutSeconds !== undefined
        ? timeoutSeconds * 1000
        : TIMEOUTS.COMMAND_TIMEOUT,
    format: overrides.format ?? file.format ?? 'json',
    olrLoc: file.olrLoc ?? PATHS.OLR_LOC,
    oratab: file.oratab ?? PATHS.ORATAB,
  };
}

// ── Helpers ──────────────────────────────────────────────────

function nonEmpty(value: string | undefined): string | undefined {
  return value !== undefined && value.trim().length > 0 ? value : undefined;
}

export function isNotFound(err: unknown): boolean {
  return (
    typeof err === 'object' &&
    err !== null &&
    'code' in err &&
    err.code === 'ENOENT'
  );
}
