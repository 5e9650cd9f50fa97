import type { Command } from 'commander';
import { z } from 'zod';

import { PATHS } from '../config/defaults.js';
import { loadConfigFile, resolveRuntimeConfig } from '../config/loader.js';
import type { ConfigOverrides } from '../config/loader.js';
import { exitCodeOf, gatherFacts, toErrorMessage } from '../core/index.js';
import { createProcessRunner } from '../exec/index.js';
import { createSystemHostResolver } from '../host/index.js';
import { renderFacts } from '../report/index.js';
import { outputFormatSchema } from '../schema/index.js';
import * as log from '../utils/logger.js';

// ── Flag parsing ─────────────────────────────────────────────

const timeoutFlagSchema = z.coerce.number().positive();

interface FactsOptions {
  oracleHome?: string;
  format?: string;
  timeout?: string;
  config: string;
  quiet?: true;
}

export function toOverrides(opts: FactsOptions): ConfigOverrides {
  return {
    ...(opts.oracleHome !== undefined ? { oracleHome: opts.oracleHome } : {}),
    ...(opts.format !== undefined
      ? { format: outputFormatSchema.parse(opts.format) }
      : {}),
    ...(opts.timeout !== undefined
      ? { timeoutSeconds: timeoutFlagSchema.parse(opts.timeout) }
      : {}),
  };
}

// ── Command registration ─────────────────────────────────────

export function registerFactsCommand(program: Command): void {
  program
    .command('facts')
    .description('Collect Grid Infrastructure facts for this host')
    .option('--oracle-home <dir>', 'Grid Infrastructure home')
    .option('--format <format>', 'Output format: json, yaml or text')
    .option('--timeout <seconds>', 'Timeout for each command in seconds')
    .option('--config <path>', 'Path to config file', PATHS.CONFIG_FILE)
    .option('--quiet', 'Do not log progress to stderr')
    .action(async (opts: FactsOptions) => {
      log.setSilent(opts.quiet === true);
      try {
        // 1. Config: CLI flags > config file > environment
        const fileConfig = await loadConfigFile(opts.config);
        const config = resolveRuntimeConfig(fileConfig, toOverrides(opts));

        // 2. Gather
        const facts = await gatherFacts({
          runner: createProcessRunner({ timeoutMs: config.commandTimeoutMs }),
          host: createSystemHostResolver(),
          olrLoc: config.olrLoc,
          oratab: config.oratab,
          ...(config.oracleHome !== undefined
            ? { oracleHome: config.oracleHome }
            : {}),
        });

        // 3. Document to stdout
        process.stdout.write(renderFacts(facts, config.format) + '\n');
        process.exitCode = 0;
      } catch (err) {
        log.setSilent(false);
        log.error(toErrorMessage(err));
        process.exitCode = exitCodeOf(err);
      }
    });
}
