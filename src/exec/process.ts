import { execFile } from 'node:child_process';
import type { ExecFileException } from 'node:child_process';

import { LIMITS, TIMEOUTS } from '../config/defaults.js';
import * as log from '../utils/logger.js';
import { formatCommand, splitOutputLines } from './runner.js';
import type { CommandResult, CommandRunner } from './runner.js';

// ── Public types ─────────────────────────────────────────────

export interface ProcessRunnerOptions {
  timeoutMs?: number;
  maxBuffer?: number;
  env?: NodeJS.ProcessEnv;
}

// ── Runner ───────────────────────────────────────────────────

/**
 * Runs commands as child processes. No shell is involved: argv[0] is
 * the executable path.
 */
export function createProcessRunner(
  options: ProcessRunnerOptions = {},
): CommandRunner {
  const timeoutMs = options.timeoutMs ?? TIMEOUTS.COMMAND_TIMEOUT;
  const maxBuffer = options.maxBuffer ?? LIMITS.MAX_EXEC_BUFFER;

  return {
    run(argv: readonly string[]): Promise<CommandResult> {
      const [file, ...args] = argv;
      if (file === undefined) {
        return Promise.reject(new Error('Cannot run an empty command'));
      }

      log.command(formatCommand(argv));

      return new Promise((resolve) => {
        execFile(
          file,
          args,
          {
            timeout: timeoutMs,
            maxBuffer,
            encoding: 'utf-8',
            ...(options.env !== undefined ? { env: options.env } : {}),
          },
          (err, stdout) => {
            resolve(toResult(err, stdout, timeoutMs, argv));
          },
        );
      });
    },
  };
}

// ── Result mapping ───────────────────────────────────────────

function toResult(
  err: ExecFileException | null,
  stdout: string,
  timeoutMs: number,
  argv: readonly string[],
): CommandResult {
  if (err === null) {
    return { status: 'ok', lines: splitOutputLines(stdout) };
  }

  if (err.killed === true && err.signal === 'SIGTERM') {
    log.warn(`${formatCommand(argv)} timed out after ${String(timeoutMs)}ms`);
    return { status: 'timeout', timeoutMs };
  }

  const exitCode = typeof err.code === 'number' ? err.code : null;
  log.detail(
    `${formatCommand(argv)} failed (${exitCode !== null ? `exit ${String(exitCode)}` : err.message})`,
  );
  return { status: 'failed', exitCode, lines: splitOutputLines(stdout) };
}
