import * as log from '../utils/logger.js';
import { formatCommand, splitOutputLines } from './runner.js';
import type { CommandResult, CommandRunner } from './runner.js';

// ── Script shape ─────────────────────────────────────────────
// Keys are space-joined argv. A string value is stdout of a successful
// run; a CommandResult is returned as-is.

export type CommandScript = Readonly<Record<string, string | CommandResult>>;

export interface ScriptedRunner extends CommandRunner {
  readonly calls: readonly string[];
}

const NOT_FOUND: CommandResult = { status: 'failed', exitCode: 127, lines: [] };

/**
 * Canned-output runner for tests and for replaying captured output.
 * Commands missing from the script behave like a missing executable.
 */
export function createScriptedRunner(script: CommandScript): ScriptedRunner {
  const calls: string[] = [];

  return {
    calls,
    async run(argv: readonly string[]): Promise<CommandResult> {
      const key = formatCommand(argv);
      calls.push(key);
      log.command(key);

      const entry = script[key];
      if (entry === undefined) return NOT_FOUND;
      if (typeof entry === 'string') {
        return { status: 'ok', lines: splitOutputLines(entry) };
      }
      return entry;
    },
  };
}
