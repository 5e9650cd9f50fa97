// ── CommandResult ────────────────────────────────────────────
// Captured stdout is split into trimmed lines. A non-zero exit is not
// an error here: callers decide whether "failed" means "no data".

export type CommandResult =
  | { status: 'ok'; lines: string[] }
  | { status: 'failed'; exitCode: number | null; lines: string[] }
  | { status: 'timeout'; timeoutMs: number };

// ── CommandRunner interface ──────────────────────────────────

export interface CommandRunner {
  run(argv: readonly string[]): Promise<CommandResult>;
}

// ── Helpers ──────────────────────────────────────────────────

/**
 * Stdout lines of a successful run; a failed or timed-out run has none.
 */
export function commandLines(result: CommandResult): string[] {
  return result.status === 'ok' ? result.lines : [];
}

/**
 * First line of a successful run, or '' when there is none.
 */
export function firstLine(result: CommandResult): string {
  return commandLines(result)[0] ?? '';
}

/**
 * Split captured output into trimmed lines. A terminating newline does
 * not produce a trailing empty line.
 */
export function splitOutputLines(output: string): string[] {
  if (output.length === 0) return [];
  const lines = output.split(/\r?\n/);
  if (lines[lines.length - 1] === '') lines.pop();
  return lines.map((line) => line.trim());
}

export function formatCommand(argv: readonly string[]): string {
  return argv.join(' ');
}
