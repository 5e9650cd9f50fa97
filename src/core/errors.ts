// ── Error taxonomy ───────────────────────────────────────────
// Each error carries the process exit code the CLI reports for it.
// "No data" from a command is not an error and has no class here.

export class PreconditionFailedError extends Error {
  readonly exitCode = 2;

  constructor(message: string) {
    super(message);
    this.name = 'PreconditionFailedError';
  }
}

/**
 * A line that must open or continue a record does not have the
 * expected structure.
 */
export class MalformedRecordError extends Error {
  readonly exitCode = 3;
  readonly reason: string;
  readonly line: string;
  readonly command: string;

  constructor(reason: string, line: string, command = '') {
    super(
      command.length > 0
        ? `${reason} in output of ${command}: "${line}"`
        : `${reason}: "${line}"`,
    );
    this.name = 'MalformedRecordError';
    this.reason = reason;
    this.line = line;
    this.command = command;
  }

  withCommand(command: string): MalformedRecordError {
    return new MalformedRecordError(this.reason, this.line, command);
  }
}

export class CommandTimeoutError extends Error {
  readonly exitCode = 4;
  readonly command: string;
  readonly timeoutMs: number;

  constructor(command: string, timeoutMs: number) {
    super(`Command timed out after ${String(timeoutMs)}ms: ${command}`);
    this.name = 'CommandTimeoutError';
    this.command = command;
    this.timeoutMs = timeoutMs;
  }
}

export function exitCodeOf(err: unknown): number {
  if (
    err instanceof PreconditionFailedError ||
    err instanceof MalformedRecordError ||
    err instanceof CommandTimeoutError
  ) {
    return err.exitCode;
  }
  return 1;
}

export function toErrorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
