/**
 * Live execution logger for gridfacts.
 *
 * All output goes to stderr so stdout stays clean for the fact document.
 * Emoji prefixes give instant visual context in the terminal.
 */

let silent = false;

// ── Core write ──────────────────────────────────────────────

function write(message: string): void {
  if (silent) return;
  process.stderr.write(message + '\n');
}

// ── Public API ──────────────────────────────────────────────

export function setSilent(value: boolean): void {
  silent = value;
}

export function info(message: string): void {
  write(`ℹ️  ${message}`);
}

export function detail(message: string): void {
  write(`   ${message}`);
}

export function section(title: string): void {
  write(`\n${'─'.repeat(50)}`);
  write(`▶  ${title}`);
  write(`${'─'.repeat(50)}`);
}

export function warn(message: string): void {
  write(`⚠️  ${message}`);
}

export function error(message: string): void {
  write(`💥 ${message}`);
}

export function command(commandLine: string): void {
  write(`⚙️  ${commandLine}`);
}

export function found(count: number, kind: string): void {
  write(`🔍 Found ${String(count)} ${kind}`);
}

export function home(path: string, source: string): void {
  write(`🏠 Grid home ${path} (from ${source})`);
}
