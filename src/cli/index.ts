/**
 * CLI module — thin wrapper over core.
 * Parses arguments, delegates to core, handles exit codes.
 * No business logic lives here.
 */

export { registerFactsCommand } from './facts.js';
export { registerParseCommand, parseCapturedOutput } from './parse.js';
export type { CaptureKind } from './parse.js';
