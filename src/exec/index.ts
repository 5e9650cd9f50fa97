/**
 * Command execution module.
 * The only module allowed to start child processes.
 */

export * from './runner.js';
export { createProcessRunner } from './process.js';
export type { ProcessRunnerOptions } from './process.js';
export { createScriptedRunner } from './scripted.js';
export type { CommandScript, ScriptedRunner } from './scripted.js';
