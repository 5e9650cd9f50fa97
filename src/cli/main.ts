#!/usr/bin/env node

/**
 * gridfacts CLI entry point.
 * Thin wrapper — all logic delegated to core.
 */

import 'dotenv/config';
import { Command } from 'commander';

import { registerFactsCommand, registerParseCommand } from './index.js';

const program = new Command();

program
  .name('gridfacts')
  .description(
    'Collect Grid Infrastructure topology facts (VIPs, networks, SCANs, listeners) from srvctl and crsctl.',
  )
  .version('0.1.0');

registerFactsCommand(program);
registerParseCommand(program);

await program.parseAsync();
