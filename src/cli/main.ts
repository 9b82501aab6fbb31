#!/usr/bin/env node

/**
 * listing-replay CLI entry point.
 * Thin wrapper — all logic delegated to core.
 */

import 'dotenv/config';
import { Command } from 'commander';

import { registerRunCommand, registerReplayCommand } from './run.js';

const program = new Command();

program
  .name('listing-replay')
  .description(
    'Drive an LLM browser agent through a listing-search task, record its actions as a replay script, and replay it with XPath fallback.',
  )
  .version('0.1.0');

registerRunCommand(program);
registerReplayCommand(program);

await program.parseAsync();
