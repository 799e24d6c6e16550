#!/usr/bin/env node

/**
 * noirlings CLI entry point.
 * Thin wrapper; all logic is delegated to core.
 */

import 'dotenv/config';
import { Command } from 'commander';

import {
  registerHintCommand,
  registerListCommand,
  registerPendingCommand,
  registerResetCommand,
  registerRunCommand,
  registerVerifyCommand,
} from './run.js';

const program = new Command();

program
  .name('noirlings')
  .description(
    'Small exercises to get you used to reading and writing Noir circuits: build, execute, prove and verify.',
  )
  .version('0.1.0');

registerListCommand(program);
registerRunCommand(program);
registerVerifyCommand(program);
registerHintCommand(program);
registerResetCommand(program);
registerPendingCommand(program);

await program.parseAsync();
