#!/usr/bin/env node

import { Command } from 'commander';
import { convertCommand } from './commands/convert.js';
import { VERSION } from './version.js';

const program = new Command();

program
  .name('pathcase')
  .description('Rename files and directories into a consistent naming convention')
  .version(VERSION);

convertCommand(program);

// Error handling
program.exitOverride((err) => {
  if (err.code === 'commander.help' || err.code === 'commander.version') {
    process.exit(0);
  }
  process.exit(1);
});

// Parse arguments
await program.parseAsync();
