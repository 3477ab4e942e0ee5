#!/usr/bin/env node
import { CommanderError, Command } from 'commander';

import { registerProcessCommand } from './features/process/process.js';
import { ExitCodes } from './features/shared/exit-codes.js';

const program = new Command();

async function main() {
  program
    .name('clearledger')
    .description('Apply a transaction log to client accounts and report the resulting balances')
    .version('1.0.0')
    .exitOverride();

  // Process command - default command, reads a CSV file and writes the account summary
  registerProcessCommand(program);

  await program.parseAsync();
}

// Handle unhandled rejections
process.on('unhandledRejection', (reason) => {
  process.stderr.write(`Unhandled Rejection: ${String(reason)}\n`);
  process.exit(ExitCodes.GENERAL_ERROR);
});

main().catch((error: unknown) => {
  // Commander already printed its own message (or the help/version text)
  if (error instanceof CommanderError) {
    process.exit(error.exitCode === 0 ? ExitCodes.SUCCESS : ExitCodes.INVALID_ARGS);
  }

  process.stderr.write(`CLI failed: ${String(error)}\n`);
  process.exit(ExitCodes.GENERAL_ERROR);
});
