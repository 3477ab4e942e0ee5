import { resolve } from 'node:path';

import { flushLoggers } from '@clearledger/logger';
import type { Command } from 'commander';
import { err, type Result } from 'neverthrow';
import type { z } from 'zod';

import { displayCliError } from '../shared/cli-error.js';
import { createSuccessResponse } from '../shared/cli-response.js';
import { ExitCodes } from '../shared/exit-codes.js';
import { configureCliLogger } from '../shared/logger-setup.js';
import { ProcessCommandOptionsSchema, TransactionFileArgumentSchema } from '../shared/schemas.js';

import { ProcessHandler, type ProcessResult } from './process-handler.js';
import { convertToCSV, exitCodeForProcessError, toProcessCommandResult } from './process-utils.js';
import { TransactionSourceError } from './transaction-csv-reader.js';

/**
 * Process command options validated by Zod at CLI boundary
 */
export type ProcessCommandOptions = z.infer<typeof ProcessCommandOptionsSchema>;

/**
 * Register the process command. It is also the default command, so
 * `clearledger transactions.csv > accounts.csv` works.
 */
export function registerProcessCommand(program: Command): void {
  program
    .command('process', { isDefault: true })
    .description('Apply a CSV transaction log and print the resulting client accounts')
    .argument('<file>', 'CSV file with type, client, tx and amount columns')
    .option('--json', 'Output results in JSON format')
    .option('--verbose', 'Log ignored transactions and other debug details to stderr')
    .action(async (file: unknown, rawOptions: unknown) => {
      await executeProcessCommand(file, rawOptions);
    });
}

async function executeProcessCommand(rawFile: unknown, rawOptions: unknown): Promise<void> {
  // Check for --json flag early (even before validation) to determine output format
  const isJsonMode =
    typeof rawOptions === 'object' && rawOptions !== null && 'json' in rawOptions && rawOptions.json === true;

  const optionsResult = ProcessCommandOptionsSchema.safeParse(rawOptions);
  const fileResult = TransactionFileArgumentSchema.safeParse(rawFile);
  if (!optionsResult.success || !fileResult.success) {
    const issue = optionsResult.error?.issues[0] ?? fileResult.error?.issues[0];
    displayCliError(
      'process',
      new Error(issue?.message ?? 'Invalid options'),
      ExitCodes.INVALID_ARGS,
      isJsonMode ? 'json' : 'text'
    );
  }

  const options = optionsResult.data;
  const format = options.json ? 'json' : 'text';
  const startTime = Date.now();

  const result = await runProcessHandler(fileResult.data, options.verbose ?? false);
  flushLoggers();

  if (result.isErr()) {
    const error = result.error;
    const details = error instanceof TransactionSourceError ? { reason: error.reason } : undefined;
    displayCliError('process', error, exitCodeForProcessError(error), format, details);
  }

  writeProcessOutput(result.value, format, Date.now() - startTime);
}

async function runProcessHandler(file: string, verbose: boolean): Promise<Result<ProcessResult, Error>> {
  try {
    configureCliLogger({ verbose });

    const handler = new ProcessHandler();
    return await handler.execute({ filePath: resolve(file) });
  } catch (error) {
    return err(error instanceof Error ? error : new Error(String(error)));
  }
}

function writeProcessOutput(result: ProcessResult, format: 'json' | 'text', durationMs: number): void {
  if (format === 'json') {
    const response = createSuccessResponse('process', toProcessCommandResult(result), { duration_ms: durationMs });
    console.log(JSON.stringify(response, undefined, 2));
    return;
  }

  process.stdout.write(`${convertToCSV(result.accounts)}\n`);
}
