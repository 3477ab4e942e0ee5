import pc from 'picocolors';

import { createErrorResponse, exitCodeToErrorCode } from './cli-response.js';
import type { ExitCode } from './exit-codes.js';

/**
 * Tips shown after error messages, keyed by error code.
 */
const ERROR_TIPS: Record<string, string> = {
  INVALID_ARGS: 'Check your command arguments and try again. Run with --help for usage information.',
  NOT_FOUND: 'The transaction file was not found. Double-check the path and try again.',
  VALIDATION_ERROR: 'The file must be a CSV with a header row naming the type, client, tx and amount columns.',
};

/**
 * Format a CLI error for stderr.
 */
export function formatCliError(error: Error, code: string, showStack = false): string {
  let text = `\n${pc.red('✗')} Error: ${error.message}\n`;

  const tip = ERROR_TIPS[code];
  if (tip) {
    text += `\n${pc.dim(tip)}\n`;
  }

  if (showStack && error.stack) {
    text += `\n${pc.dim(error.stack)}\n\n`;
  }

  return text;
}

/**
 * Display a CLI error and exit.
 * - Text mode: formatted error to stderr with contextual tips
 * - JSON mode: structured JSON error to stdout, `details` included
 */
export function displayCliError(
  command: string,
  error: Error,
  exitCode: ExitCode,
  format: 'json' | 'text',
  details?: unknown
): never {
  const code = exitCodeToErrorCode(exitCode);

  if (format === 'json') {
    console.log(JSON.stringify(createErrorResponse(command, error, code, details), undefined, 2));
  } else {
    process.stderr.write(formatCliError(error, code, process.env['NODE_ENV'] === 'development'));
  }

  process.exit(exitCode);
}
