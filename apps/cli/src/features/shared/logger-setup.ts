import { ConsoleSink, initLogger, resolveLogLevel, validateLoggerEnv } from '@clearledger/logger';

/**
 * Route logs to stderr; stdout carries the command's CSV or JSON output.
 */
export function configureCliLogger(options: { verbose: boolean }, env: NodeJS.ProcessEnv = process.env): void {
  const config = validateLoggerEnv(env);

  initLogger({
    level: resolveLogLevel(config.CLEARLEDGER_LOG_LEVEL, options.verbose),
    sinks: [new ConsoleSink({ color: config.CLEARLEDGER_LOG_COLOR, target: 'stderr' })],
  });
}
