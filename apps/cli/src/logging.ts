import { getLogLevel } from '@batchpay/env';
import { ConsoleSink, initLogger, PinoSink, type LogLevel } from '@batchpay/logger';
import pino from 'pino';

/**
 * Route logs away from command output: JSON lines on stderr in --json mode,
 * the console sink otherwise. Only warnings and errors unless --verbose.
 */
export function setupLogging(argv: readonly string[]): void {
  const json = argv.includes('--json');
  const level: LogLevel = argv.includes('--verbose') ? getLogLevel() : 'warn';

  initLogger({
    level,
    sinks: [
      json
        ? new PinoSink({ destination: pino.destination({ fd: 2, sync: true }), base: { app: 'batchpay' } })
        : new ConsoleSink({ color: process.stderr.isTTY }),
    ],
  });
}
