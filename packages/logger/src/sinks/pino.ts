import pino from 'pino';

import type { LogEntry, Sink } from '../logger.js';

export interface PinoSinkOptions {
  /** Where JSON lines go. Defaults to stdout */
  destination?: pino.DestinationStream | undefined;
  /** Static fields added to every line (service name, environment, ...) */
  base?: Record<string, unknown> | undefined;
}

/**
 * Structured JSON output through pino, one line per entry.
 *
 * Level filtering happens in the logger, so the pino instance accepts everything.
 * The entry category and context are merged into the line as top-level fields.
 */
export class PinoSink implements Sink {
  private readonly output: pino.Logger;

  constructor(options?: PinoSinkOptions) {
    const pinoOptions: pino.LoggerOptions = {
      level: 'trace',
      base: options?.base ?? {},
      timestamp: pino.stdTimeFunctions.isoTime,
    };
    this.output = options?.destination ? pino(pinoOptions, options.destination) : pino(pinoOptions);
  }

  write(entry: LogEntry): void {
    this.output[entry.level]({ category: entry.category, ...entry.context }, entry.msg);
  }

  flush(): void {
    this.output.flush();
  }
}
