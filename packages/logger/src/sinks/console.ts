import pc from 'picocolors';

import { BufferedSink, type BufferedSinkOptions } from '../buffered-sink.js';
import type { LogEntry, LogLevel } from '../logger.js';

export interface ConsoleSinkOptions extends BufferedSinkOptions {
  color?: boolean | undefined;
}

const levelColors: Record<LogLevel, (text: string) => string> = {
  trace: pc.gray,
  debug: pc.cyan,
  info: pc.green,
  warn: pc.yellow,
  error: pc.red,
};

/**
 * Human-readable console output.
 *
 * Format: `HH:MM:SS LEVEL [category] message {key=value, ...}` (UTC time)
 */
export class ConsoleSink extends BufferedSink {
  private readonly color: boolean;

  constructor(options?: ConsoleSinkOptions) {
    super(options);
    this.color = options?.color ?? false;
  }

  /**
   * Render one entry as a single line, without color codes when color is off
   */
  formatEntry(entry: LogEntry): string {
    const time = entry.timestamp.toISOString().slice(11, 19);
    const paddedLevel = entry.level.toUpperCase().padEnd(5);
    const level = this.color ? levelColors[entry.level](paddedLevel) : paddedLevel;
    const context = entry.context ? ` ${formatContext(entry.context)}` : '';
    return `${time} ${level} [${entry.category}] ${entry.msg}${context}`;
  }

  protected writeEntry(entry: LogEntry): void {
    const line = this.formatEntry(entry);

    if (entry.level === 'error') {
      console.error(line);
    } else if (entry.level === 'warn') {
      console.warn(line);
    } else {
      console.log(line);
    }
  }
}

function formatContext(context: Record<string, unknown>): string {
  const pairs = Object.entries(context).map(([key, value]) => `${key}=${JSON.stringify(value)}`);
  return `{${pairs.join(', ')}}`;
}
