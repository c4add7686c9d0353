import type { LogEntry, Sink } from './logger.js';

export interface BufferedSinkOptions {
  /** Entries held before the oldest are dropped. Default 1000 */
  maxBuffer?: number | undefined;
}

/**
 * Sink base that queues entries and writes them on the next macrotask,
 * keeping output off the hot path of a batch run.
 */
export abstract class BufferedSink implements Sink {
  private pending: LogEntry[] = [];
  private drainScheduled = false;
  private droppedCount = 0;
  private readonly maxBuffer: number;

  constructor(options?: BufferedSinkOptions) {
    this.maxBuffer = options?.maxBuffer ?? 1000;
  }

  protected abstract writeEntry(entry: LogEntry): void;

  write(entry: LogEntry): void {
    if (this.pending.length >= this.maxBuffer) {
      this.pending.shift();
      this.droppedCount++;
    }
    this.pending.push(entry);

    if (!this.drainScheduled) {
      this.drainScheduled = true;
      setImmediate(() => this.drain());
    }
  }

  flush(): void {
    this.drain();
  }

  private drain(): void {
    const entries = this.pending;
    const dropped = this.droppedCount;
    this.pending = [];
    this.droppedCount = 0;
    this.drainScheduled = false;

    if (dropped > 0) {
      this.writeEntry({
        level: 'warn',
        category: 'logger',
        timestamp: new Date(),
        msg: `Dropped ${dropped} log entries (buffer overflow)`,
      });
    }

    for (const entry of entries) {
      this.writeEntry(entry);
    }
  }
}
