import type { LogEntry, Sink } from './logger.js';

export interface BufferedSinkOptions {
  maxBuffer?: number;
}

/**
 * Base class for sinks that buffer entries and write them on the next tick,
 * so a tight processing loop is not slowed down by console output.
 *
 * Subclasses implement `writeEntry(entry)`. Call `flush()` before exiting.
 */
export abstract class BufferedSink implements Sink {
  private buffer: LogEntry[] = [];
  private scheduled = false;
  private dropped = 0;
  private readonly maxBuffer: number;

  constructor(options?: BufferedSinkOptions) {
    this.maxBuffer = options?.maxBuffer ?? 1000;
  }

  protected abstract writeEntry(entry: LogEntry): void;

  write(entry: LogEntry): void {
    if (this.buffer.length >= this.maxBuffer) {
      this.dropped++;
      this.buffer.shift(); // drop oldest
    }
    this.buffer.push(entry);
    if (!this.scheduled) {
      this.scheduled = true;
      setImmediate(() => this.drain());
    }
  }

  flush(): void {
    this.drain();
  }

  private drain(): void {
    const entries = this.buffer;
    const dropped = this.dropped;
    this.buffer = [];
    this.scheduled = false;
    this.dropped = 0;

    if (dropped > 0) {
      this.writeEntry({
        level: 'warn',
        category: 'logger',
        timestamp: new Date(),
        msg: `Dropped ${String(dropped)} log entries (buffer overflow)`,
      });
    }

    for (const entry of entries) {
      this.writeEntry(entry);
    }
  }
}
