/**
 * RecordSink - FIFO hand-off between conversation sessions and durable storage.
 *
 * Sessions enqueue completed records synchronously; an interval task drains
 * the queue oldest-first, one write at a time. A failed write is reported
 * and dropped, never re-queued.
 */

import type { FormRecord } from "../types/form-record";

export const DEFAULT_DRAIN_INTERVAL_MS = 5000;

export interface RecordWriter {
  write(record: FormRecord): Promise<void>;
}

/** The only part of the sink a session sees. */
export interface RecordQueue {
  enqueue(record: FormRecord): void;
}

export interface RecordSinkOptions {
  /** Drain interval in milliseconds (default: 5000, must be positive) */
  drainIntervalMs?: number;
  /** Called for every write that fails; the record is not retried */
  onWriteError?: (error: Error, record: FormRecord) => void;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export class RecordSink implements RecordQueue {
  private queue: FormRecord[] = [];
  private timer: ReturnType<typeof setInterval> | null = null;
  private inFlight: Promise<number> | null = null;
  private readonly drainIntervalMs: number;
  private readonly options: RecordSinkOptions;

  constructor(
    private readonly writer: RecordWriter,
    options: RecordSinkOptions = {}
  ) {
    const interval = options.drainIntervalMs ?? DEFAULT_DRAIN_INTERVAL_MS;
    if (interval <= 0) {
      throw new Error("drainIntervalMs must be positive");
    }
    this.drainIntervalMs = interval;
    this.options = options;
  }

  enqueue(record: FormRecord): void {
    this.queue.push(record);
  }

  get pending(): number {
    return this.queue.length;
  }

  get isRunning(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer) return;

    this.timer = setInterval(() => {
      if (this.inFlight || this.queue.length === 0) return;
      this.drain().catch((error) => {
        console.error("[RecordSink] Drain failed:", error);
      });
    }, this.drainIntervalMs);
    console.log(`[RecordSink] Draining every ${this.drainIntervalMs}ms`);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  /**
   * Write every queued record. Concurrent callers share the pass already in
   * progress, so there is never more than one consumer.
   * @returns Number of records written successfully
   */
  drain(): Promise<number> {
    if (!this.inFlight) {
      this.inFlight = this.drainQueue().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  /**
   * Stop the timer and write whatever is still queued.
   */
  async flush(): Promise<number> {
    this.stop();
    let written = await this.drain();
    while (this.queue.length > 0) {
      written += await this.drain();
    }
    return written;
  }

  private async drainQueue(): Promise<number> {
    let written = 0;
    let record = this.queue.shift();

    while (record !== undefined) {
      try {
        await this.writer.write(record);
        written += 1;
      } catch (error) {
        this.reportWriteError(toError(error), record);
      }
      record = this.queue.shift();
    }

    return written;
  }

  private reportWriteError(error: Error, record: FormRecord): void {
    if (this.options.onWriteError) {
      this.options.onWriteError(error, record);
      return;
    }
    console.error(
      `[RecordSink] Dropped record for "${record.studentName}" (${record.courseName}):`,
      error
    );
  }
}
