/**
 * Switchboard Runtime Host: In-memory Log Sink
 *
 * Keeps entries in an array. Used by tests to assert on diagnostics and by
 * the CLI to render a run's log after the fact.
 */

import type { LogEntry, LogLevel, LogSink } from '@switchboard/kernel';

export class MemoryLogSink implements LogSink {
  private readonly buffer: LogEntry[] = [];

  append(entry: LogEntry): void {
    this.buffer.push(entry);
  }

  get entries(): ReadonlyArray<LogEntry> {
    return this.buffer;
  }

  /** Messages, optionally only those of one level. */
  messages(level?: LogLevel): ReadonlyArray<string> {
    return this.buffer
      .filter((entry) => level === undefined || entry.level === level)
      .map((entry) => entry.message);
  }

  clear(): void {
    this.buffer.length = 0;
  }
}
