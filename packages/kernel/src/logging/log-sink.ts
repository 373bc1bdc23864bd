/**
 * Switchboard Kernel: Log Sink Interface
 *
 * The kernel owns the contract; concrete sinks (JSONL file, in-memory,
 * console) live in the runtime host and CLI and are injected into a Logger.
 * The kernel never writes to disk or to a terminal directly.
 */

import type { LogLevel } from '../types/host.js';

export interface LogEntry {
  /** Monotonic sequence number within one Logger. */
  readonly seq: number;
  /** ISO 8601 timestamp. */
  readonly timestamp: string;
  readonly level: LogLevel;
  /** API name (or `root`) the line was emitted for. */
  readonly source: string;
  readonly message: string;
}

/**
 * Receives log entries. append() is synchronous; a sink that cannot persist
 * an entry throws rather than dropping it.
 */
export interface LogSink {
  append(entry: LogEntry): void;
}
