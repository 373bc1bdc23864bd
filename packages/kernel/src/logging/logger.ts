/**
 * Switchboard Kernel: Logger
 *
 * Fans log entries out to injected sinks and filters by minimum level.
 * With no sinks the logger is a no-op, which suits tests and embedded use.
 */

import type { LogLevel } from '../types/host.js';
import type { LogEntry, LogSink } from './log-sink.js';

/** All levels, most severe first. */
export const LOG_LEVELS: ReadonlyArray<LogLevel> = ['error', 'warning', 'notice', 'info', 'debug'];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/** Lower is more severe. */
export function severity(level: LogLevel): number {
  return LOG_LEVELS.indexOf(level);
}

export class Logger {
  private seq = 0;

  /**
   * @param sinks - Destinations; every accepted entry goes to each of them in order
   * @param minLevel - Least severe level still recorded
   */
  constructor(
    private readonly sinks: ReadonlyArray<LogSink> = [],
    private readonly minLevel: LogLevel = 'debug',
  ) {}

  log(level: LogLevel, source: string, message: string): void {
    if (severity(level) > severity(this.minLevel)) return;
    this.seq += 1;
    const entry: LogEntry = {
      seq: this.seq,
      timestamp: new Date().toISOString(),
      level,
      source,
      message,
    };
    for (const sink of this.sinks) {
      sink.append(entry);
    }
  }

  /** Bind a source name, for handing to code that only knows its own API. */
  forSource(source: string): (level: LogLevel, message: string) => void {
    return (level, message) => this.log(level, source, message);
  }
}
