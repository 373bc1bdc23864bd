/**
 * Console log sink for the CLI. Renders each entry as one themed line on
 * stderr so command output on stdout stays machine-readable.
 */

import type { LogEntry, LogSink } from '@switchboard/kernel';
import { levelColor, t } from './theme.js'

/** Uncolored single-line form of an entry. */
export function formatLogLine(entry: LogEntry): string {
  return `${entry.timestamp} ${entry.level.padEnd(7)} ${entry.source}: ${entry.message}`;
}

export function renderLogLine(entry: LogEntry): string {
  return `${t.dim(entry.timestamp)} ${levelColor(entry.level)(entry.level.padEnd(7))} ${t.blue(entry.source)}: ${entry.message}`;
}

export class ConsoleLogSink implements LogSink {
  constructor(
    private readonly write: (line: string) => void = (line) => {
      process.stderr.write(line + '\n');
    },
  ) {}

  append(entry: LogEntry): void {
    this.write(renderLogLine(entry));
  }
}
