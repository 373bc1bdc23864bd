/**
 * Switchboard Runtime Host: File-backed Log Sink
 *
 * Implements the kernel LogSink by appending one JSON object per line to a
 * `.jsonl` file. The write is synchronous and completes before append()
 * returns. The parent directory is created on the first write.
 */

import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import type { LogEntry, LogSink } from '@switchboard/kernel';

export class FileLogSink implements LogSink {
  private ready = false;

  constructor(readonly filePath: string) {}

  append(entry: LogEntry): void {
    if (!this.ready) {
      mkdirSync(dirname(this.filePath), { recursive: true });
      this.ready = true;
    }
    const line = JSON.stringify({
      seq: entry.seq,
      timestamp: entry.timestamp,
      level: entry.level,
      source: entry.source,
      message: entry.message,
    });
    appendFileSync(this.filePath, line + '\n', 'utf-8');
  }
}
