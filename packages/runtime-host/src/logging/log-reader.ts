/**
 * Switchboard Runtime Host: LogReader
 *
 * Parses JSONL log content written by FileLogSink.
 *
 * Guarantees:
 *   - lines that are not JSON, or lack one of the LogEntry fields, are dropped and counted
 *   - content not ending with '\n' marks the last line as partial; it is dropped and flagged
 *   - entries are returned in `seq` order (file order breaks ties)
 *   - empty input returns no entries and zero stats
 *
 * readLog() does no I/O; readLogFile() reads the file first.
 */

import { readFileSync } from 'node:fs';
import type { LogEntry } from '@switchboard/kernel';
import { isLogLevel, isRecord } from '@switchboard/kernel';
import { isNodeError } from '../fs-errors.js';

export interface LogReadStats {
  /** Non-empty lines seen, including a partial trailing line. */
  totalLines: number;
  /** Entries returned. */
  parsedEntries: number;
  /** Lines dropped because they were not valid entries. */
  parseErrors: number;
  /** True if the content did not end with '\n'. */
  partialTrailingLine: boolean;
}

export interface LogReadResult {
  readonly entries: ReadonlyArray<LogEntry>;
  readonly stats: LogReadStats;
}

export function readLog(raw: string): LogReadResult {
  const stats: LogReadStats = {
    totalLines: 0,
    parsedEntries: 0,
    parseErrors: 0,
    partialTrailingLine: false,
  };
  if (raw === '') {
    return { entries: [], stats };
  }

  const lines = raw.split('\n');
  // A trailing '\n' leaves one empty element; anything else is a partial write.
  const last = lines.pop() ?? '';
  if (last !== '') {
    stats.totalLines += 1;
    stats.partialTrailingLine = true;
  }

  const entries: LogEntry[] = [];
  for (const line of lines) {
    if (line.trim() === '') continue;
    stats.totalLines += 1;
    const entry = parseEntry(line);
    if (entry === undefined) {
      stats.parseErrors += 1;
      continue;
    }
    entries.push(entry);
  }

  entries.sort((a, b) => a.seq - b.seq);
  stats.parsedEntries = entries.length;
  return { entries, stats };
}

/** Read and parse a JSONL log file. A missing file reads as empty. */
export function readLogFile(filePath: string): LogReadResult {
  let raw: string;
  try {
    raw = readFileSync(filePath, 'utf-8');
  } catch (err: unknown) {
    if (!isNodeError(err, 'ENOENT')) throw err;
    raw = '';
  }
  return readLog(raw);
}

function parseEntry(line: string): LogEntry | undefined {
  let value: unknown;
  try {
    value = JSON.parse(line);
  } catch {
    return undefined;
  }
  if (!isRecord(value)) return undefined;
  const { seq, timestamp, level, source, message } = value;
  if (
    typeof seq !== 'number' ||
    typeof timestamp !== 'string' ||
    typeof level !== 'string' ||
    !isLogLevel(level) ||
    typeof source !== 'string' ||
    typeof message !== 'string'
  ) {
    return undefined;
  }
  return { seq, timestamp, level, source, message };
}
