/**
 * Switchboard Kernel — Logger Tests
 *
 *   LOG-U1: entries reach every sink in order with increasing seq
 *   LOG-U2: entries below the minimum level are dropped without using a seq
 *   LOG-U3: forSource() binds the source name
 *   LOG-U4: level helpers
 */

import { describe, it, expect } from 'vitest';
import type { LogEntry, LogSink } from '../src/index.js';
import { Logger, isLogLevel, severity } from '../src/index.js';

class ArraySink implements LogSink {
  readonly entries: LogEntry[] = [];
  append(entry: LogEntry): void {
    this.entries.push(entry);
  }
}

describe('Logger', () => {
  it('LOG-U1: fans out to every sink', () => {
    const first = new ArraySink();
    const second = new ArraySink();
    const logger = new Logger([first, second]);

    logger.log('notice', 'root', 'one');
    logger.log('error', 'demo', 'two');

    expect(first.entries.map((e) => [e.seq, e.level, e.source, e.message])).toEqual([
      [1, 'notice', 'root', 'one'],
      [2, 'error', 'demo', 'two'],
    ]);
    expect(second.entries).toEqual(first.entries);
  });

  it('LOG-U2: drops entries less severe than the minimum level', () => {
    const sink = new ArraySink();
    const logger = new Logger([sink], 'notice');

    logger.log('debug', 'root', 'hidden');
    logger.log('info', 'root', 'hidden too');
    logger.log('warning', 'root', 'shown');

    expect(sink.entries).toHaveLength(1);
    expect(sink.entries[0]?.seq).toBe(1);
    expect(sink.entries[0]?.message).toBe('shown');
  });

  it('LOG-U3: forSource() binds the source', () => {
    const sink = new ArraySink();
    const log = new Logger([sink]).forSource('demo');
    log('info', 'hello');
    expect(sink.entries[0]?.source).toBe('demo');
  });

  it('is a no-op without sinks', () => {
    expect(() => new Logger().log('error', 'root', 'nobody listens')).not.toThrow();
  });
});

describe('level helpers', () => {
  it('LOG-U4: orders levels from error to debug', () => {
    expect(severity('error')).toBe(0);
    expect(severity('debug')).toBe(4);
    expect(isLogLevel('warning')).toBe(true);
    expect(isLogLevel('warn')).toBe(false);
  });
});
