/**
 * CLI launcher wiring
 *
 *   LCH-U1: the root `cli` script runs the bin entry from source through tsx, and no bin points at build output
 *   LCH-U2: the program registers every command
 */

import { describe, it, expect } from 'vitest';
import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { isRecord } from '@switchboard/kernel';
import { program } from '../src/commands/index.js';

const repoRoot = fileURLToPath(new URL('../../../', import.meta.url));

function readPackage(path: string): Readonly<Record<string, unknown>> {
  const parsed: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  if (!isRecord(parsed)) throw new Error(`${path} is not an object`);
  return parsed;
}

describe('launcher', () => {
  it('LCH-U1: runs the CLI from its TypeScript entry', () => {
    const pkg = readPackage(join(repoRoot, 'package.json'));
    const scripts = pkg['scripts'];

    expect(isRecord(scripts) && scripts['cli']).toBe('tsx packages/cli/src/bin/switchboard.ts');
    expect(existsSync(join(repoRoot, 'packages', 'cli', 'src', 'bin', 'switchboard.ts'))).toBe(true);
    expect(pkg['bin']).toBeUndefined();
  });

  it('LCH-U2: exposes the five commands', () => {
    expect(program.commands.map((command) => command.name())).toEqual(['locate', 'inspect', 'call', 'emit', 'log']);
  });
});
