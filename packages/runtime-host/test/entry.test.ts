/**
 * Switchboard Runtime Host — Controller Entry Tests
 *
 * End to end against a LocalBinder and real files.
 *
 *   EN-U1: a config on CONTROL_CONFIG_PATH yields one sealed API with built-in and control verbs
 *   EN-U2: the assembled API initializes and answers its verbs
 *   EN-U3: the binding-path setting contributes the application root
 *   EN-U4: plugin search path is PLUGIN_PATH, then the config directory, then the root
 *   EN-U5: no config anywhere is a NotFoundError and no API is created
 *   EN-U6: a bad binding path stops before the locator
 *   EN-U7: parse and schema failures stop before API creation
 *   EN-U8: bindingEntry() maps the outcome to 0 / -1
 *   EN-U9: an unreadable search-path directory yields -1, never a rejection
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { mkdirSync, mkdtempSync, symlinkSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { JsonObject } from '@switchboard/kernel';
import { ApiState, Logger, NotFoundError, ParseError, PathError, SchemaError } from '@switchboard/kernel';
import type { EntryOptions } from '../src/entry.js';
import { bindingEntry, loadController } from '../src/entry.js';
import { LocalBinder } from '../src/host/local-binder.js';
import { MemoryLogSink } from '../src/logging/memory-log-sink.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

let root: string;

beforeEach(() => {
  root = mkdtempSync(join(tmpdir(), 'switchboard-entry-'));
});

function dir(name: string): string {
  const path = join(root, name);
  mkdirSync(path, { recursive: true });
  return path;
}

function setup(settings: JsonObject = {}): { binder: LocalBinder; sink: MemoryLogSink; runtime: string; fallback: string } {
  const sink = new MemoryLogSink();
  const runtime = join(root, 'runtime');
  const binder = new LocalBinder({ name: 'afb-demo', rootDir: runtime, settings, logger: new Logger([sink]) });
  return { binder, sink, runtime, fallback: join(root, 'fallback') };
}

function rootMessages(sink: MemoryLogSink, level: 'notice' | 'error'): ReadonlyArray<string> {
  return sink.entries.filter((e) => e.source === 'root' && e.level === level).map((e) => e.message);
}

const DEMO = JSON.stringify({ api: 'demo', info: 'x', controls: { ping: {} } });

// ---------------------------------------------------------------------------
// Successful assembly
// ---------------------------------------------------------------------------

describe('loadController: success', () => {
  it('EN-U1: assembles the API named by the document', async () => {
    const cfg = dir('cfg');
    writeFileSync(join(cfg, 'demo.json'), DEMO);
    const { binder, sink, runtime, fallback } = setup();
    const options: EntryOptions = { env: { CONTROL_CONFIG_PATH: cfg }, fallbackConfigPath: fallback };

    const result = await loadController(binder, options);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.searchPath).toBe(`${cfg}::${runtime}:${fallback}`);
    expect(result.config.source).toBe(join(cfg, 'demo.json'));
    expect(result.api.name).toBe('demo');
    expect(result.context.state).toBe(ApiState.Sealed);
    expect(binder.apiNames()).toEqual(['demo']);

    const api = binder.api('demo');
    expect(api?.sealed).toBe(true);
    expect(api?.verbNames()).toEqual(['ping-global', 'auth', 'ping']);
    expect(rootMessages(sink, 'notice')).toEqual(['Controller in bindingEntry', "Controller API='demo' info='x'"]);
    expect(rootMessages(sink, 'error')).toEqual([]);
  });

  it('EN-U2: initializes and serves the verbs', async () => {
    const cfg = dir('cfg');
    writeFileSync(join(cfg, 'demo.json'), DEMO);
    const { binder, fallback } = setup();

    const result = await loadController(binder, { env: { CONTROL_CONFIG_PATH: cfg }, fallbackConfigPath: fallback });
    const statuses = await binder.start();

    expect(statuses).toEqual([{ api: 'demo', status: 0 }]);
    expect(result.ok && result.context.state).toBe(ApiState.Initialized);
    expect(await binder.call('demo', 'ping-global')).toMatchObject({ ok: true, data: 1 });
    expect(await binder.call('demo', 'ping-global')).toMatchObject({ ok: true, data: 2 });
    expect(await binder.call('demo', 'ping', { any: 'thing' })).toMatchObject({ ok: true, data: null });
  });

  it('EN-U3: finds the config under the application root', async () => {
    const app = dir('app');
    writeFileSync(join(app, 'demo-config.json'), DEMO);
    const { binder, runtime, fallback } = setup({ 'binding-path': join(app, 'lib', 'controller.so') });

    const result = await loadController(binder, { env: {}, fallbackConfigPath: fallback });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.searchPath).toBe(`${runtime}:${app}:${fallback}`);
    expect(result.config.source).toBe(join(app, 'demo-config.json'));
  });

  it('EN-U4: builds the plugin search path', async () => {
    const cfg = dir('cfg');
    writeFileSync(join(cfg, 'demo.json'), DEMO);
    const { binder, runtime, fallback } = setup();

    const result = await loadController(binder, {
      env: { CONTROL_CONFIG_PATH: cfg, CONTROL_PLUGIN_PATH: '/opt/p1:/opt/p2' },
      fallbackConfigPath: fallback,
    });

    expect(result.ok && result.context.pluginSearchPath).toEqual(['/opt/p1', '/opt/p2', cfg, runtime]);
  });
});

// ---------------------------------------------------------------------------
// Failures
// ---------------------------------------------------------------------------

describe('loadController: failures', () => {
  it('EN-U5: reports a missing config without creating an API', async () => {
    const { binder, sink, runtime, fallback } = setup();
    const a = dir('a');
    const b = dir('b');

    const result = await loadController(binder, {
      env: { CONTROL_CONFIG_PATH: `${a}:${b}` },
      fallbackConfigPath: fallback,
    });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(NotFoundError);
    expect(result.searchPath).toBe(`${a}:${b}::${runtime}:${fallback}`);
    expect(binder.apiNames()).toEqual([]);
    expect(rootMessages(sink, 'error')).toEqual([`No demo* config found in ${a}:${b}::${runtime}:${fallback}`]);
  });

  it('EN-U6: rejects a binding path with a short final segment', async () => {
    const { binder, sink } = setup({ 'binding-path': '/opt/x' });

    const result = await loadController(binder, { env: {} });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(PathError);
    expect(result.searchPath).toBeUndefined();
    expect(rootMessages(sink, 'error')).toEqual([
      'Invalid binding path "/opt/x": final segment "x" is shorter than 3 characters',
    ]);
  });

  it('EN-U7: distinguishes unreadable JSON from missing metadata', async () => {
    const bad = dir('bad');
    writeFileSync(join(bad, 'demo.json'), '{ not json');
    const noApi = dir('no-api');
    writeFileSync(join(noApi, 'demo.json'), JSON.stringify({ info: 'x' }));

    const first = await loadController(setup().binder, { env: { CONTROL_CONFIG_PATH: bad } });
    const second = await loadController(setup().binder, { env: { CONTROL_CONFIG_PATH: noApi } });

    expect(!first.ok && first.error).toBeInstanceOf(ParseError);
    expect(!second.ok && second.error).toBeInstanceOf(SchemaError);
    expect(!second.ok && second.error.message).toBe(`API Missing from metadata in: ${join(noApi, 'demo.json')}`);
  });

  it('EN-U8: bindingEntry returns 0 on success and -1 on failure', async () => {
    const cfg = dir('cfg');
    writeFileSync(join(cfg, 'demo.json'), DEMO);
    const empty = dir('empty');
    const fallback = join(root, 'fallback');

    expect(await bindingEntry(setup().binder, { env: { CONTROL_CONFIG_PATH: cfg }, fallbackConfigPath: fallback })).toBe(0);
    expect(await bindingEntry(setup().binder, { env: { CONTROL_CONFIG_PATH: empty }, fallbackConfigPath: fallback })).toBe(-1);
  });

  it('EN-U9: resolves to -1 when the only override directory is a symlink loop', async () => {
    const loop = join(root, 'loop');
    symlinkSync(loop, loop);
    const { binder, sink } = setup();
    const fallback = join(root, 'fallback');

    const status = await bindingEntry(binder, { env: { CONTROL_CONFIG_PATH: loop }, fallbackConfigPath: fallback });

    expect(status).toBe(-1);
    expect(binder.apiNames()).toEqual([]);
    expect(rootMessages(sink, 'error')).toEqual([
      `No demo* config found in ${loop}::${join(root, 'runtime')}:${fallback}`,
    ]);
  });
});
