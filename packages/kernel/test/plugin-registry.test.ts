/**
 * Switchboard Kernel — PluginRegistry Tests
 *
 *   PR-U1: registered plugins are listed in load order
 *   PR-U2: a duplicate uid is rejected
 *   PR-U3: resolveFunction() returns only exported functions
 */

import { describe, it, expect } from 'vitest';
import type { LoadedPlugin, PluginModule } from '../src/index.js';
import { PluginRegistry } from '../src/index.js';

function plugin(uid: string, module: PluginModule = {}): LoadedPlugin {
  return { spec: { uid, info: '', module: uid }, module };
}

describe('PluginRegistry', () => {
  it('PR-U1: lists plugins in load order', () => {
    const registry = new PluginRegistry();
    registry.register(plugin('beta'));
    registry.register(plugin('alpha'));
    expect(registry.list().map((p) => p.spec.uid)).toEqual(['beta', 'alpha']);
    expect(registry.has('alpha')).toBe(true);
    expect(registry.get('gamma')).toBeUndefined();
  });

  it('PR-U2: rejects a duplicate uid', () => {
    const registry = new PluginRegistry();
    registry.register(plugin('alpha'));
    expect(() => registry.register(plugin('alpha'))).toThrow('Plugin already registered: alpha');
    expect(registry.list()).toHaveLength(1);
  });

  it('PR-U3: resolves exported functions only', () => {
    const registry = new PluginRegistry();
    const greet = (): string => 'hi';
    registry.register(plugin('alpha', { greet, version: '1.0' }));

    expect(registry.resolveFunction('alpha', 'greet')).toBe(greet);
    expect(registry.resolveFunction('alpha', 'version')).toBeUndefined();
    expect(registry.resolveFunction('alpha', 'missing')).toBeUndefined();
    expect(registry.resolveFunction('beta', 'greet')).toBeUndefined();
  });
});
