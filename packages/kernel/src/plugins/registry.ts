/**
 * Switchboard Kernel: Plugin Registry
 *
 * Per-API record of the plugins loaded by the `plugins` section. Later
 * sections (controls, events, onload) resolve `plugin://<uid>#<function>`
 * references against it, which is why plugins load first.
 *
 * Registry invariants:
 * - uids are unique within one API
 * - entries are only added, never replaced or removed
 */

import type { LoadedPlugin, PluginFunction } from '../types/plugin.js';
import { isPluginFunction } from '../types/plugin.js';

export class PluginRegistry {
  private readonly entries: Map<string, LoadedPlugin> = new Map();

  /**
   * @throws {Error} If a plugin with the same uid is already registered
   */
  register(plugin: LoadedPlugin): void {
    const uid = plugin.spec.uid;
    if (this.entries.has(uid)) {
      throw new Error(`Plugin already registered: ${uid}`);
    }
    this.entries.set(uid, plugin);
  }

  get(uid: string): LoadedPlugin | undefined {
    return this.entries.get(uid);
  }

  has(uid: string): boolean {
    return this.entries.has(uid);
  }

  /** Registered plugins in load order. */
  list(): ReadonlyArray<LoadedPlugin> {
    return Array.from(this.entries.values());
  }

  /**
   * Look up an exported function of a registered plugin.
   *
   * @returns undefined when the plugin is unknown or the export is not a function
   */
  resolveFunction(uid: string, name: string): PluginFunction | undefined {
    const exported = this.entries.get(uid)?.module[name];
    return isPluginFunction(exported) ? exported : undefined;
  }
}
