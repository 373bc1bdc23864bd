/**
 * In-process plugin catalog.
 *
 * Resolves plugin specs against a fixed map of module name → module object
 * instead of the file system. Used for plugins compiled into the CLI and
 * for tests.
 */

import type { LoadedPlugin, PluginModule, PluginResolver, PluginSpec } from '@switchboard/kernel';

export class CatalogPluginResolver implements PluginResolver {
  private readonly catalog: ReadonlyMap<string, PluginModule>;

  constructor(catalog: Readonly<Record<string, PluginModule>>) {
    this.catalog = new Map(Object.entries(catalog));
  }

  /** Module names available in the catalog. */
  names(): ReadonlyArray<string> {
    return Array.from(this.catalog.keys());
  }

  async resolve(spec: PluginSpec): Promise<LoadedPlugin> {
    const module = this.catalog.get(spec.module);
    if (module === undefined) {
      throw new Error(`Plugin module '${spec.module}' is not in the catalog`);
    }
    return { spec, module };
  }
}
