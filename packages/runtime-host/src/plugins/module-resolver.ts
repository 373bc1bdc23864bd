/**
 * Switchboard Runtime Host: Module Plugin Resolver
 *
 * Resolves a plugin spec to an ES module on disk and loads it with dynamic
 * import(). The module name is tried as given and with each known extension,
 * in every directory of the spec's `spath` (when set) or else the plugin
 * search path handed in by the section loader. First match wins.
 *
 * An absolute module path is imported directly. Names registered in the
 * optional built-in catalog are resolved from it before the file system is
 * consulted.
 */

import { statSync } from 'node:fs';
import { isAbsolute, resolve } from 'node:path';
import { pathToFileURL } from 'node:url';
import type { LoadedPlugin, PluginResolver, PluginSpec } from '@switchboard/kernel';
import { describeError, isRecord, splitSearchPath } from '@switchboard/kernel';
import type { CatalogPluginResolver } from '@switchboard/section-loaders';
import { UNREADABLE_DIR_CODES, isNodeError } from '../fs-errors.js';

export const PLUGIN_EXTENSIONS: ReadonlyArray<string> = ['', '.js', '.mjs', '.cjs'];

export interface ModulePluginResolverOptions {
  /** In-process modules, consulted before the file system. */
  readonly builtins?: CatalogPluginResolver | undefined;
}

export class ModulePluginResolver implements PluginResolver {
  private readonly builtins: CatalogPluginResolver | undefined;

  constructor(options: ModulePluginResolverOptions = {}) {
    this.builtins = options.builtins;
  }

  async resolve(spec: PluginSpec, searchPath: ReadonlyArray<string>): Promise<LoadedPlugin> {
    if (this.builtins !== undefined && this.builtins.names().includes(spec.module)) {
      return this.builtins.resolve(spec);
    }

    const dirs = spec.spath !== undefined ? splitSearchPath(spec.spath) : searchPath;
    const file = findModuleFile(spec.module, dirs);
    if (file === undefined) {
      throw new Error(`Plugin module '${spec.module}' not found in ${dirs.join(':') || '(empty search path)'}`);
    }

    let loaded: unknown;
    try {
      loaded = await import(pathToFileURL(file).href);
    } catch (err: unknown) {
      throw new Error(`Plugin module '${file}' failed to load: ${describeError(err)}`);
    }
    if (!isRecord(loaded)) {
      throw new Error(`Plugin module '${file}' did not evaluate to a module namespace`);
    }
    return { spec, module: loaded, location: file };
  }
}

/** First existing regular file for a module name, or undefined. */
export function findModuleFile(moduleName: string, dirs: ReadonlyArray<string>): string | undefined {
  const bases = isAbsolute(moduleName) ? [moduleName] : dirs.map((dir) => resolve(dir, moduleName));
  for (const base of bases) {
    for (const ext of PLUGIN_EXTENSIONS) {
      const candidate = base + ext;
      if (isRegularFile(candidate)) return candidate;
    }
  }
  return undefined;
}

function isRegularFile(path: string): boolean {
  try {
    return statSync(path).isFile();
  } catch (err: unknown) {
    if (isNodeError(err, ...UNREADABLE_DIR_CODES)) return false;
    throw err;
  }
}
