/**
 * Switchboard Kernel: Plugin Types
 *
 * A plugin is an ES module whose exported functions are reachable from
 * configuration actions as `plugin://<uid>#<function>`. Resolution (finding
 * and importing the module) is performed by an injected PluginResolver; the
 * kernel only stores and looks up what was resolved.
 */

import type { ControllerContext } from '../assembly/context.js';
import type { ApiHandle } from './host.js';
import type { JsonValue } from './json.js';

/** What a plugin function learns about the action that invoked it. */
export interface ActionSource {
  /** uid of the configured action (verb name, event name or onload uid). */
  readonly uid: string;
  readonly api: ApiHandle;
  readonly context: ControllerContext;
  /** LOA of the calling session; 0 outside of verb calls. */
  readonly loa: number;
}

/**
 * A function exported by a plugin. `args` are the action's configured
 * arguments; `query` is the request arguments, the event payload, or null.
 * The resolved value becomes the verb reply data.
 */
export type PluginFunction = (source: ActionSource, args: JsonValue, query: JsonValue) => unknown;

/** The namespace object of a loaded plugin module. */
export type PluginModule = Readonly<Record<string, unknown>>;

/** One entry of the `plugins` section. */
export interface PluginSpec {
  readonly uid: string;
  readonly info: string;
  /** Module specifier or file name to resolve. */
  readonly module: string;
  /** Colon-delimited directories searched before the default plugin path. */
  readonly spath?: string | undefined;
}

export interface LoadedPlugin {
  readonly spec: PluginSpec;
  readonly module: PluginModule;
  /** Where the module was found, when it came from disk. */
  readonly location?: string | undefined;
}

export interface PluginResolver {
  /**
   * Locate and load the module for a plugin spec.
   *
   * @param searchPath - Directories to search when spec.spath is absent
   * @throws {Error} When the module cannot be found or fails to load
   */
  resolve(spec: PluginSpec, searchPath: ReadonlyArray<string>): Promise<LoadedPlugin>;
}

export function isPluginFunction(value: unknown): value is PluginFunction {
  return typeof value === 'function';
}
