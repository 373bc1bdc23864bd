/**
 * Switchboard Kernel: Configuration Search Path
 *
 * Builds the colon-delimited directory list searched for the controller
 * configuration file. Four sources, in precedence order:
 *
 *   with an override:    override : application root : runtime root : fallback
 *   without an override: runtime root : application root : fallback
 *
 * The application root is the parent of the directory holding the binding
 * (the host's `binding-path` setting walked up one level).
 *
 * Entries are neither deduplicated nor checked for existence. A directory
 * may be listed twice on purpose, and the locator skips missing ones.
 */

import { posix } from 'node:path';
import { PathError } from '../errors.js';

/** Shortest accepted final segment of a binding path. */
export const MIN_BINDING_SEGMENT = 3;

export interface SearchPathSources {
  /** Colon-delimited override list, typically from `<PREFIX>_CONFIG_PATH`. */
  readonly override?: string | undefined;
  /** Host-reported install path of the binding itself. */
  readonly bindingPath?: string | undefined;
  /** Host-reported runtime root directory. */
  readonly runtimeRoot: string;
  /** Built-in fallback directory. */
  readonly fallback: string;
}

export type ApplicationRootResult =
  | { readonly ok: true; readonly root: string }
  | { readonly ok: false; readonly error: PathError };

export type SearchPathResult =
  | { readonly ok: true; readonly searchPath: string; readonly applicationRoot: string }
  | { readonly ok: false; readonly error: PathError };

/**
 * Derive the application root from a binding install path.
 *
 * Fails when the path has no `/` or when the segment after the last `/`
 * is shorter than MIN_BINDING_SEGMENT characters.
 */
export function deriveApplicationRoot(bindingPath: string): ApplicationRootResult {
  const idx = bindingPath.lastIndexOf('/');
  if (idx < 0) {
    return { ok: false, error: new PathError(bindingPath, 'no directory separator') };
  }
  const tail = bindingPath.slice(idx + 1);
  if (tail.length < MIN_BINDING_SEGMENT) {
    return {
      ok: false,
      error: new PathError(
        bindingPath,
        `final segment "${tail}" is shorter than ${MIN_BINDING_SEGMENT} characters`,
      ),
    };
  }
  const bindingDir = bindingPath.slice(0, idx) || '/';
  return { ok: true, root: posix.dirname(bindingDir) };
}

/**
 * Compose the search path string.
 *
 * An absent binding path yields an empty application-root entry, which is
 * kept in place so the positions of the other sources do not shift.
 */
export function composeSearchPath(sources: SearchPathSources): SearchPathResult {
  let applicationRoot = '';
  if (sources.bindingPath !== undefined) {
    const derived = deriveApplicationRoot(sources.bindingPath);
    if (!derived.ok) return derived;
    applicationRoot = derived.root;
  }

  const override = sources.override ?? '';
  const entries = override !== ''
    ? [override, applicationRoot, sources.runtimeRoot, sources.fallback]
    : [sources.runtimeRoot, applicationRoot, sources.fallback];

  return { ok: true, searchPath: entries.join(':'), applicationRoot };
}

/** Split a search path into directories, dropping empty entries. Order and duplicates are kept. */
export function splitSearchPath(searchPath: string): ReadonlyArray<string> {
  return searchPath.split(':').filter((dir) => dir !== '');
}
