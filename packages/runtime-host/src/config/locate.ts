/**
 * Switchboard Runtime Host: Configuration Locator
 *
 * Scans the search path, directory by directory and each directory's entries
 * in name order, for the first regular file whose name starts with the
 * service identity and ends with a recognized extension.
 *
 * Directories that do not exist, are not directories, or cannot be read
 * (permissions, symlink loops) are skipped; the composer never checks
 * existence, this is where it happens. Other I/O errors are rethrown.
 */

import { readdirSync, statSync } from 'node:fs';
import { resolve } from 'node:path';
import { NotFoundError, splitSearchPath } from '@switchboard/kernel';
import { UNREADABLE_DIR_CODES, isNodeError } from '../fs-errors.js';

export const DEFAULT_CONFIG_EXTENSIONS: ReadonlyArray<string> = ['.json'];

export interface LocateOptions {
  readonly extensions?: ReadonlyArray<string> | undefined;
}

export type LocateResult =
  | { readonly ok: true; readonly path: string }
  | { readonly ok: false; readonly error: NotFoundError };

/**
 * Derive the configuration filename stem from the binder name: the part after
 * the first `-` (`afb-demo` → `demo`), or the whole name when it has none.
 */
export function serviceIdentity(binderName: string): string {
  const idx = binderName.indexOf('-');
  return idx < 0 ? binderName : binderName.slice(idx + 1);
}

/**
 * @param searchPath - Colon-delimited directory list, earlier entries first
 * @param identity - Filename prefix; empty matches every file
 */
export function locateConfig(searchPath: string, identity: string, options: LocateOptions = {}): LocateResult {
  const extensions = options.extensions ?? DEFAULT_CONFIG_EXTENSIONS;

  for (const dir of splitSearchPath(searchPath)) {
    let names: string[];
    try {
      names = readdirSync(dir).sort();
    } catch (err: unknown) {
      if (isNodeError(err, ...UNREADABLE_DIR_CODES)) continue;
      throw err;
    }

    for (const name of names) {
      if (!name.startsWith(identity)) continue;
      if (!extensions.some((ext) => name.endsWith(ext))) continue;
      const candidate = resolve(dir, name);
      if (isRegularFile(candidate)) {
        return { ok: true, path: candidate };
      }
    }
  }

  return { ok: false, error: new NotFoundError(identity, searchPath) };
}

function isRegularFile(path: string): boolean {
  try {
    return statSync(path).isFile();
  } catch (err: unknown) {
    if (isNodeError(err, ...UNREADABLE_DIR_CODES)) return false;
    throw err;
  }
}
