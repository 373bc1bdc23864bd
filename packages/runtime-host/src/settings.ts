/**
 * Switchboard Runtime Host: Runtime Settings Resolution
 *
 * Resolves the settings a hosted controller runs with. Each setting follows
 * the same precedence:
 *
 *   1. Explicit option (e.g. from a CLI flag)
 *   2. SWITCHBOARD_* environment variable
 *   3. Default
 *
 * Empty strings count as absent at every level. An unrecognized log level
 * falls back to the default rather than failing.
 */

import type { LogLevel } from '@switchboard/kernel';
import { isLogLevel } from '@switchboard/kernel';
import { DEFAULT_BINDER_NAME } from './host/local-binder.js';

/** Environment prefix for `<PREFIX>_CONFIG_PATH` and `<PREFIX>_PLUGIN_PATH`. */
export const DEFAULT_PREFIX = 'CONTROL';

/** Last directory of every configuration search path. */
export const DEFAULT_FALLBACK_CONFIG_PATH = '/etc/switchboard/config';

export const DEFAULT_LOG_LEVEL: LogLevel = 'notice';

export interface RuntimeSettingsOptions {
  readonly name?: string | undefined;
  readonly rootDir?: string | undefined;
  readonly bindingPath?: string | undefined;
  readonly prefix?: string | undefined;
  readonly logLevel?: string | undefined;
  readonly logFile?: string | undefined;
}

export interface RuntimeSettings {
  readonly name: string;
  readonly rootDir: string;
  readonly bindingPath: string | undefined;
  readonly prefix: string;
  readonly fallbackConfigPath: string;
  readonly logLevel: LogLevel;
  readonly logFile: string | undefined;
}

export function resolveRuntimeSettings(
  opts: RuntimeSettingsOptions = {},
  env: NodeJS.ProcessEnv = process.env,
): RuntimeSettings {
  const level = pick(opts.logLevel, env['SWITCHBOARD_LOG_LEVEL']);
  return {
    name: pick(opts.name, env['SWITCHBOARD_NAME']) ?? DEFAULT_BINDER_NAME,
    rootDir: pick(opts.rootDir, env['SWITCHBOARD_ROOT_DIR']) ?? process.cwd(),
    bindingPath: pick(opts.bindingPath, env['SWITCHBOARD_BINDING_PATH']),
    prefix: pick(opts.prefix) ?? DEFAULT_PREFIX,
    fallbackConfigPath: DEFAULT_FALLBACK_CONFIG_PATH,
    logLevel: level !== undefined && isLogLevel(level) ? level : DEFAULT_LOG_LEVEL,
    logFile: pick(opts.logFile, env['SWITCHBOARD_LOG_FILE']),
  };
}

/** First candidate that is a non-empty string. */
function pick(...candidates: ReadonlyArray<string | undefined>): string | undefined {
  return candidates.find((value) => value !== undefined && value !== '');
}
