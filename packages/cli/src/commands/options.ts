/**
 * Options shared by every command, and JSON argument parsing.
 */

import type { Command } from 'commander';
import type { JsonValue } from '@switchboard/kernel';
import { isJsonValue } from '@switchboard/kernel'

/** Commander's camel-cased view of the runtime flags. */
export interface RuntimeFlags {
  name?: string;
  rootDir?: string;
  bindingPath?: string;
  prefix?: string;
  logLevel?: string;
  logFile?: string;
}

export function withRuntimeOptions(command: Command): Command {
  return command
    .option('--name <name>', 'Binder name; the config file stem is the part after the first "-" (env SWITCHBOARD_NAME)')
    .option('--root-dir <dir>', 'Runtime root directory (env SWITCHBOARD_ROOT_DIR, default: cwd)')
    .option('--binding-path <path>', 'Install path of the binding (env SWITCHBOARD_BINDING_PATH)')
    .option('--prefix <prefix>', 'Environment prefix for <PREFIX>_CONFIG_PATH and <PREFIX>_PLUGIN_PATH (default: CONTROL)')
    .option('--log-level <level>', 'error | warning | notice | info | debug (env SWITCHBOARD_LOG_LEVEL)')
    .option('--log-file <file>', 'Append log entries as JSON lines (env SWITCHBOARD_LOG_FILE)');
}

export type JsonArgument =
  | { readonly ok: true; readonly value: JsonValue }
  | { readonly ok: false; readonly message: string };

/** Parse a JSON command-line argument. An absent argument is null. */
export function parseJsonArgument(raw: string | undefined, label: string): JsonArgument {
  if (raw === undefined) return { ok: true, value: null };
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch (err: unknown) {
    return { ok: false, message: `Invalid JSON for ${label}: ${err instanceof Error ? err.message : String(err)}` };
  }
  if (!isJsonValue(value)) {
    return { ok: false, message: `Invalid JSON for ${label}` };
  }
  return { ok: true, value };
}
