/**
 * Runtime construction shared by every command: resolve settings, wire the
 * logger to its sinks, create the in-process binder and load the controller.
 */

import type { ConfigDocument, ControllerContext, LogSink } from '@switchboard/kernel';
import { HostError, Logger } from '@switchboard/kernel';
import type { EntryOptions, InitStatus, LocalApi, RuntimeSettings, RuntimeSettingsOptions } from '@switchboard/runtime-host';
import {
  FileLogSink,
  LocalBinder,
  MemoryLogSink,
  ModulePluginResolver,
  loadController,
  resolveRuntimeSettings,
} from '@switchboard/runtime-host';
import { CatalogPluginResolver } from '@switchboard/section-loaders';
import { ConsoleLogSink } from './output/console-log-sink.js';
import { BUILTIN_PLUGINS } from './plugins/builtin.js';

export interface Runtime {
  readonly settings: RuntimeSettings;
  readonly binder: LocalBinder;
  readonly memory: MemoryLogSink;
  readonly entryOptions: EntryOptions;
}

export interface BuildRuntimeDeps {
  readonly env?: NodeJS.ProcessEnv | undefined
  /** Console sink; null disables console logging. */
  readonly console?: LogSink | null | undefined;
}

export function buildRuntime(opts: RuntimeSettingsOptions = {}, deps: BuildRuntimeDeps = {}): Runtime {
  const env = deps.env ?? process.env;
  const settings = resolveRuntimeSettings(opts, env);

  const memory = new MemoryLogSink();
  const sinks: LogSink[] = [memory];
  const consoleSink = deps.console === undefined ? new ConsoleLogSink() : deps.console;
  if (consoleSink !== null) sinks.push(consoleSink);
  if (settings.logFile !== undefined) sinks.push(new FileLogSink(settings.logFile));

  const binder = new LocalBinder({
    name: settings.name,
    rootDir: settings.rootDir,
    settings: settings.bindingPath !== undefined ? { 'binding-path': settings.bindingPath } : {},
    logger: new Logger(sinks, settings.logLevel),
  });

  const entryOptions: EntryOptions = {
    prefix: settings.prefix,
    fallbackConfigPath: settings.fallbackConfigPath,
    pluginResolver: new ModulePluginResolver({ builtins: new CatalogPluginResolver(BUILTIN_PLUGINS) }),
    unknownSections: 'warn',
    env,
  };

  return { settings, binder, memory, entryOptions };
}

export type BootResult =
  | {
      readonly ok: true;
      readonly api: LocalApi;
      readonly config: ConfigDocument;
      readonly context: ControllerContext;
      readonly searchPath: string;
      readonly init: ReadonlyArray<InitStatus>;
    }
  | { readonly ok: false; readonly error: Error };

/** Load the controller into the runtime's binder and run init. */
export async function bootController(runtime: Runtime): Promise<BootResult> {
  const entry = await loadController(runtime.binder, runtime.entryOptions);
  if (!entry.ok) return { ok: false, error: entry.error };

  const api = runtime.binder.api(entry.config.apiName);
  if (api === undefined) {
    return { ok: false, error: new HostError(`API '${entry.config.apiName}' is not hosted by the binder`) };
  }
  const init = await runtime.binder.start();
  return { ok: true, api, config: entry.config, context: entry.context, searchPath: entry.searchPath, init };
}
