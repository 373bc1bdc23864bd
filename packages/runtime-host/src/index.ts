/**
 * @switchboard/runtime-host
 *
 * Side-effectful half of Switchboard: environment access, configuration
 * discovery and loading on disk, the controller entry point, plugin import,
 * log sinks and an in-process host runtime.
 *
 * The kernel defines the interfaces; this package provides implementations.
 * No kernel code imports from this package.
 */

// Environment and settings
export { envVarName, readEnvDirList } from './env.js';
export type { RuntimeSettings, RuntimeSettingsOptions } from './settings.js';
export {
  DEFAULT_FALLBACK_CONFIG_PATH,
  DEFAULT_LOG_LEVEL,
  DEFAULT_PREFIX,
  resolveRuntimeSettings,
} from './settings.js';

// Configuration discovery
export type { LocateOptions, LocateResult } from './config/locate.js';
export { DEFAULT_CONFIG_EXTENSIONS, locateConfig, serviceIdentity } from './config/locate.js';
export { loadConfig } from './config/load.js';

// Entry point
export type { EntryOptions, EntryResult } from './entry.js';
export { bindingEntry, controllerSearchPath, loadController } from './entry.js';

// Plugins
export type { ModulePluginResolverOptions } from './plugins/module-resolver.js';
export { ModulePluginResolver, PLUGIN_EXTENSIONS, findModuleFile } from './plugins/module-resolver.js';

// Host runtime
export type { InitStatus, LocalBinderOptions, Reply } from './host/local-binder.js';
export {
  DEFAULT_BINDER_NAME,
  INTERNAL_LOA,
  LocalApi,
  LocalBinder,
  LocalRequest,
  LocalSession,
} from './host/local-binder.js';

// Logging
export { FileLogSink } from './logging/file-log-sink.js';
export { MemoryLogSink } from './logging/memory-log-sink.js';
export type { LogReadResult, LogReadStats } from './logging/log-reader.js';
export { readLog, readLogFile } from './logging/log-reader.js';
