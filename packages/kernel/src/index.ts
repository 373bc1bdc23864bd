/**
 * @switchboard/kernel
 *
 * Switchboard kernel: host contract, configuration document model, error
 * taxonomy, search-path composition, section dispatch, API assembly and
 * lifecycle, built-in verbs, plugin registry and logging interfaces.
 *
 * This package is side-effect free. It reads no files, no environment and
 * no clock other than for log timestamps. Concrete I/O (config discovery,
 * plugin import, log sinks, the in-process host) lives in
 * @switchboard/runtime-host.
 */

// Types
export type { JsonArray, JsonObject, JsonPrimitive, JsonValue } from './types/json.js';
export { deepFreeze, isJsonArray, isJsonObject, isJsonValue, isRecord } from './types/json.js';

export type {
  ApiHandle,
  EventHook,
  InitHook,
  LogLevel,
  NewApiOptions,
  PreInitHook,
  RequestHandle,
  RequestHandler,
  RootApi,
  VerbDefinition,
} from './types/host.js';

export type { ConfigDocument } from './types/config.js';
export { METADATA_KEYS } from './types/config.js';

export { ApiState, LEGAL_TRANSITIONS, canTransition } from './types/lifecycle.js';

export type {
  ActionSource,
  LoadedPlugin,
  PluginFunction,
  PluginModule,
  PluginResolver,
  PluginSpec,
} from './types/plugin.js';
export { isPluginFunction } from './types/plugin.js';

// Errors
export type { SwitchboardErrorCode } from './errors.js';
export {
  HostError,
  LifecycleError,
  NotFoundError,
  ParseError,
  PathError,
  RegistrationError,
  SchemaError,
  SwitchboardError,
  describeError,
} from './errors.js';

// Configuration document
export type { ConfigDocumentResult } from './config/document.js';
export { buildConfigDocument } from './config/document.js';

// Search path
export type { ApplicationRootResult, SearchPathResult, SearchPathSources } from './path/search-path.js';
export {
  MIN_BINDING_SEGMENT,
  composeSearchPath,
  deriveApplicationRoot,
  splitSearchPath,
} from './path/search-path.js';

// Logging (sink implementations live in runtime-host)
export type { LogEntry, LogSink } from './logging/log-sink.js';
export { LOG_LEVELS, Logger, isLogLevel, severity } from './logging/logger.js';

// Plugins
export { PluginRegistry } from './plugins/registry.js';

// Sections
export type { SectionLoader } from './sections/section-loader.js';
export type {
  DispatchReport,
  SectionDispatcherOptions,
  UnknownSectionPolicy,
} from './sections/dispatcher.js';
export { SectionDispatcher } from './sections/dispatcher.js';

// Assembly
export type { ControllerContextOptions, EventHandler } from './assembly/context.js';
export { ControllerContext, contextOf } from './assembly/context.js';
export type { StaticVerb } from './assembly/static-verbs.js';
export { STATIC_VERBS } from './assembly/static-verbs.js';
export type { AssemblyReport } from './assembly/assembler.js';
export { ApiAssembler, INIT_NOT_SEALED, INIT_NO_CONTEXT } from './assembly/assembler.js';
