/**
 * Switchboard Runtime Host: Controller Entry Point
 *
 * The module-load entry. Given the root API it:
 *
 *   1. composes the configuration search path
 *        (<PREFIX>_CONFIG_PATH, binding-path setting, runtime root, fallback)
 *   2. locates the configuration file named after the binder process
 *   3. loads and validates the document
 *   4. creates one API named by the document, with the assembler as pre-init
 *
 * Steps 1-3 stop at the first failure, which is logged once at error level;
 * no API is created in that case. An unexpected I/O error while scanning is
 * reported the same way, as a HostError with status `io-error`. Pre-init failures are the assembler's to
 * report and do not make the entry fail unless the host discards the API.
 */

import { dirname } from 'node:path';
import type {
  ApiHandle,
  ConfigDocument,
  PluginResolver,
  RootApi,
  SearchPathResult,
  SectionLoader,
  SwitchboardError,
  UnknownSectionPolicy,
} from '@switchboard/kernel';
import {
  ApiAssembler,
  ControllerContext,
  HostError,
  SectionDispatcher,
  composeSearchPath,
  describeError,
  splitSearchPath,
} from '@switchboard/kernel';
import { defaultSectionTable } from '@switchboard/section-loaders';
import { loadConfig } from './config/load.js';
import type { LocateResult } from './config/locate.js';
import { locateConfig, serviceIdentity } from './config/locate.js';
import { readEnvDirList } from './env.js';
import { DEFAULT_FALLBACK_CONFIG_PATH, DEFAULT_PREFIX } from './settings.js';

export interface EntryOptions {
  /** Section table; defaults to the four standard loaders. */
  readonly sections?: ReadonlyArray<SectionLoader> | undefined;
  readonly prefix?: string | undefined;
  readonly fallbackConfigPath?: string | undefined;
  /** Accepted configuration file extensions. */
  readonly extensions?: ReadonlyArray<string> | undefined;
  readonly pluginResolver?: PluginResolver | undefined;
  readonly unknownSections?: UnknownSectionPolicy | undefined;
  readonly env?: NodeJS.ProcessEnv | undefined;
}

export type EntryResult =
  | {
      readonly ok: true;
      readonly api: ApiHandle;
      readonly config: ConfigDocument;
      readonly context: ControllerContext;
      readonly searchPath: string;
    }
  | { readonly ok: false; readonly error: SwitchboardError; readonly searchPath?: string | undefined };

/** Compose the configuration search path from the environment and the root API's settings. */
export function controllerSearchPath(root: RootApi, options: EntryOptions = {}): SearchPathResult {
  const bindingPath = root.settings()['binding-path'];
  return composeSearchPath({
    override: readEnvDirList(options.prefix ?? DEFAULT_PREFIX, 'CONFIG_PATH', options.env ?? process.env),
    bindingPath: typeof bindingPath === 'string' ? bindingPath : undefined,
    runtimeRoot: root.rootDir(),
    fallback: options.fallbackConfigPath ?? DEFAULT_FALLBACK_CONFIG_PATH,
  });
}

export async function loadController(root: RootApi, options: EntryOptions = {}): Promise<EntryResult> {
  root.log('notice', 'Controller in bindingEntry');

  const prefix = options.prefix ?? DEFAULT_PREFIX;
  const env = options.env ?? process.env;

  const composed = controllerSearchPath(root, options);
  if (!composed.ok) {
    root.log('error', composed.error.message);
    return composed;
  }
  const { searchPath } = composed;

  let located: LocateResult;
  try {
    located = locateConfig(searchPath, serviceIdentity(root.binderName()), {
      extensions: options.extensions,
    });
  } catch (err: unknown) {
    const error = new HostError(`Config lookup failed in ${searchPath}: ${describeError(err)}`, 'io-error');
    root.log('error', error.message);
    return { ok: false, error, searchPath };
  }
  if (!located.ok) {
    root.log('error', located.error.message);
    return { ok: false, error: located.error, searchPath };
  }

  const loaded = loadConfig(located.path);
  if (!loaded.ok) {
    root.log('error', loaded.error.message);
    return { ok: false, error: loaded.error, searchPath };
  }
  const config = loaded.document;

  root.log('notice', `Controller API='${config.apiName}' info='${config.info}'`);

  const pluginSearchPath = [
    ...splitSearchPath(readEnvDirList(prefix, 'PLUGIN_PATH', env) ?? ''),
    dirname(config.source),
    root.rootDir(),
  ];
  const context = new ControllerContext(config, {
    pluginResolver: options.pluginResolver,
    pluginSearchPath,
  });
  const dispatcher = new SectionDispatcher(options.sections ?? defaultSectionTable(), {
    unknownSections: options.unknownSections,
  });
  const assembler = new ApiAssembler(dispatcher);

  const api = await root.newApi({
    name: config.apiName,
    info: config.info,
    noConcurrency: true,
    preInit: assembler.preInit,
    context,
  });
  if (api === null) {
    const error = new HostError('API creation failed');
    root.log('error', error.message);
    return { ok: false, error, searchPath };
  }

  return { ok: true, api, config, context, searchPath };
}

/** Host-facing entry: 0 when the API was created, -1 otherwise. */
export async function bindingEntry(root: RootApi, options: EntryOptions = {}): Promise<number> {
  const result = await loadController(root, options);
  return result.ok ? 0 : -1;
}
