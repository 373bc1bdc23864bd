/**
 * Plugins compiled into the CLI, reachable as `plugin://builtin#<fn>` once a
 * configuration declares `{ "uid": "builtin" }` in its plugins section.
 *
 *   echo  returns `{ args, query }`
 *   fail  always throws
 *   log   writes its args to the API log at notice level and returns null
 */

import type { PluginFunction, PluginModule } from '@switchboard/kernel';

export const echo: PluginFunction = (_source, args, query) => ({ args, query });

export const fail: PluginFunction = (source, args) => {
  const detail = typeof args === 'string' ? args : 'requested failure';
  throw new Error(`${source.uid}: ${detail}`);
};

export const log: PluginFunction = (source, args) => {
  source.api.log('notice', typeof args === 'string' ? args : JSON.stringify(args));
  return null;
};

export const BUILTIN_PLUGINS: Readonly<Record<string, PluginModule>> = {
  builtin: { echo, fail, log },
};
