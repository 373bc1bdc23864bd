/**
 * `plugins` section loader.
 *
 *   "plugins": [ { "uid": "demo", "info": "...", "module": "demo-plugin.js", "spath": "/opt/plugins" } ]
 *
 * Each entry is resolved by the context's PluginResolver and registered in
 * the context's plugin registry under its uid. `module` defaults to the uid.
 */

import type {
  ApiHandle,
  ControllerContext,
  JsonValue,
  PluginSpec,
  SectionLoader,
} from '@switchboard/kernel';
import { RegistrationError, describeError } from '@switchboard/kernel';
import type { SectionEntry } from './actions/entries.js';
import { sectionEntries } from './actions/entries.js';

export type PluginSpecResult =
  | { readonly ok: true; readonly spec: PluginSpec }
  | { readonly ok: false; readonly error: RegistrationError };

export function parsePluginSpec(entry: SectionEntry): PluginSpecResult {
  const step = `plugins:${entry.uid}`;
  const { body } = entry;
  const info = body['info'] ?? '';
  const module = body['module'] ?? entry.uid;
  const spath = body['spath'];
  if (typeof info !== 'string' || typeof module !== 'string' || module === '') {
    return { ok: false, error: new RegistrationError(step, "'info' and 'module' must be strings") };
  }
  if (spath !== undefined && typeof spath !== 'string') {
    return { ok: false, error: new RegistrationError(step, "'spath' must be a string") };
  }
  return { ok: true, spec: { uid: entry.uid, info, module, spath } };
}

export class PluginSection implements SectionLoader {
  readonly key = 'plugins';

  async load(api: ApiHandle, payload: JsonValue, context: ControllerContext): Promise<ReadonlyArray<RegistrationError>> {
    const { entries, errors: entryErrors } = sectionEntries(this.key, payload);
    const errors: RegistrationError[] = [...entryErrors];

    for (const entry of entries) {
      const parsed = parsePluginSpec(entry);
      if (!parsed.ok) {
        errors.push(parsed.error);
        continue;
      }
      const { spec } = parsed;
      const resolver = context.pluginResolver;
      if (resolver === undefined) {
        errors.push(new RegistrationError(`plugins:${spec.uid}`, 'no plugin resolver configured'));
        continue;
      }
      try {
        const plugin = await resolver.resolve(spec, context.pluginSearchPath);
        context.plugins.register(plugin);
        api.log('info', `Plugin '${spec.uid}' loaded${plugin.location !== undefined ? ` from ${plugin.location}` : ''}`);
      } catch (err: unknown) {
        errors.push(new RegistrationError(`plugins:${spec.uid}`, describeError(err)));
      }
    }
    return errors;
  }
}
