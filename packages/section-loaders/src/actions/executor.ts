/**
 * Action execution.
 *
 * Plugin targets are looked up in the API's plugin registry at call time;
 * API targets go through the host with the configured args merged with the
 * query. checkAction() performs the plugin lookup ahead of time so that a
 * section can refuse an entry at load rather than fail on first use.
 */

import type { ActionSource, ApiHandle, ControllerContext, JsonValue } from '@switchboard/kernel';
import { RegistrationError, isJsonObject } from '@switchboard/kernel';
import type { ActionDefinition } from './action.js';

export interface ActionInvocation {
  readonly api: ApiHandle;
  readonly context: ControllerContext;
  /** Request args, event payload, or null. */
  readonly query: JsonValue;
  /** LOA of the calling session. */
  readonly loa: number;
}

/**
 * Verify that a plugin target can be resolved now. API targets are not
 * checked: the other API may not exist until every module has loaded.
 */
export function checkAction(
  section: string,
  action: ActionDefinition,
  context: ControllerContext,
): RegistrationError | undefined {
  const { target } = action;
  if (target.kind !== 'plugin') return undefined;
  if (!context.plugins.has(target.plugin)) {
    return new RegistrationError(`${section}:${action.uid}`, `unknown plugin '${target.plugin}'`);
  }
  if (context.plugins.resolveFunction(target.plugin, target.fn) === undefined) {
    return new RegistrationError(
      `${section}:${action.uid}`,
      `plugin '${target.plugin}' exports no function '${target.fn}'`,
    );
  }
  return undefined;
}

/**
 * Shallow-merge configured args and query when both are objects (query keys
 * win). Otherwise a non-null query replaces the args.
 */
export function mergeArgs(args: JsonValue, query: JsonValue): JsonValue {
  if (isJsonObject(args) && isJsonObject(query)) {
    return { ...args, ...query };
  }
  return query === null ? args : query;
}

/**
 * Run an action and resolve with whatever its target produced.
 *
 * @throws {Error} When the plugin function is missing, throws, or the API call fails
 */
export async function executeAction(action: ActionDefinition, invocation: ActionInvocation): Promise<unknown> {
  const { target } = action;
  switch (target.kind) {
    case 'none':
      return null;
    case 'api':
      return invocation.api.call(target.api, target.verb, mergeArgs(action.args, invocation.query));
    case 'plugin': {
      const fn = invocation.context.plugins.resolveFunction(target.plugin, target.fn);
      if (fn === undefined) {
        throw new Error(`No function '${target.fn}' in plugin '${target.plugin}'`);
      }
      const source: ActionSource = {
        uid: action.uid,
        api: invocation.api,
        context: invocation.context,
        loa: invocation.loa,
      };
      return await fn(source, action.args, invocation.query);
    }
  }
}
