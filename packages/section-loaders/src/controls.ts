/**
 * `controls` section loader.
 *
 * Every action becomes a verb of the API, named by the action uid and
 * guarded by its `loa`. The verb handler runs the action with the request
 * arguments as query and replies exactly once:
 *
 *   success  with the action result (undefined becomes null)
 *   failed   when the action throws
 *   invalid-reply  when the result is not JSON
 */

import type {
  ApiHandle,
  ControllerContext,
  JsonValue,
  RequestHandle,
  SectionLoader,
} from '@switchboard/kernel';
import { RegistrationError, contextOf, describeError, isJsonValue } from '@switchboard/kernel';
import type { ActionDefinition } from './actions/action.js';
import { parseActions } from './actions/action.js';
import { checkAction, executeAction } from './actions/executor.js';

export class ControlSection implements SectionLoader {
  readonly key = 'controls';

  async load(api: ApiHandle, payload: JsonValue, context: ControllerContext): Promise<ReadonlyArray<RegistrationError>> {
    const { actions, errors: parseErrors } = parseActions(this.key, payload);
    const errors: RegistrationError[] = [...parseErrors];

    for (const action of actions) {
      const invalid = checkAction(this.key, action, context);
      if (invalid !== undefined) {
        errors.push(invalid);
        continue;
      }
      try {
        api.addVerb({
          verb: action.uid,
          info: action.info,
          loa: action.loa,
          handler: (request) => runControl(action, request),
        });
      } catch (err: unknown) {
        errors.push(new RegistrationError(`${this.key}:${action.uid}`, describeError(err)));
      }
    }
    return errors;
  }
}

async function runControl(action: ActionDefinition, request: RequestHandle): Promise<void> {
  const context = contextOf(request.api);
  if (context === undefined) {
    request.fail('no-context', `No controller context for verb '${action.uid}'`);
    return;
  }

  let result: unknown;
  try {
    result = await executeAction(action, {
      api: request.api,
      context,
      query: request.args,
      loa: request.loa,
    });
  } catch (err: unknown) {
    request.fail('failed', describeError(err));
    return;
  }

  const data = result === undefined ? null : result;
  if (!isJsonValue(data)) {
    request.fail('invalid-reply', `Action '${action.uid}' returned a value that is not JSON`);
    return;
  }
  request.success(data);
}
