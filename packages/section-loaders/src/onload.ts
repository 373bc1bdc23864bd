/**
 * `onload` section loader.
 *
 * Pre-init only validates the actions, since the plugins they call may not
 * be initialized and other APIs may not exist yet. The init phase parses
 * the section again and runs the valid actions in order. Entries rejected at
 * pre-init were already counted there and are skipped here.
 */

import type { ApiHandle, ControllerContext, JsonValue, SectionLoader } from '@switchboard/kernel';
import { RegistrationError, describeError } from '@switchboard/kernel';
import { parseActions } from './actions/action.js';
import { checkAction, executeAction } from './actions/executor.js';

export class OnloadSection implements SectionLoader {
  readonly key = 'onload';

  async load(_api: ApiHandle, payload: JsonValue, context: ControllerContext): Promise<ReadonlyArray<RegistrationError>> {
    const { actions, errors: parseErrors } = parseActions(this.key, payload);
    const errors: RegistrationError[] = [...parseErrors];
    for (const action of actions) {
      const invalid = checkAction(this.key, action, context);
      if (invalid !== undefined) errors.push(invalid);
    }
    return errors;
  }

  async init(api: ApiHandle, payload: JsonValue, context: ControllerContext): Promise<ReadonlyArray<RegistrationError>> {
    const { actions } = parseActions(this.key, payload);
    const errors: RegistrationError[] = [];

    for (const action of actions) {
      if (checkAction(this.key, action, context) !== undefined) continue;
      try {
        await executeAction(action, { api, context, query: null, loa: 0 });
        api.log('debug', `Onload action '${action.uid}' done`);
      } catch (err: unknown) {
        errors.push(new RegistrationError(`${this.key}:${action.uid}`, describeError(err)));
      }
    }
    return errors;
  }
}
