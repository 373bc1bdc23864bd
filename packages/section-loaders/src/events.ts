/**
 * `events` section loader.
 *
 * Routes each event name (the action uid) to its action. The assembler's
 * event hook looks the route up in the ControllerContext and calls it with
 * the event payload; this module owns what happens next.
 */

import type { ApiHandle, ControllerContext, JsonValue, SectionLoader } from '@switchboard/kernel';
import { RegistrationError, contextOf, describeError } from '@switchboard/kernel';
import type { ActionDefinition } from './actions/action.js';
import { formatActionTarget, parseActions } from './actions/action.js';
import { checkAction, executeAction } from './actions/executor.js';

export class EventSection implements SectionLoader {
  readonly key = 'events';

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
        context.addEventHandler(action.uid, (target, event, eventPayload) =>
          runEventAction(action, target, event, eventPayload),
        );
        api.log('debug', `Event '${action.uid}' routed to ${formatActionTarget(action.target)}`);
      } catch (err: unknown) {
        errors.push(new RegistrationError(`${this.key}:${action.uid}`, describeError(err)));
      }
    }
    return errors;
  }
}

async function runEventAction(
  action: ActionDefinition,
  api: ApiHandle,
  event: string,
  payload: JsonValue,
): Promise<void> {
  const context = contextOf(api);
  if (context === undefined) {
    throw new Error(`No controller context for event '${event}'`);
  }
  await executeAction(action, { api, context, query: payload, loa: 0 });
}
