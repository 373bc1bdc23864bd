/**
 * Switchboard Kernel: API Assembler
 *
 * Drives one API through its lifecycle:
 *
 *   preInit (host calls at creation)
 *     1. attach the ControllerContext as the API's user data
 *     2. Created → Assembling
 *     3. register the built-in verbs
 *     4. run the section dispatcher
 *     5. register the event hook and the init hook
 *     6. seal the API, then Assembling → Sealed
 *
 *   init (host calls once every module finished pre-init)
 *     re-resolve the context from the API, run each loader's init phase,
 *     Sealed → Initialized
 *
 * Registration failures are collected, never thrown; the API is sealed even
 * when some steps failed and the host receives the failure count. Hooks look
 * up the context through the API's user data on every call.
 */

import { RegistrationError, describeError } from '../errors.js';
import type { DispatchReport, SectionDispatcher } from '../sections/dispatcher.js';
import type { ApiHandle, RequestHandle } from '../types/host.js';
import type { JsonValue } from '../types/json.js';
import { ApiState } from '../types/lifecycle.js';
import type { ControllerContext } from './context.js';
import { contextOf } from './context.js';
import type { StaticVerb } from './static-verbs.js';
import { STATIC_VERBS } from './static-verbs.js';

/** Init status when the API carries no ControllerContext. */
export const INIT_NO_CONTEXT = -2;

/** Init status when init is requested before the API was sealed. */
export const INIT_NOT_SEALED = -1;

export interface AssemblyReport {
  /** Every failed step: static verbs, sections, hooks. */
  readonly errors: ReadonlyArray<RegistrationError>;
  /** Built-in verbs that registered successfully. */
  readonly staticVerbs: ReadonlyArray<string>;
  readonly sections: DispatchReport;
}

export class ApiAssembler {
  constructor(
    private readonly dispatcher: SectionDispatcher,
    private readonly staticVerbs: ReadonlyArray<StaticVerb> = STATIC_VERBS,
  ) {}

  /**
   * Pre-init callback in the shape the host expects. Returns the number of
   * failed registration steps; zero means the API assembled completely.
   */
  readonly preInit = async (context: ControllerContext, api: ApiHandle): Promise<number> => {
    const report = await this.assemble(context, api);
    return report.errors.length;
  };

  /** Assemble and seal an API, returning the detailed report. */
  async assemble(context: ControllerContext, api: ApiHandle): Promise<AssemblyReport> {
    api.setUserData(context);
    context.transition(ApiState.Assembling);

    const errors: RegistrationError[] = [];
    const staticVerbs: string[] = [];
    for (const verb of this.staticVerbs) {
      try {
        api.addVerb({
          verb: verb.verb,
          info: verb.info,
          loa: verb.loa,
          handler: (request) => runStaticVerb(verb, request),
        });
        staticVerbs.push(verb.verb);
      } catch (err: unknown) {
        errors.push(new RegistrationError(`verb:${verb.verb}`, describeError(err)));
      }
    }

    const sections = await this.dispatcher.dispatch(api, context);
    errors.push(...sections.errors);

    try {
      api.onEvent(this.dispatchEvent);
    } catch (err: unknown) {
      errors.push(new RegistrationError('hook:event', describeError(err)));
    }
    try {
      api.onInit(this.init);
    } catch (err: unknown) {
      errors.push(new RegistrationError('hook:init', describeError(err)));
    }

    try {
      api.seal();
    } catch (err: unknown) {
      errors.push(new RegistrationError('seal', describeError(err)));
    }
    context.transition(ApiState.Sealed);

    for (const error of errors) {
      api.log('error', error.message);
    }
    if (errors.length > 0) {
      api.log('warning', `API '${api.name}' sealed with ${errors.length} failed registration step(s)`);
    }
    return { errors, staticVerbs, sections };
  }

  /**
   * Deferred init callback. Safe to call again: the same document yields the
   * same init actions, and the state stays Initialized.
   */
  readonly init = async (api: ApiHandle): Promise<number> => {
    const context = contextOf(api);
    if (context === undefined) {
      api.log('error', `No controller context attached to API '${api.name}'`);
      return INIT_NO_CONTEXT;
    }
    if (context.state !== ApiState.Sealed && context.state !== ApiState.Initialized) {
      api.log('error', `Init requested for API '${api.name}' in state ${context.state}`);
      return INIT_NOT_SEALED;
    }

    const report = await this.dispatcher.dispatchInit(api, context);
    for (const error of report.errors) {
      api.log('error', error.message);
    }
    if (context.state === ApiState.Sealed) {
      context.transition(ApiState.Initialized);
    }
    return report.errors.length;
  };

  /** Event hook: run every handler the events section routed to this name. */
  readonly dispatchEvent = async (api: ApiHandle, event: string, payload: JsonValue): Promise<void> => {
    const context = contextOf(api);
    if (context === undefined) {
      api.log('error', `No controller context for event '${event}' on API '${api.name}'`);
      return;
    }
    const handlers = context.eventHandlersFor(event);
    if (handlers.length === 0) {
      api.log('debug', `No handler for event '${event}'`);
      return;
    }
    for (const handler of handlers) {
      try {
        await handler(api, event, payload);
      } catch (err: unknown) {
        api.log('error', `Event '${event}' handler failed: ${describeError(err)}`);
      }
    }
  };
}

function runStaticVerb(verb: StaticVerb, request: RequestHandle): void {
  const context = contextOf(request.api);
  if (context === undefined) {
    request.fail('no-context', `No controller context for verb '${verb.verb}'`);
    return;
  }
  verb.handler(request, context);
}
