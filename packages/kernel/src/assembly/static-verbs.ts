/**
 * Switchboard Kernel: Built-in Verbs
 *
 * Attached to every assembled API before any configuration section runs.
 */

import type { RequestHandle } from '../types/host.js';
import type { ControllerContext } from './context.js';

export interface StaticVerb {
  readonly verb: string;
  readonly info: string;
  /** Required session level of assurance. */
  readonly loa: number;
  readonly handler: (request: RequestHandle, context: ControllerContext) => void;
}

/** Counts calls per API and replies with the new count. */
function pingGlobal(request: RequestHandle, context: ControllerContext): void {
  const count = context.nextPing();
  request.log('notice', `Controller:ping count=${count}`);
  request.success(count);
}

/** Raise the calling session to level of assurance 1. */
function auth(request: RequestHandle): void {
  request.setLoa(1);
  request.success();
}

export const STATIC_VERBS: ReadonlyArray<StaticVerb> = [
  { verb: 'ping-global', info: 'ping test for API', loa: 0, handler: pingGlobal },
  {
    verb: 'auth',
    info: 'Authenticate session to raise Level Of Assurance of the session',
    loa: 0,
    handler: auth,
  },
];
