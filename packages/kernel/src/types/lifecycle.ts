/**
 * Switchboard Kernel: API Lifecycle
 *
 * State transitions:
 * - Created → Assembling (pre-init starts)
 * - Assembling → Sealed (verbs, sections and hooks registered; API sealed)
 * - Sealed → Initialized (deferred init hook ran)
 *
 * There is no path backwards. Sealed is reached even when registration steps
 * failed; the failure count is reported to the host instead.
 */

export enum ApiState {
  /** Host allocated the API; the context exists but nothing is attached. */
  Created = 'Created',
  /** Static verbs, sections and hooks are being attached. */
  Assembling = 'Assembling',
  /** Structure frozen; no further verb or hook registration. */
  Sealed = 'Sealed',
  /** The deferred init hook has executed. */
  Initialized = 'Initialized',
}

export const LEGAL_TRANSITIONS: ReadonlyMap<ApiState, ApiState> = new Map([
  [ApiState.Created, ApiState.Assembling],
  [ApiState.Assembling, ApiState.Sealed],
  [ApiState.Sealed, ApiState.Initialized],
]);

export function canTransition(from: ApiState, to: ApiState): boolean {
  return LEGAL_TRANSITIONS.get(from) === to;
}
