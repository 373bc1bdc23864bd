/**
 * Switchboard Kernel: Section Loader Capability
 *
 * One loader per section key. A loader turns its section payload into side
 * effects on the API (verbs, event routes, registered plugins) and reports
 * each failed entry as a RegistrationError. Returning an empty array means
 * the whole section applied.
 */

import type { ControllerContext } from '../assembly/context.js';
import type { RegistrationError } from '../errors.js';
import type { ApiHandle } from '../types/host.js';
import type { JsonValue } from '../types/json.js';

export interface SectionLoader {
  /** Top-level configuration key this loader owns. */
  readonly key: string;

  /** Pre-init phase: called while the API is Assembling. */
  load(api: ApiHandle, payload: JsonValue, context: ControllerContext): Promise<ReadonlyArray<RegistrationError>>;

  /**
   * Init phase: called from the deferred init hook once the API is sealed.
   * Must derive everything it runs from `payload` so that repeated calls
   * with the same document run the same actions.
   */
  init?(api: ApiHandle, payload: JsonValue, context: ControllerContext): Promise<ReadonlyArray<RegistrationError>>;
}
