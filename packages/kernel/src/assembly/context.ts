/**
 * Switchboard Kernel: Controller Context
 *
 * The explicit per-API context. Created once by the entry point, attached to
 * the ApiHandle as user data during pre-init, and resolved again from the
 * handle by every later callback (init hook, event hook, verb handlers).
 * Callbacks never capture it in a closure, so one assembler can serve any
 * number of independently configured APIs.
 *
 * The ConfigDocument it carries is frozen. The mutable parts (lifecycle state,
 * plugin registry, event handler table, ping counter) are written during
 * assembly and read afterwards; the host runs each hook to completion before
 * another structural change to the same API, so no locking is done here.
 */

import { LifecycleError } from '../errors.js';
import { PluginRegistry } from '../plugins/registry.js';
import type { ConfigDocument } from '../types/config.js';
import type { ApiHandle } from '../types/host.js';
import type { JsonValue } from '../types/json.js';
import { ApiState, canTransition } from '../types/lifecycle.js';
import type { PluginResolver } from '../types/plugin.js';

/** Handler for one configured event name. */
export type EventHandler = (api: ApiHandle, event: string, payload: JsonValue) => void | Promise<void>;

export interface ControllerContextOptions {
  readonly pluginResolver?: PluginResolver | undefined;
  /** Directories searched for plugin modules without an explicit `spath`. */
  readonly pluginSearchPath?: ReadonlyArray<string> | undefined;
}

export class ControllerContext {
  readonly plugins = new PluginRegistry();
  readonly pluginResolver: PluginResolver | undefined;
  readonly pluginSearchPath: ReadonlyArray<string>;

  private currentState: ApiState = ApiState.Created;
  private pings = 0;
  private readonly eventHandlers: Map<string, EventHandler[]> = new Map();

  constructor(
    readonly config: ConfigDocument,
    options: ControllerContextOptions = {},
  ) {
    this.pluginResolver = options.pluginResolver;
    this.pluginSearchPath = options.pluginSearchPath ?? [];
  }

  get state(): ApiState {
    return this.currentState;
  }

  /**
   * Move to the next lifecycle state.
   *
   * @throws {LifecycleError} If `to` is not the single legal successor
   */
  transition(to: ApiState): void {
    if (!canTransition(this.currentState, to)) {
      throw new LifecycleError(
        `Illegal lifecycle transition for API '${this.config.apiName}': ${this.currentState} → ${to}`,
      );
    }
    this.currentState = to;
  }

  /** Increment and return the `ping-global` counter. */
  nextPing(): number {
    this.pings += 1;
    return this.pings;
  }

  /**
   * Route an event name to a handler. Several handlers per name run in
   * registration order.
   *
   * @throws {LifecycleError} Once the API is sealed
   */
  addEventHandler(event: string, handler: EventHandler): void {
    if (this.currentState !== ApiState.Created && this.currentState !== ApiState.Assembling) {
      throw new LifecycleError(
        `Cannot route event '${event}' on API '${this.config.apiName}' in state ${this.currentState}`,
      );
    }
    const handlers = this.eventHandlers.get(event) ?? [];
    handlers.push(handler);
    this.eventHandlers.set(event, handlers);
  }

  eventHandlersFor(event: string): ReadonlyArray<EventHandler> {
    return this.eventHandlers.get(event) ?? [];
  }

  /** Event names with at least one handler, in first-registration order. */
  routedEvents(): ReadonlyArray<string> {
    return Array.from(this.eventHandlers.keys());
  }
}

/** Resolve the ControllerContext attached to an API, if any. */
export function contextOf(api: ApiHandle): ControllerContext | undefined {
  const data = api.getUserData();
  return data instanceof ControllerContext ? data : undefined;
}
