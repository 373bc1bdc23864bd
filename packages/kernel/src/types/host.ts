/**
 * Switchboard Kernel: Host Runtime Contract
 *
 * The host runtime owns API objects, sessions, request delivery and event
 * delivery. The kernel never constructs or destroys an ApiHandle; it borrows
 * one during pre-init, attaches verbs and hooks, seals it, and receives it
 * again when the host runs the deferred init hook.
 *
 * Concrete implementations live outside the kernel (see LocalBinder in
 * @switchboard/runtime-host). Tests use small fakes of these interfaces.
 */

import type { JsonObject, JsonValue } from './json.js';

/** Severity of a log line, most severe first. */
export type LogLevel = 'error' | 'warning' | 'notice' | 'info' | 'debug';

/** Handler attached to a verb. Must reply to the request exactly once. */
export type RequestHandler = (request: RequestHandle) => void | Promise<void>;

/** Receives every event the host delivers to an API. */
export type EventHook = (api: ApiHandle, event: string, payload: JsonValue) => void | Promise<void>;

/** Deferred init callback. Zero means success. */
export type InitHook = (api: ApiHandle) => number | Promise<number>;

/**
 * Pre-init callback bound at API creation. Receives the opaque context passed
 * to RootApi.newApi() and returns the number of registration failures.
 */
export type PreInitHook<C> = (context: C, api: ApiHandle) => number | Promise<number>;

/** A verb as registered on an ApiHandle. */
export interface VerbDefinition {
  readonly verb: string;
  readonly info: string;
  /** Minimum session level of assurance required to call the verb. */
  readonly loa: number;
  readonly handler: RequestHandler;
}

/**
 * A host-managed API object.
 *
 * Structural methods (addVerb, onEvent, onInit) throw once the handle is
 * sealed. A host may also reject a registration for its own reasons (for
 * example a duplicate verb name) by throwing.
 */
export interface ApiHandle {
  readonly name: string;
  readonly info: string;
  readonly sealed: boolean;
  addVerb(definition: VerbDefinition): void;
  onEvent(hook: EventHook): void;
  onInit(hook: InitHook): void;
  setUserData(data: unknown): void;
  getUserData(): unknown;
  seal(): void;
  /**
   * Call a verb of another API through the host. Resolves with the reply data
   * on success and rejects with a HostError carrying the reply status otherwise.
   */
  call(api: string, verb: string, args: JsonValue): Promise<JsonValue>;
  log(level: LogLevel, message: string): void;
}

/** One verb invocation as seen by its handler. */
export interface RequestHandle {
  readonly api: ApiHandle;
  readonly verb: string;
  readonly args: JsonValue;
  /** Level of assurance of the calling session. */
  readonly loa: number;
  setLoa(level: number): void;
  success(data?: JsonValue, info?: string): void;
  fail(status: string, info?: string): void;
  log(level: LogLevel, message: string): void;
}

export interface NewApiOptions<C> {
  readonly name: string;
  readonly info: string;
  /** Ask the host to serialize calls into this API. */
  readonly noConcurrency: boolean;
  readonly preInit: PreInitHook<C>;
  readonly context: C;
}

/**
 * The root API handed to the module entry point. It reports host settings and
 * creates new named APIs.
 */
export interface RootApi {
  /** Host settings for this module, e.g. `binding-path`. */
  settings(): JsonObject;
  /** Runtime root directory reported by the host. */
  rootDir(): string;
  /** Name of the running binder process, e.g. `afb-demo`. */
  binderName(): string;
  /**
   * Create an API and run its pre-init callback. Resolves to null when the
   * host refuses or discards the API.
   */
  newApi<C>(options: NewApiOptions<C>): Promise<ApiHandle | null>;
  log(level: LogLevel, message: string): void;
}
