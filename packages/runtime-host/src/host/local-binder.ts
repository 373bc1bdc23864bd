/**
 * Switchboard Runtime Host: LocalBinder
 *
 * An in-process implementation of the host runtime contract. It creates APIs
 * and runs their pre-init callback. It delivers verb calls with per-session
 * level of assurance, broadcasts events and runs init hooks.
 *
 * Used by the CLI to host a controller without an external binder, and by
 * tests as the host stand-in.
 *
 * Host guarantees honored here:
 * - a sealed API refuses addVerb, onEvent and onInit
 * - every call produces exactly one Reply; a second reply from a handler is rejected
 * - init hooks run once per API, in creation order, after all APIs exist
 */

import type {
  ApiHandle,
  EventHook,
  InitHook,
  JsonObject,
  JsonValue,
  LogLevel,
  NewApiOptions,
  RequestHandle,
  RootApi,
  VerbDefinition,
} from '@switchboard/kernel';
import { HostError, Logger, describeError } from '@switchboard/kernel';

/** LOA granted to API-to-API calls. */
export const INTERNAL_LOA = 3;

export const DEFAULT_BINDER_NAME = 'afb-switchboard';

export type Reply =
  | { readonly ok: true; readonly status: 'success'; readonly data: JsonValue; readonly info?: string | undefined }
  | { readonly ok: false; readonly status: string; readonly info?: string | undefined };

/** A caller session. LOA changes made by one call are seen by the next. */
export class LocalSession {
  loa: number;

  constructor(readonly id: string = 'anonymous', loa = 0) {
    this.loa = loa;
  }
}

export interface InitStatus {
  readonly api: string;
  readonly status: number;
}

export interface LocalBinderOptions {
  /** Binder process name; the config file stem is derived from it. */
  readonly name?: string | undefined;
  readonly rootDir: string;
  readonly settings?: JsonObject | undefined;
  readonly logger?: Logger | undefined;
  /** Discard an API whose pre-init reports any failure. Default false. */
  readonly strictPreInit?: boolean | undefined;
}

export class LocalBinder implements RootApi {
  readonly logger: Logger;
  private readonly apis: Map<string, LocalApi> = new Map();
  private readonly initialized: Set<string> = new Set();
  private readonly name: string;
  private readonly root: string;
  private readonly hostSettings: JsonObject;
  private readonly strictPreInit: boolean;

  constructor(options: LocalBinderOptions) {
    this.name = options.name ?? DEFAULT_BINDER_NAME;
    this.root = options.rootDir;
    this.hostSettings = options.settings ?? {};
    this.logger = options.logger ?? new Logger();
    this.strictPreInit = options.strictPreInit ?? false;
  }

  settings(): JsonObject {
    return this.hostSettings;
  }

  rootDir(): string {
    return this.root;
  }

  binderName(): string {
    return this.name;
  }

  log(level: LogLevel, message: string): void {
    this.logger.log(level, 'root', message);
  }

  async newApi<C>(options: NewApiOptions<C>): Promise<ApiHandle | null> {
    if (this.apis.has(options.name)) {
      this.log('error', `API '${options.name}' already exists`);
      return null;
    }

    const api = new LocalApi(this, options.name, options.info, options.noConcurrency);
    this.apis.set(options.name, api);

    let failures: number;
    try {
      failures = await options.preInit(options.context, api);
    } catch (err: unknown) {
      this.apis.delete(options.name);
      this.log('error', `Pre-init of API '${options.name}' threw: ${describeError(err)}`);
      return null;
    }

    if (failures !== 0) {
      if (this.strictPreInit) {
        this.apis.delete(options.name);
        this.log('error', `API '${options.name}' discarded: pre-init returned ${failures}`);
        return null;
      }
      this.log('warning', `API '${options.name}' kept although pre-init returned ${failures}`);
    }
    return api;
  }

  api(name: string): LocalApi | undefined {
    return this.apis.get(name);
  }

  /** API names in creation order. */
  apiNames(): ReadonlyArray<string> {
    return Array.from(this.apis.keys());
  }

  /**
   * Run every API's init hook once, in creation order. APIs already
   * initialized by an earlier start() are skipped.
   */
  async start(): Promise<ReadonlyArray<InitStatus>> {
    const statuses: InitStatus[] = [];
    for (const api of this.apis.values()) {
      if (this.initialized.has(api.name)) continue;
      this.initialized.add(api.name);
      const hook = api.initHook;
      if (hook === undefined) continue;
      let status: number;
      try {
        status = await hook(api);
      } catch (err: unknown) {
        api.log('error', `Init hook threw: ${describeError(err)}`);
        status = -1;
      }
      if (status !== 0) {
        api.log('error', `Init returned ${status}`);
      }
      statuses.push({ api: api.name, status });
    }
    return statuses;
  }

  /** Call a verb. Always resolves with a Reply. */
  async call(apiName: string, verb: string, args: JsonValue = null, session: LocalSession = new LocalSession()): Promise<Reply> {
    const api = this.apis.get(apiName);
    if (api === undefined) {
      return { ok: false, status: 'unknown-api', info: `No API named '${apiName}'` };
    }
    const definition = api.verb(verb);
    if (definition === undefined) {
      return { ok: false, status: 'unknown-verb', info: `API '${apiName}' has no verb '${verb}'` };
    }
    if (session.loa < definition.loa) {
      return { ok: false, status: 'unauthorized', info: `Verb '${verb}' requires LOA ${definition.loa}` };
    }

    const request = new LocalRequest(api, verb, args, session);
    try {
      await definition.handler(request);
    } catch (err: unknown) {
      if (request.reply === undefined) {
        request.fail('failed', describeError(err));
      } else {
        api.log('error', `Verb '${verb}' threw after replying: ${describeError(err)}`);
      }
    }
    return request.reply ?? { ok: false, status: 'no-reply', info: `Verb '${verb}' returned without replying` };
  }

  /**
   * Deliver an event to every API that registered an event hook.
   *
   * @returns Number of APIs the event was delivered to
   */
  async pushEvent(event: string, payload: JsonValue = null): Promise<number> {
    let delivered = 0;
    for (const api of this.apis.values()) {
      const hook = api.eventHook;
      if (hook === undefined) continue;
      delivered += 1;
      try {
        await hook(api, event, payload);
      } catch (err: unknown) {
        api.log('error', `Event hook threw for '${event}': ${describeError(err)}`);
      }
    }
    return delivered;
  }
}

export class LocalApi implements ApiHandle {
  private readonly verbs: Map<string, VerbDefinition> = new Map();
  private userData: unknown = undefined;
  private sealedFlag = false;
  private eventHookFn: EventHook | undefined;
  private initHookFn: InitHook | undefined;
  private readonly emit: (level: LogLevel, message: string) => void;

  constructor(
    private readonly binder: LocalBinder,
    readonly name: string,
    readonly info: string,
    readonly noConcurrency: boolean,
  ) {
    this.emit = binder.logger.forSource(name);
  }

  get sealed(): boolean {
    return this.sealedFlag;
  }

  get eventHook(): EventHook | undefined {
    return this.eventHookFn;
  }

  get initHook(): InitHook | undefined {
    return this.initHookFn;
  }

  addVerb(definition: VerbDefinition): void {
    this.assertOpen(`add verb '${definition.verb}'`);
    if (this.verbs.has(definition.verb)) {
      throw new HostError(`API '${this.name}' already has a verb '${definition.verb}'`);
    }
    this.verbs.set(definition.verb, definition);
  }

  onEvent(hook: EventHook): void {
    this.assertOpen('set event hook');
    this.eventHookFn = hook;
  }

  onInit(hook: InitHook): void {
    this.assertOpen('set init hook');
    this.initHookFn = hook;
  }

  setUserData(data: unknown): void {
    this.userData = data;
  }

  getUserData(): unknown {
    return this.userData;
  }

  seal(): void {
    this.sealedFlag = true;
  }

  verb(name: string): VerbDefinition | undefined {
    return this.verbs.get(name);
  }

  /** Verb names in registration order. */
  verbNames(): ReadonlyArray<string> {
    return Array.from(this.verbs.keys());
  }

  async call(api: string, verb: string, args: JsonValue): Promise<JsonValue> {
    const reply = await this.binder.call(api, verb, args, new LocalSession(`api:${this.name}`, INTERNAL_LOA));
    if (!reply.ok) {
      throw new HostError(`${api}/${verb} failed: ${reply.status}${reply.info !== undefined ? ` (${reply.info})` : ''}`, reply.status);
    }
    return reply.data;
  }

  log(level: LogLevel, message: string): void {
    this.emit(level, message);
  }

  private assertOpen(operation: string): void {
    if (this.sealedFlag) {
      throw new HostError(`Cannot ${operation}: API '${this.name}' is sealed`);
    }
  }
}

export class LocalRequest implements RequestHandle {
  private settled: Reply | undefined;

  constructor(
    readonly api: LocalApi,
    readonly verb: string,
    readonly args: JsonValue,
    private readonly session: LocalSession,
  ) {}

  get loa(): number {
    return this.session.loa;
  }

  get reply(): Reply | undefined {
    return this.settled;
  }

  setLoa(level: number): void {
    this.session.loa = level;
  }

  success(data: JsonValue = null, info?: string): void {
    this.settle({ ok: true, status: 'success', data, info });
  }

  fail(status: string, info?: string): void {
    this.settle({ ok: false, status, info });
  }

  log(level: LogLevel, message: string): void {
    this.api.log(level, `[${this.verb}] ${message}`);
  }

  private settle(reply: Reply): void {
    if (this.settled !== undefined) {
      throw new HostError(`Request ${this.api.name}/${this.verb} already replied`);
    }
    this.settled = reply;
  }
}
