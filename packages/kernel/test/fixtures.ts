/**
 * Switchboard Kernel — Test Fixtures
 *
 * In-memory fakes of the host contract. FakeApi records every registration
 * and log line; FakeRequest records the reply. Shared with the
 * section-loaders tests.
 */

import type {
  ApiHandle,
  ConfigDocument,
  EventHook,
  InitHook,
  JsonValue,
  LogLevel,
  RequestHandle,
  VerbDefinition,
} from '@switchboard/kernel';
import { HostError, buildConfigDocument } from '@switchboard/kernel';

// ---------------------------------------------------------------------------
// Fake host API
// ---------------------------------------------------------------------------

export interface LogLine {
  readonly level: LogLevel;
  readonly message: string;
}

export interface RecordedCall {
  readonly api: string;
  readonly verb: string;
  readonly args: JsonValue;
}

export type CallRoute = (api: string, verb: string, args: JsonValue) => JsonValue | Promise<JsonValue>;

export class FakeApi implements ApiHandle {
  readonly verbs: Map<string, VerbDefinition> = new Map();
  readonly logs: LogLine[] = [];
  readonly calls: RecordedCall[] = [];
  /** Verb names the host refuses to register. */
  readonly rejectVerbs: Set<string> = new Set();
  eventHook: EventHook | undefined;
  initHook: InitHook | undefined;
  sealed = false;
  route: CallRoute | undefined;
  private userData: unknown = undefined;

  constructor(readonly name: string = 'demo', readonly info: string = '') {}

  addVerb(definition: VerbDefinition): void {
    this.assertOpen();
    if (this.rejectVerbs.has(definition.verb)) {
      throw new HostError(`verb '${definition.verb}' rejected`);
    }
    if (this.verbs.has(definition.verb)) {
      throw new HostError(`duplicate verb '${definition.verb}'`);
    }
    this.verbs.set(definition.verb, definition);
  }

  onEvent(hook: EventHook): void {
    this.assertOpen();
    this.eventHook = hook;
  }

  onInit(hook: InitHook): void {
    this.assertOpen();
    this.initHook = hook;
  }

  setUserData(data: unknown): void {
    this.userData = data;
  }

  getUserData(): unknown {
    return this.userData;
  }

  seal(): void {
    this.sealed = true;
  }

  async call(api: string, verb: string, args: JsonValue): Promise<JsonValue> {
    this.calls.push({ api, verb, args });
    if (this.route === undefined) {
      throw new HostError(`no route to ${api}/${verb}`, 'unknown-api');
    }
    return this.route(api, verb, args);
  }

  log(level: LogLevel, message: string): void {
    this.logs.push({ level, message });
  }

  messages(level?: LogLevel): string[] {
    return this.logs.filter((line) => level === undefined || line.level === level).map((line) => line.message);
  }

  /** Invoke a registered verb the way a host would. */
  async invoke(verb: string, args: JsonValue = null, loa = 0): Promise<FakeRequest> {
    const definition = this.verbs.get(verb);
    if (definition === undefined) {
      throw new Error(`test invoked unregistered verb '${verb}'`);
    }
    const request = new FakeRequest(this, verb, args, loa);
    await definition.handler(request);
    return request;
  }

  private assertOpen(): void {
    if (this.sealed) {
      throw new HostError(`API '${this.name}' is sealed`);
    }
  }
}

// ---------------------------------------------------------------------------
// Fake request
// ---------------------------------------------------------------------------

export type FakeReply =
  | { readonly ok: true; readonly data: JsonValue; readonly info: string | undefined }
  | { readonly ok: false; readonly status: string; readonly info: string | undefined };

export class FakeRequest implements RequestHandle {
  readonly replies: FakeReply[] = [];
  readonly logs: LogLine[] = [];
  loa: number;

  constructor(
    readonly api: ApiHandle,
    readonly verb: string,
    readonly args: JsonValue = null,
    loa = 0,
  ) {
    this.loa = loa;
  }

  get reply(): FakeReply | undefined {
    return this.replies[0];
  }

  setLoa(level: number): void {
    this.loa = level;
  }

  success(data: JsonValue = null, info?: string): void {
    this.replies.push({ ok: true, data, info });
  }

  fail(status: string, info?: string): void {
    this.replies.push({ ok: false, status, info });
  }

  log(level: LogLevel, message: string): void {
    this.logs.push({ level, message });
  }
}

// ---------------------------------------------------------------------------
// Documents
// ---------------------------------------------------------------------------

/** Build a ConfigDocument from a literal, failing the test on a bad literal. */
export function makeDocument(raw: Readonly<Record<string, JsonValue>>, source = '/cfg/demo.json'): ConfigDocument {
  const result = buildConfigDocument(raw, source);
  if (!result.ok) {
    throw result.error;
  }
  return result.document;
}
