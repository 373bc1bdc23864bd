/**
 * Configured actions.
 *
 * An action is what a control verb, an event route or an onload step runs:
 *
 *   { "uid": "ping", "info": "...", "action": "plugin://demo#ping", "args": {...}, "loa": 1 }
 *
 * Supported targets:
 *   plugin://<plugin uid>#<exported function>
 *   api://<api name>#<verb>
 * An entry without `action` is a no-op that yields null.
 */

import type { JsonValue } from '@switchboard/kernel';
import { RegistrationError } from '@switchboard/kernel';
import type { SectionEntry } from './entries.js';
import { sectionEntries } from './entries.js';

export type ActionTarget =
  | { readonly kind: 'plugin'; readonly plugin: string; readonly fn: string }
  | { readonly kind: 'api'; readonly api: string; readonly verb: string }
  | { readonly kind: 'none' };

export interface ActionDefinition {
  readonly uid: string;
  readonly info: string;
  readonly target: ActionTarget;
  /** Configured arguments, passed to every invocation. */
  readonly args: JsonValue;
  /** Required session level of assurance (controls only). */
  readonly loa: number;
}

export type ActionParseResult =
  | { readonly ok: true; readonly action: ActionDefinition }
  | { readonly ok: false; readonly error: RegistrationError };

export interface ActionList {
  readonly actions: ReadonlyArray<ActionDefinition>;
  readonly errors: ReadonlyArray<RegistrationError>;
}

const ACTION_URI = /^(plugin|api):\/\/([^#/]+)#([^#]+)$/;

/** Parse an action URI. Returns undefined for anything malformed. */
export function parseActionUri(uri: string): ActionTarget | undefined {
  const match = ACTION_URI.exec(uri);
  if (match === null) return undefined;
  const [, scheme, name, member] = match;
  if (name === undefined || member === undefined) return undefined;
  return scheme === 'plugin'
    ? { kind: 'plugin', plugin: name, fn: member }
    : { kind: 'api', api: name, verb: member };
}

export function formatActionTarget(target: ActionTarget): string {
  switch (target.kind) {
    case 'plugin':
      return `plugin://${target.plugin}#${target.fn}`;
    case 'api':
      return `api://${target.api}#${target.verb}`;
    case 'none':
      return '(none)';
  }
}

export function parseAction(section: string, entry: SectionEntry): ActionParseResult {
  const step = `${section}:${entry.uid}`;
  const { body } = entry;

  const info = body['info'] ?? '';
  if (typeof info !== 'string') {
    return { ok: false, error: new RegistrationError(step, "'info' must be a string") };
  }

  let target: ActionTarget = { kind: 'none' };
  const uri = body['action'];
  if (uri !== undefined) {
    if (typeof uri !== 'string') {
      return { ok: false, error: new RegistrationError(step, "'action' must be a string") };
    }
    const parsed = parseActionUri(uri);
    if (parsed === undefined) {
      return { ok: false, error: new RegistrationError(step, `unsupported action '${uri}'`) };
    }
    target = parsed;
  }

  const loa = body['loa'] ?? 0;
  if (typeof loa !== 'number' || !Number.isInteger(loa) || loa < 0) {
    return { ok: false, error: new RegistrationError(step, "'loa' must be a non-negative integer") };
  }

  return {
    ok: true,
    action: { uid: entry.uid, info, target, args: body['args'] ?? null, loa },
  };
}

/** Parse every entry of a section into actions, collecting failures. */
export function parseActions(section: string, payload: JsonValue): ActionList {
  const { entries, errors: entryErrors } = sectionEntries(section, payload);
  const actions: ActionDefinition[] = [];
  const errors: RegistrationError[] = [...entryErrors];
  for (const entry of entries) {
    const result = parseAction(section, entry);
    if (result.ok) {
      actions.push(result.action);
    } else {
      errors.push(result.error);
    }
  }
  return { actions, errors };
}
