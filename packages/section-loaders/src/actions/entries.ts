/**
 * Section entry normalization.
 *
 * Every section accepts two shapes:
 *
 *   "controls": [ { "uid": "ping", ... }, { "uid": "echo", ... } ]
 *   "controls": { "ping": { ... }, "echo": { ... } }
 *
 * Both yield the same ordered list of (uid, body) entries.
 */

import type { JsonObject, JsonValue } from '@switchboard/kernel';
import { RegistrationError, isJsonArray, isJsonObject } from '@switchboard/kernel';

export interface SectionEntry {
  readonly uid: string;
  readonly body: JsonObject;
}

export interface SectionEntries {
  readonly entries: ReadonlyArray<SectionEntry>;
  readonly errors: ReadonlyArray<RegistrationError>;
}

export function sectionEntries(section: string, payload: JsonValue): SectionEntries {
  const entries: SectionEntry[] = [];
  const errors: RegistrationError[] = [];

  if (isJsonArray(payload)) {
    payload.forEach((item, index) => {
      if (!isJsonObject(item)) {
        errors.push(new RegistrationError(`${section}[${index}]`, 'entry is not an object'));
        return;
      }
      const uid = item['uid'];
      if (typeof uid !== 'string' || uid === '') {
        errors.push(new RegistrationError(`${section}[${index}]`, 'entry has no uid'));
        return;
      }
      entries.push({ uid, body: item });
    });
    return { entries, errors };
  }

  if (isJsonObject(payload)) {
    for (const [uid, body] of Object.entries(payload)) {
      if (!isJsonObject(body)) {
        errors.push(new RegistrationError(`${section}:${uid}`, 'entry is not an object'));
        continue;
      }
      entries.push({ uid, body });
    }
    return { entries, errors };
  }

  errors.push(new RegistrationError(`section:${section}`, 'payload must be an array or an object'));
  return { entries, errors };
}
