/**
 * Switchboard Kernel: ConfigDocument Construction
 *
 * Turns the untyped result of parsing a configuration file into a frozen
 * ConfigDocument. No I/O: the runtime host reads and parses the file, this
 * module validates the shape.
 *
 * Metadata may appear at the top level (`api`, `info`, `version`, `uid`) or
 * inside a `metadata` object; top-level fields take precedence. Every other
 * top-level key becomes a section, in document order.
 */

import { ParseError, SchemaError } from '../errors.js';
import type { ConfigDocument } from '../types/config.js';
import { METADATA_KEYS } from '../types/config.js';
import type { JsonValue } from '../types/json.js';
import { deepFreeze, isJsonValue, isRecord } from '../types/json.js';

export type ConfigDocumentResult =
  | { readonly ok: true; readonly document: ConfigDocument }
  | { readonly ok: false; readonly error: ParseError | SchemaError };

/**
 * Validate a parsed configuration value and build a ConfigDocument.
 *
 * @param raw - Output of JSON.parse for the file
 * @param source - Path of the file, used in diagnostics and kept on the document
 */
export function buildConfigDocument(raw: unknown, source: string): ConfigDocumentResult {
  if (!isRecord(raw)) {
    return { ok: false, error: new ParseError(source, 'top-level value is not an object') };
  }

  const meta = raw['metadata'];
  const metadata: Readonly<Record<string, unknown>> = isRecord(meta) ? meta : {};
  const fields: Record<string, string | undefined> = {};
  for (const key of ['api', 'info', 'version', 'uid']) {
    const value = raw[key] ?? metadata[key];
    if (value !== undefined && typeof value !== 'string') {
      return { ok: false, error: new SchemaError(source, `Metadata field '${key}' must be a string`) };
    }
    fields[key] = value;
  }

  const apiName = fields['api'];
  if (apiName === undefined || apiName === '') {
    return { ok: false, error: new SchemaError(source, 'API Missing from metadata') };
  }

  const sections = new Map<string, JsonValue>();
  for (const [key, value] of Object.entries(raw)) {
    if (METADATA_KEYS.has(key)) continue;
    if (!isJsonValue(value)) {
      return { ok: false, error: new ParseError(source, `section '${key}' is not plain JSON`) };
    }
    sections.set(key, deepFreeze(value));
  }

  const document: ConfigDocument = {
    apiName,
    info: fields['info'] ?? '',
    version: fields['version'],
    uid: fields['uid'],
    source,
    sections,
  };
  return { ok: true, document: Object.freeze(document) };
}
