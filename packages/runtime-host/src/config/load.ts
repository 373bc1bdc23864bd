/**
 * Switchboard Runtime Host: Configuration Loader
 *
 * Reads and parses the located file, then hands the value to the kernel's
 * buildConfigDocument() for shape validation. Read and syntax failures are
 * ParseErrors; missing or mistyped metadata is a SchemaError.
 */

import { readFileSync } from 'node:fs';
import type { ConfigDocumentResult } from '@switchboard/kernel';
import { ParseError, buildConfigDocument, describeError } from '@switchboard/kernel';

export function loadConfig(path: string): ConfigDocumentResult {
  let raw: string;
  try {
    raw = readFileSync(path, 'utf-8');
  } catch (err: unknown) {
    return { ok: false, error: new ParseError(path, describeError(err)) };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err: unknown) {
    return { ok: false, error: new ParseError(path, describeError(err)) };
  }

  return buildConfigDocument(parsed, path);
}
