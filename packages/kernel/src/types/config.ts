/**
 * Switchboard Kernel: Configuration Document
 *
 * The parsed controller configuration. Top-level metadata plus an ordered map
 * of named sections, each an opaque JSON payload interpreted by a section loader.
 *
 * A ConfigDocument is deep-frozen when built. Section loaders read payloads
 * and may act on the host API; they never rewrite the document.
 */

import type { JsonValue } from './json.js';

/** Top-level keys consumed as metadata rather than dispatched as sections. */
export const METADATA_KEYS: ReadonlySet<string> = new Set(['api', 'info', 'version', 'uid', 'metadata']);

export interface ConfigDocument {
  /** Name of the API to create. Required. */
  readonly apiName: string;
  /** Human-readable description. Empty when absent. */
  readonly info: string;
  readonly version?: string | undefined;
  readonly uid?: string | undefined;
  /** Absolute path of the file the document was loaded from. */
  readonly source: string;
  /** Sections in document order, keyed by section name. */
  readonly sections: ReadonlyMap<string, JsonValue>;
}
