/**
 * Switchboard Kernel — ConfigDocument Tests
 *
 *   CD-U1: metadata and sections are split; sections keep document order
 *   CD-U2: metadata may be nested under `metadata`; top level wins
 *   CD-U3: missing or empty api is a SchemaError
 *   CD-U4: non-string metadata is a SchemaError
 *   CD-U5: a non-object document is a ParseError
 *   CD-U6: the document and its payloads are frozen
 */

import { describe, it, expect } from 'vitest';
import { buildConfigDocument, isJsonObject } from '../src/index.js';

const SOURCE = '/cfg/demo.json';

describe('buildConfigDocument', () => {
  it('CD-U1: splits metadata from sections in document order', () => {
    const result = buildConfigDocument(
      { api: 'demo', info: 'x', onload: [], plugins: [], controls: { ping: {} } },
      SOURCE,
    );
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    const doc = result.document;
    expect(doc.apiName).toBe('demo');
    expect(doc.info).toBe('x');
    expect(doc.version).toBeUndefined();
    expect(doc.source).toBe(SOURCE);
    expect(Array.from(doc.sections.keys())).toEqual(['onload', 'plugins', 'controls']);
    expect(doc.sections.get('controls')).toEqual({ ping: {} });
  });

  it('CD-U1b: info defaults to the empty string', () => {
    const result = buildConfigDocument({ api: 'demo' }, SOURCE);
    expect(result.ok && result.document.info).toBe('');
  });

  it('CD-U2: reads nested metadata and prefers top-level fields', () => {
    const result = buildConfigDocument(
      { api: 'top', metadata: { api: 'inner', info: 'nested info', version: '1.0' }, events: {} },
      SOURCE,
    );
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.document.apiName).toBe('top');
    expect(result.document.info).toBe('nested info');
    expect(result.document.version).toBe('1.0');
    expect(Array.from(result.document.sections.keys())).toEqual(['events']);
  });

  it('CD-U3: missing api is a SchemaError', () => {
    const result = buildConfigDocument({ info: 'x', controls: {} }, SOURCE);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe('E_SCHEMA');
    expect(result.error.message).toBe('API Missing from metadata in: /cfg/demo.json');
  });

  it('CD-U3b: empty api is a SchemaError', () => {
    const result = buildConfigDocument({ api: '' }, SOURCE);
    expect(result.ok || result.error.code).toBe('E_SCHEMA');
  });

  it('CD-U4: non-string metadata is a SchemaError', () => {
    const result = buildConfigDocument({ api: 42 }, SOURCE);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe("Metadata field 'api' must be a string in: /cfg/demo.json");
  });

  it('CD-U5: a top-level array is a ParseError', () => {
    const result = buildConfigDocument([{ api: 'demo' }], SOURCE);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe('E_PARSE');
    expect(result.error.message).toBe(
      'No valid control config file in: /cfg/demo.json (top-level value is not an object)',
    );
  });

  it('CD-U6: freezes the document and section payloads', () => {
    const result = buildConfigDocument({ api: 'demo', controls: { ping: { args: [1, 2] } } }, SOURCE);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    const controls = result.document.sections.get('controls');
    expect(Object.isFrozen(result.document)).toBe(true);
    expect(Object.isFrozen(controls)).toBe(true);
    const ping = isJsonObject(controls) ? controls['ping'] : undefined;
    const args = isJsonObject(ping) ? ping['args'] : undefined;
    expect(Object.isFrozen(args)).toBe(true);
  });
});
