/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { describe, it, expect } from 'vitest';
import { BOQ_ERROR_CODES, MalformedDocumentError, StructuralError, UnsupportedPhaseError } from '../boq/errors';
import { gaebNamespace, gaebXml } from '../test/fixtures';
import { MemoryLogger } from '../test/memory-logger';
import { SOURCE_SLICE_SIZE } from './decode';
import { readBoqEvents } from './gaeb-reader';
import type { BoqEvent } from './types';

const SIMPLE = gaebXml(
  'A',
  [
    {
      rNoPart: '01',
      title: 'Erdarbeiten',
      children: [{ rNoPart: '001', id: 'pos-a', qty: '10', unit: 'm', text: 'Graben', longText: 'Tiefe 1 m' }],
    },
  ],
  { project: 'Demo', currency: 'EUR' }
);

const SIMPLE_EVENTS: BoqEvent[] = [
  { kind: 'info', key: 'project', value: 'Demo' },
  { kind: 'info', key: 'phaseMarker', value: '83' },
  { kind: 'info', key: 'currency', value: 'EUR' },
  { kind: 'sectionOpen', label: '', title: '' },
  { kind: 'sectionOpen', label: '01', title: 'Erdarbeiten' },
  {
    kind: 'position',
    label: '001',
    fields: { shortText: 'Graben', longText: 'Tiefe 1 m', itemId: 'pos-a', quantity: '10', unit: 'm' },
  },
  { kind: 'sectionClose' },
  { kind: 'sectionClose' },
];

function readAll(source: Parameters<typeof readBoqEvents>[0], phase: 'A' | 'B' = 'A'): BoqEvent[] {
  return [...readBoqEvents(source, phase)];
}

describe('readBoqEvents', () => {
  it('emits info, section and position events in document order', () => {
    expect(readAll(SIMPLE)).toEqual(SIMPLE_EVENTS);
  });

  it('takes the BoQ name as the root title and carries GAEB IDs', () => {
    const xml = gaebXml('B', [{ rNoPart: '01', id: 'c-1', children: [{ rNoPart: '1', unitPrice: '3' }] }], {
      boqName: 'LV 1',
    });
    const events = readAll(xml, 'B');
    expect(events.filter((e) => e.kind === 'sectionOpen')).toEqual([
      { kind: 'sectionOpen', label: '', title: 'LV 1' },
      { kind: 'sectionOpen', label: '01', title: '', id: 'c-1' },
    ]);
    expect(events).toContainEqual({ kind: 'info', key: 'boqName', value: 'LV 1' });
    expect(events).toContainEqual({ kind: 'position', label: '1', fields: { shortText: '', unitPrice: '3' } });
  });

  it('yields the same events for chunked bytes as for the whole text', () => {
    const xml = gaebXml('A', [{ rNoPart: '01', children: [{ rNoPart: '001', qty: '1', unit: 'Stück', text: 'Tür' }] }]);
    const bytes = Buffer.from(xml, 'utf-8');
    const chunks: Uint8Array[] = [];
    for (let i = 0; i < bytes.length; i += 7) chunks.push(bytes.subarray(i, i + 7));
    expect(readAll(chunks)).toEqual(readAll(xml));
    expect(readAll(chunks)).toContainEqual({
      kind: 'position',
      label: '001',
      fields: { shortText: 'Tür', quantity: '1', unit: 'Stück' },
    });
  });

  it('decodes bytes in the encoding the declaration names', () => {
    const xml = gaebXml('A', [{ rNoPart: '01', children: [{ rNoPart: '001', qty: '2', unit: 'Stück', text: 'Türzarge' }] }]);
    const latin1 = Buffer.from(xml.replace('UTF-8', 'ISO-8859-1'), 'latin1');
    expect(readAll(latin1)).toContainEqual({
      kind: 'position',
      label: '001',
      fields: { shortText: 'Türzarge', quantity: '2', unit: 'Stück' },
    });
  });

  it('is lazy: nothing is read before the first event is requested', () => {
    let pulled = 0;
    function* source(): Generator<string> {
      pulled++;
      yield SIMPLE;
    }
    const events = readBoqEvents(source(), 'A');
    expect(pulled).toBe(0);
    expect(events.next().value).toEqual(SIMPLE_EVENTS[0]);
    expect(pulled).toBe(1);
  });

  it('is lazy over a whole string too: events ahead of a late error are delivered first', () => {
    const xml = SIMPLE.replace('</BoQCtgy>', `${' '.repeat(SOURCE_SLICE_SIZE)}<1bad/></BoQCtgy>`);
    const events = readBoqEvents(xml, 'A');
    const head = Array.from({ length: 6 }, () => events.next().value);
    expect(head).toEqual(SIMPLE_EVENTS.slice(0, 6));
    expect(() => events.next()).toThrow(MalformedDocumentError);
  });

  it('logs a summary through the given logger', () => {
    const logger = new MemoryLogger();
    [...readBoqEvents(SIMPLE, 'A', { logger })];
    expect(logger.entries).toContainEqual({
      level: 'debug',
      context: '[reader]',
      message: 'read 1 position(s) in 2 section(s)',
    });
  });
});

describe('readBoqEvents phase checks', () => {
  it('rejects a priced namespace read as phase A', () => {
    const xml = gaebXml('B', [], {});
    expect(() => readAll(xml, 'A')).toThrow(
      new UnsupportedPhaseError(`Document is phase B (namespace ${gaebNamespace('84')}) but was declared as phase A`)
    );
  });

  it('rejects a DP element that contradicts the declared phase', () => {
    const xml = gaebXml('A', [], { namespace: null, dp: '84' });
    expect(() => readAll(xml, 'A')).toThrow('Document is phase B (DP element) but was declared as phase A');
  });

  it('rejects exchange phases other than 83 and 84', () => {
    const xml = gaebXml('A', [], { namespace: null, dp: '86' });
    expect(() => readAll(xml, 'A')).toThrow(
      'Document declares exchange phase 86 (DP element); only 83 (phase A) and 84 (phase B) are supported'
    );
  });

  it('accepts a document without any phase marker', () => {
    const xml = gaebXml('B', [], { namespace: null, dp: null });
    expect(readAll(xml, 'B')).toEqual([
      { kind: 'sectionOpen', label: '', title: '' },
      { kind: 'sectionClose' },
    ]);
  });
});

describe('readBoqEvents errors', () => {
  it('raises MalformedDocumentError for content that is not XML', () => {
    expect(() => readAll('not xml')).toThrow(MalformedDocumentError);
  });

  it('raises MalformedDocumentError with position for broken markup', () => {
    try {
      readAll('<GAEB>\n<Award a=>');
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(MalformedDocumentError);
      if (err instanceof MalformedDocumentError) {
        expect(err.code).toBe(BOQ_ERROR_CODES.MALFORMED_DOCUMENT);
        expect(err.line).toBe(2);
      }
    }
  });

  it('raises MalformedDocumentError for a root that is not GAEB', () => {
    expect(() => readAll('<Other/>')).toThrow('Malformed document: root element <Other> is not a GAEB document');
  });

  it('raises StructuralError naming the open section when the document is cut off', () => {
    const xml = '<GAEB><Award><BoQ><BoQBody><BoQCtgy RNoPart="01"><BoQBody>';
    expect(() => readAll(xml)).toThrow(new StructuralError('unbalanced markup: Unclosed root tag', '01'));
  });

  it('raises StructuralError for a stray closing tag', () => {
    expect(() => readAll('<GAEB><Award></BoQ></Award></GAEB>')).toThrow(StructuralError);
  });
});
