/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import * as fs from 'fs';
import { beforeEach, describe, it, expect, vi } from 'vitest';
import { SourceUnreadableError, StructuralError, UnsupportedPhaseError } from '../boq/errors';
import { walkPositions } from '../boq/tree';
import { fixturePath, gaebXml } from '../test/fixtures';
import { parseBoq, parseBoqFile, readFileChunks } from './parse-boq';

vi.mock('fs', async (importOriginal) => {
  const actual = await importOriginal<typeof import('fs')>();
  return { ...actual, openSync: vi.fn(actual.openSync), closeSync: vi.fn(actual.closeSync) };
});

beforeEach(() => {
  vi.mocked(fs.openSync).mockClear();
  vi.mocked(fs.closeSync).mockClear();
});

describe('parseBoq', () => {
  it('runs reader, builder and validator over a string', () => {
    const tree = parseBoq(
      gaebXml('B', [{ rNoPart: '01', children: [{ rNoPart: '001', qty: '4', unit: 'Stk', unitPrice: '12.5' }] }]),
      'B'
    );
    const [{ position }] = [...walkPositions(tree.root)];
    expect(tree.phase).toBe('B');
    expect(tree.meta.phaseMarker).toBe('84');
    expect(position.ordinalPath).toBe('01.001');
    expect(position.totalPrice?.toString()).toBe('50.00');
  });
});

describe('parseBoqFile', () => {
  it('parses a phase A file', () => {
    const tree = parseBoqFile(fixturePath('sample.X83'), 'A');
    const positions = [...walkPositions(tree.root)].map(({ position }) => position);
    expect(tree.meta).toEqual({
      project: 'Schulhaus Nord',
      projectLabel: 'Sanierung Schulhaus Nord',
      phaseMarker: '83',
      currency: 'EUR',
      boqName: 'LV Rohbau',
    });
    expect(tree.root.id).toBe('lv-rohbau');
    expect(tree.root.title).toBe('LV Rohbau');
    expect(positions.map((p) => [p.ordinalPath, p.id, p.quantity?.toString(), p.unitCode])).toEqual([
      ['01.001', 'pos-graben', '10', 'MTR'],
      ['01.002', 'pos-oberboden', '25.5', 'MTK'],
      ['02.001', 'pos-einrichten', '1', 'LS'],
    ]);
    expect(positions[0].shortText).toBe('Graben ausheben');
    expect(positions[0].longText).toBe('Graben fuer Leitungen ausheben, Tiefe bis 1,20 m.');
  });

  it('parses a phase B file with totals', () => {
    const tree = parseBoqFile(fixturePath('sample.X84'), 'B');
    expect([...walkPositions(tree.root)].map(({ position }) => position.totalPrice?.toString())).toEqual([
      '25.00',
      '107.10',
      '1200.00',
    ]);
  });

  it('reads in chunks and closes the file afterwards', () => {
    parseBoqFile(fixturePath('sample.X83'), 'A');
    expect(fs.openSync).toHaveBeenCalledTimes(1);
    expect(fs.closeSync).toHaveBeenCalledTimes(1);
  });

  it('closes the file when parsing fails', () => {
    expect(() => parseBoqFile(fixturePath('truncated.X83'), 'A')).toThrow(StructuralError);
    expect(fs.closeSync).toHaveBeenCalledTimes(1);
  });

  it('reports a missing file by name', () => {
    const missing = fixturePath('missing.X83');
    expect(() => parseBoqFile(missing, 'A')).toThrow(SourceUnreadableError);
    expect(() => parseBoqFile(missing, 'A')).toThrow(`Cannot read ${missing} (ENOENT)`);
    expect(fs.closeSync).not.toHaveBeenCalled();
  });

  it('reports a directory that cannot be read as a file', () => {
    const dir = fixturePath('');
    expect(() => parseBoqFile(dir, 'A')).toThrow(SourceUnreadableError);
    expect(fs.closeSync).toHaveBeenCalledTimes(1);
  });

  it('closes the file when the phase is rejected', () => {
    expect(() => parseBoqFile(fixturePath('sample.X84'), 'A')).toThrow(UnsupportedPhaseError);
    expect(fs.closeSync).toHaveBeenCalledTimes(1);
  });
});

describe('readFileChunks', () => {
  it('yields the whole file in chunks of the given size', () => {
    const chunks = [...readFileChunks(fixturePath('sample.X83'), 100)];
    const whole = fs.readFileSync(fixturePath('sample.X83'));
    expect(chunks.every((chunk) => chunk.length <= 100)).toBe(true);
    expect(Buffer.concat(chunks).equals(whole)).toBe(true);
  });

  it('closes the file when iteration is abandoned', () => {
    const chunks = readFileChunks(fixturePath('sample.X83'), 16);
    chunks.next();
    chunks.return(undefined);
    expect(fs.closeSync).toHaveBeenCalledTimes(1);
  });
});
