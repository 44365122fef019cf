/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause

  Units of measure as UNECE Rec. 20 codes.
*/

export type UnitCode = 'MTR' | 'MTK' | 'MTQ' | 'HUR' | 'C62' | 'KGM' | 'TNE' | 'LTR' | 'LS';

const UNIT_ALIASES = new Map<string, UnitCode>([
  ['m', 'MTR'],
  ['meter', 'MTR'],
  ['lfdm', 'MTR'],
  ['mtr', 'MTR'],
  ['m2', 'MTK'],
  ['m^2', 'MTK'],
  ['m²', 'MTK'],
  ['qm', 'MTK'],
  ['mtk', 'MTK'],
  ['m3', 'MTQ'],
  ['m^3', 'MTQ'],
  ['m³', 'MTQ'],
  ['cbm', 'MTQ'],
  ['mtq', 'MTQ'],
  ['h', 'HUR'],
  ['std', 'HUR'],
  ['stunden', 'HUR'],
  ['hur', 'HUR'],
  ['stk', 'C62'],
  ['stück', 'C62'],
  ['st', 'C62'],
  ['c62', 'C62'],
  ['kg', 'KGM'],
  ['kgm', 'KGM'],
  ['t', 'TNE'],
  ['tne', 'TNE'],
  ['l', 'LTR'],
  ['ltr', 'LTR'],
  ['psch', 'LS'],
  ['pauschal', 'LS'],
  ['ls', 'LS'],
]);

function unitKey(raw: string): string {
  return raw.trim().toLowerCase().replace(/[.\s]/g, '');
}

/** Map a unit as written ("lfdm", "m²", "Stk.") to its code; undefined when unknown. */
export function normalizeUnit(raw: string): UnitCode | undefined {
  return UNIT_ALIASES.get(unitKey(raw));
}

/**
 * Two units are the same when both map to one code, or, if either is unknown,
 * when they read the same ignoring case, dots and spaces.
 */
export function sameUnit(a: string | undefined, b: string | undefined): boolean {
  if (a === undefined || b === undefined) return a === b;
  const codeA = normalizeUnit(a);
  const codeB = normalizeUnit(b);
  if (codeA && codeB) return codeA === codeB;
  return unitKey(a) === unitKey(b);
}
