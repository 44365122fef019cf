/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import type { Decimal } from '../common/decimal';
import type { BoqTree, Position } from '../boq/types';
import type { StageOptions } from '../parser/types';
import type { PathSelector } from './match-key';

export type MatchStatus = 'matched' | 'conflict' | 'unmatched';

/** Reference position carrying the price found for it, if any. */
export interface MergedPosition extends Position {
  match: MatchStatus;
  /** Diagnostic id of the priced position the price came from. */
  pricedId?: string;
}

/** Always phase B: the reference, priced. */
export type MergedTree = BoqTree<MergedPosition>;

/** Every pair whose key was found on both sides; conflicting pairs included. */
export interface MatchedPair {
  key: string;
  referencePath: string;
  pricedPath: string;
  referenceId: string;
  pricedId: string;
  conflicting: boolean;
}

export interface FieldConflict {
  field: 'unit' | 'quantity';
  reference: string;
  priced: string;
}

export interface ConflictEntry {
  key: string;
  referencePath: string;
  pricedPath: string;
  fields: FieldConflict[];
}

export interface UnmatchedReferenceEntry {
  /** Undefined when the selector found no key on this position. */
  key?: string;
  path: string;
  id: string;
}

export interface UnmatchedPricedEntry {
  key?: string;
  path: string;
  id: string;
  unitPrice?: string;
}

export interface MergeSummary {
  referencePositions: number;
  pricedPositions: number;
  matched: number;
  conflicts: number;
  unmatchedReference: number;
  unmatchedPriced: number;
}

export interface MergeReport {
  matchKey: string;
  quantityTolerance: string;
  matched: MatchedPair[];
  conflicts: ConflictEntry[];
  unmatchedReference: UnmatchedReferenceEntry[];
  unmatchedPriced: UnmatchedPricedEntry[];
  summary: MergeSummary;
}

export interface MergeResult {
  tree: MergedTree;
  report: MergeReport;
}

export interface MergeOptions extends StageOptions {
  /** Which field correlates positions; full ordinal path when omitted. */
  matchKey?: PathSelector;
  /** Largest quantity difference still treated as equal; exact match when omitted. */
  quantityTolerance?: Decimal | string;
}
