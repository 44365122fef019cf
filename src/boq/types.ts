/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause

  Bill-of-quantities tree: sections own sections and positions in document order.
*/

import type { Decimal } from '../common/decimal';
import type { UnitCode } from './units';

/** A = unpriced bill issued to bidders (X83), B = priced bid (X84). */
export type Phase = 'A' | 'B';

/** What every position shape shares; trees are generic over it. */
export interface PositionBase {
  kind: 'position';
  /** Diagnostic identity; matching never looks at it. */
  id: string;
  label: string;
  ordinalPath: string;
}

export interface Section<P extends PositionBase> {
  kind: 'section';
  /** Diagnostic identity; the GAEB ID attribute or a synthesised `section#<n>`. */
  id: string;
  /** Own ordinal label (RNoPart); empty for the root. */
  label: string;
  title: string;
  /** Labels of this section and its ancestors joined by '.', root excluded. */
  path: string;
  children: Array<Section<P> | P>;
}

/** Position fields exactly as they appear in the document. */
export interface RawPositionFields {
  shortText: string;
  longText?: string;
  itemId?: string;
  quantity?: string;
  unit?: string;
  unitPrice?: string;
  totalPrice?: string;
}

/** Position as assembled by the tree builder, before phase validation. */
export interface DraftPosition extends PositionBase {
  fields: RawPositionFields;
}

export interface Position extends PositionBase {
  itemId?: string;
  /** Ordinal path as integers, e.g. "01.02.0010" → [1, 2, 10]. */
  ozPath: readonly number[];
  shortText: string;
  longText?: string;
  /** Unit as written. */
  unit?: string;
  unitCode?: UnitCode;
  quantity?: Decimal;
  unitPrice?: Decimal;
  /** quantity × unitPrice, cents, half-up. */
  totalPrice?: Decimal;
  vatRate: Decimal;
}

export interface BoqMeta {
  project?: string;
  projectLabel?: string;
  currency?: string;
  boqName?: string;
  /** Phase named inside the document (DP element), when present. */
  phaseMarker?: string;
}

export interface BoqTree<P extends PositionBase = Position> {
  phase: Phase;
  root: Section<P>;
  meta: BoqMeta;
}

export type DraftTree = BoqTree<DraftPosition>;

export type BoqNode<P extends PositionBase> = Section<P> | P;

export function isSection<P extends PositionBase>(node: BoqNode<P>): node is Section<P> {
  return node.kind === 'section';
}
