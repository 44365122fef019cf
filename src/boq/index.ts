/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

export * from './errors';
export { isSection } from './types';
export type { BoqMeta, BoqNode, BoqTree, DraftPosition, DraftTree, Phase, Position, PositionBase, RawPositionFields, Section } from './types';
export { joinOrdinal, parseOrdinal, walkSections, walkPositions, mapTree, shapeOf, freezeTree } from './tree';
export type { Shape } from './tree';
export { normalizeUnit, sameUnit } from './units';
export type { UnitCode } from './units';
export { sectionTotals, grossOf } from './totals';
export type { SectionTotals } from './totals';
