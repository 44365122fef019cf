/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

export { readBoqEvents } from './gaeb-reader';
export { buildBoqTree } from './tree-builder';
export { validateBoqTree, DEFAULT_VAT_RATE } from './phase-validator';
export { parseBoq, parseBoqFile, readFileChunks } from './parse-boq';
export { decodeChunks, sniffEncoding } from './decode';
export type { ValidatorOptions } from './phase-validator';
export type { ParseOptions } from './parse-boq';
export type { BoqEvent, BoqSource, InfoEvent, PositionEvent, SectionCloseEvent, SectionOpenEvent, StageOptions } from './types';
