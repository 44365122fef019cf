/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

export { mergeBoq } from './merge-engine';
export { resolveMatchKey, isMatchKeyName, MATCH_KEY_NAMES } from './match-key';
export type { KeyFunction, MatchKeyName, PathSelector, ResolvedMatchKey } from './match-key';
export type {
  ConflictEntry,
  FieldConflict,
  MatchedPair,
  MatchStatus,
  MergedPosition,
  MergedTree,
  MergeOptions,
  MergeReport,
  MergeResult,
  MergeSummary,
  UnmatchedPricedEntry,
  UnmatchedReferenceEntry,
} from './types';
