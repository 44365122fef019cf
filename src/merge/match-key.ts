/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import type { Position } from '../boq/types';

export const MATCH_KEY_NAMES = ['ordinalPath', 'itemId', 'label'] as const;

/**
 * Built-in keys:
 * - `ordinalPath`: full dotted path, e.g. "01.02.0010" (default)
 * - `itemId`: the document's own item ID, stable across renumbering
 * - `label`: the position's own ordinal label only, for documents that regroup sections
 */
export type MatchKeyName = (typeof MATCH_KEY_NAMES)[number];

/** Caller-supplied key; undefined means the position has no key. */
export type KeyFunction = (position: Position) => string | undefined;

export type PathSelector = MatchKeyName | KeyFunction;

export interface ResolvedMatchKey {
  name: string;
  /** True when keys are unique per tree by construction. */
  uniqueByConstruction: boolean;
  keyOf: KeyFunction;
}

const BUILT_IN: Record<MatchKeyName, ResolvedMatchKey> = {
  ordinalPath: { name: 'ordinalPath', uniqueByConstruction: true, keyOf: (p) => p.ordinalPath },
  itemId: { name: 'itemId', uniqueByConstruction: false, keyOf: (p) => p.itemId },
  label: { name: 'label', uniqueByConstruction: false, keyOf: (p) => p.label },
};

export function isMatchKeyName(value: string): value is MatchKeyName {
  return MATCH_KEY_NAMES.some((name) => name === value);
}

export function resolveMatchKey(selector: PathSelector = 'ordinalPath'): ResolvedMatchKey {
  if (typeof selector === 'function') {
    return { name: selector.name || 'custom', uniqueByConstruction: false, keyOf: selector };
  }
  return BUILT_IN[selector];
}
