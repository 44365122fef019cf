/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { contextLogger } from '../common/console-logger';
import { Decimal, money } from '../common/decimal';
import { AmbiguousMatchError, ConfigError, UnsupportedPhaseError } from '../boq/errors';
import { freezeTree, mapTree, walkPositions } from '../boq/tree';
import type { BoqTree, Position } from '../boq/types';
import { sameUnit } from '../boq/units';
import { resolveMatchKey } from './match-key';
import type {
  ConflictEntry,
  FieldConflict,
  MatchedPair,
  MergedPosition,
  MergeOptions,
  MergeReport,
  MergeResult,
  UnmatchedPricedEntry,
  UnmatchedReferenceEntry,
} from './types';

interface PricedEntry {
  position: Position;
  key: string | undefined;
  consumed: boolean;
}

function toleranceOf(value: Decimal | string | undefined): Decimal {
  if (value === undefined) return Decimal.ZERO;
  const tolerance = typeof value === 'string' ? Decimal.parse(value) : value;
  if (!tolerance || tolerance.isNegative()) {
    throw new ConfigError([`quantityTolerance must be a non-negative decimal, got "${String(value)}"`]);
  }
  return tolerance;
}

function fieldConflicts(reference: Position, priced: Position, tolerance: Decimal): FieldConflict[] {
  const conflicts: FieldConflict[] = [];
  if (reference.unit !== undefined && priced.unit !== undefined && !sameUnit(reference.unit, priced.unit)) {
    conflicts.push({ field: 'unit', reference: reference.unit, priced: priced.unit });
  }
  if (
    reference.quantity !== undefined &&
    priced.quantity !== undefined &&
    reference.quantity.sub(priced.quantity).abs().compare(tolerance) > 0
  ) {
    conflicts.push({ field: 'quantity', reference: reference.quantity.toString(), priced: priced.quantity.toString() });
  }
  return conflicts;
}

/**
 * Merge the prices of `priced` onto `reference`.
 *
 * The merged tree has exactly the sections and positions of `reference`, in its order;
 * pricing is an annotation pass. Positions of `priced` that match nothing are reported,
 * never inserted. Neither input is modified.
 */
export function mergeBoq(reference: BoqTree, priced: BoqTree, options: MergeOptions = {}): MergeResult {
  const logger = contextLogger(options.logger, '[merge]');
  const matchKey = resolveMatchKey(options.matchKey);
  const tolerance = toleranceOf(options.quantityTolerance);

  if (priced.phase !== 'B') {
    throw new UnsupportedPhaseError(`Prices can only be merged from a phase B document, got phase ${priced.phase}`);
  }

  const pricedOrder: PricedEntry[] = [];
  const index = new Map<string, PricedEntry>();
  for (const { position } of walkPositions(priced.root)) {
    const key = matchKey.keyOf(position);
    const entry: PricedEntry = { position, key, consumed: false };
    pricedOrder.push(entry);
    if (key === undefined) continue;
    const existing = index.get(key);
    if (existing) {
      throw new AmbiguousMatchError(key, 'priced', [existing.position.ordinalPath, position.ordinalPath]);
    }
    index.set(key, entry);
  }

  const matched: MatchedPair[] = [];
  const conflicts: ConflictEntry[] = [];
  const unmatchedReference: UnmatchedReferenceEntry[] = [];
  const referenceKeys = new Map<string, string>();
  let referenceCount = 0;

  const root = mapTree(reference.root, (position: Position): MergedPosition => {
    referenceCount++;
    const key = matchKey.keyOf(position);
    if (key !== undefined && !matchKey.uniqueByConstruction) {
      const firstPath = referenceKeys.get(key);
      if (firstPath !== undefined) throw new AmbiguousMatchError(key, 'reference', [firstPath, position.ordinalPath]);
      referenceKeys.set(key, position.ordinalPath);
    }

    const entry = key === undefined ? undefined : index.get(key);
    if (key === undefined || !entry) {
      unmatchedReference.push({ ...(key === undefined ? {} : { key }), path: position.ordinalPath, id: position.id });
      return { ...position, unitPrice: undefined, totalPrice: undefined, match: 'unmatched' };
    }

    entry.consumed = true;
    const source = entry.position;
    const fields = fieldConflicts(position, source, tolerance);
    matched.push({
      key,
      referencePath: position.ordinalPath,
      pricedPath: source.ordinalPath,
      referenceId: position.id,
      pricedId: source.id,
      conflicting: fields.length > 0,
    });
    if (fields.length > 0) {
      conflicts.push({ key, referencePath: position.ordinalPath, pricedPath: source.ordinalPath, fields });
      logger.debug(`conflict at ${position.ordinalPath}: ${fields.map((f) => f.field).join(', ')}`);
    }

    const unitPrice = source.unitPrice;
    const totalPrice =
      unitPrice !== undefined && position.quantity !== undefined
        ? money(position.quantity.mul(unitPrice))
        : source.totalPrice;
    return {
      ...position,
      unitPrice,
      totalPrice,
      match: fields.length > 0 ? 'conflict' : 'matched',
      pricedId: source.id,
    };
  });

  const unmatchedPriced: UnmatchedPricedEntry[] = pricedOrder
    .filter((entry) => !entry.consumed)
    .map(({ position, key }) => ({
      ...(key === undefined ? {} : { key }),
      path: position.ordinalPath,
      id: position.id,
      ...(position.unitPrice === undefined ? {} : { unitPrice: position.unitPrice.toString() }),
    }));

  const report: MergeReport = {
    matchKey: matchKey.name,
    quantityTolerance: tolerance.toString(),
    matched,
    conflicts,
    unmatchedReference,
    unmatchedPriced,
    summary: {
      referencePositions: referenceCount,
      pricedPositions: pricedOrder.length,
      matched: matched.length,
      conflicts: conflicts.length,
      unmatchedReference: unmatchedReference.length,
      unmatchedPriced: unmatchedPriced.length,
    },
  };

  logger.info(
    `merged by ${matchKey.name}: ${matched.length} matched, ${conflicts.length} conflict(s), ` +
      `${unmatchedReference.length} unmatched reference, ${unmatchedPriced.length} unmatched priced`
  );

  return {
    tree: Object.freeze({ phase: 'B', root: freezeTree(root), meta: reference.meta }),
    report,
  };
}
