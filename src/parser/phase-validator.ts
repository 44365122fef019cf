/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { contextLogger } from '../common/console-logger';
import { Decimal, money } from '../common/decimal';
import { FieldError, FieldFormatError, ValidationError } from '../boq/errors';
import type { PositionField } from '../boq/errors';
import { freezeTree, mapTree, parseOrdinal } from '../boq/tree';
import type { BoqTree, DraftPosition, DraftTree, Phase, Position } from '../boq/types';
import { normalizeUnit } from '../boq/units';
import type { StageOptions } from './types';

export const DEFAULT_VAT_RATE = Decimal.of('0.19');

export interface ValidatorOptions extends StageOptions {
  /** VAT rate stamped on every position; 0.19 when omitted. */
  vatRate?: Decimal;
}

/** Numeric field, parsed; undefined (and a recorded violation) when malformed or negative. */
function readDecimal(
  position: DraftPosition,
  field: PositionField,
  raw: string | undefined,
  violations: FieldError[]
): Decimal | undefined {
  if (raw === undefined) return undefined;
  const value = Decimal.parse(raw);
  if (!value || value.isNegative()) {
    violations.push(new FieldFormatError(position.ordinalPath, field, raw));
    return undefined;
  }
  return value;
}

function checkPhaseRules(
  phase: Phase,
  position: DraftPosition,
  parsed: { unitPrice?: Decimal; totalPrice?: Decimal },
  violations: FieldError[]
): void {
  const { fields, ordinalPath } = position;
  if (phase === 'A') {
    if (fields.quantity === undefined) {
      violations.push(new FieldError(ordinalPath, 'quantity', 'is required in an unpriced (phase A) document'));
    }
    if (fields.unit === undefined) {
      violations.push(new FieldError(ordinalPath, 'unit', 'is required in an unpriced (phase A) document'));
    }
    if (parsed.unitPrice && !parsed.unitPrice.isZero()) {
      violations.push(
        new FieldError(ordinalPath, 'unitPrice', `must be absent or zero in an unpriced (phase A) document, found ${fields.unitPrice}`)
      );
    }
    if (parsed.totalPrice && !parsed.totalPrice.isZero()) {
      violations.push(
        new FieldError(ordinalPath, 'totalPrice', `must be absent or zero in an unpriced (phase A) document, found ${fields.totalPrice}`)
      );
    }
  } else if (fields.unitPrice === undefined) {
    violations.push(new FieldError(ordinalPath, 'unitPrice', 'is required in a priced (phase B) document'));
  }
}

/**
 * Apply the phase rules to every position and parse numeric fields as fixed-point decimals.
 * All violations of the tree are collected before one ValidationError is thrown.
 * The returned tree is frozen.
 */
export function validateBoqTree(draft: DraftTree, options: ValidatorOptions = {}): BoqTree {
  const logger = contextLogger(options.logger, '[validator]');
  const vatRate = options.vatRate ?? DEFAULT_VAT_RATE;
  const violations: FieldError[] = [];
  let count = 0;

  const root = mapTree(draft.root, (draftPosition: DraftPosition): Position => {
    count++;
    const { fields } = draftPosition;
    const quantity = readDecimal(draftPosition, 'quantity', fields.quantity, violations);
    const unitPrice = readDecimal(draftPosition, 'unitPrice', fields.unitPrice, violations);
    const documentTotal = readDecimal(draftPosition, 'totalPrice', fields.totalPrice, violations);
    checkPhaseRules(draft.phase, draftPosition, { unitPrice, totalPrice: documentTotal }, violations);

    const priced = draft.phase === 'B' ? unitPrice : undefined;
    let totalPrice: Decimal | undefined;
    if (priced && quantity) totalPrice = money(quantity.mul(priced));
    else if (draft.phase === 'B' && documentTotal) totalPrice = money(documentTotal);

    return {
      kind: 'position',
      id: draftPosition.id,
      itemId: fields.itemId,
      label: draftPosition.label,
      ordinalPath: draftPosition.ordinalPath,
      ozPath: Object.freeze(parseOrdinal(draftPosition.ordinalPath)),
      shortText: fields.shortText,
      longText: fields.longText,
      unit: fields.unit,
      unitCode: fields.unit === undefined ? undefined : normalizeUnit(fields.unit),
      quantity,
      unitPrice: priced,
      totalPrice,
      vatRate,
    };
  });

  if (violations.length > 0) {
    logger.warn(`${violations.length} violation(s) in ${count} position(s)`);
    throw new ValidationError(violations);
  }
  logger.debug(`validated ${count} position(s) for phase ${draft.phase}`);
  return Object.freeze({ phase: draft.phase, root: freezeTree(root), meta: Object.freeze({ ...draft.meta }) });
}
