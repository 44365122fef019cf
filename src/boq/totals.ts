/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { Decimal, money } from '../common/decimal';
import { walkPositions } from './tree';
import type { PositionBase, Section } from './types';

type PricedLike = PositionBase & { totalPrice?: Decimal; vatRate: Decimal };

export interface SectionTotals {
  net: Decimal;
  gross: Decimal;
  /** Positions that carry a total. */
  pricedCount: number;
}

const ONE = Decimal.of('1');

/** Gross for one net amount: net × (1 + vat), cents, half-up. */
export function grossOf(net: Decimal, vatRate: Decimal): Decimal {
  return money(net.mul(ONE.add(vatRate)));
}

/**
 * Net and gross sums over every position below `section`.
 * Gross is rounded per position before summing, as on an invoice.
 */
export function sectionTotals<P extends PricedLike>(section: Section<P>): SectionTotals {
  let net = Decimal.ZERO;
  let gross = Decimal.ZERO;
  let pricedCount = 0;
  for (const { position } of walkPositions(section)) {
    if (position.totalPrice === undefined) continue;
    net = net.add(position.totalPrice);
    gross = gross.add(grossOf(position.totalPrice, position.vatRate));
    pricedCount++;
  }
  return { net: money(net), gross: money(gross), pricedCount };
}
