/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause

  Fixed-point decimal on bigint units, so quantity × price never drifts.
*/

const DECIMAL_PATTERN = /^([+-])?(\d*)(?:[.,](\d*))?$/;

function pow10(exponent: number): bigint {
  return 10n ** BigInt(exponent);
}

export class Decimal {
  static readonly ZERO = new Decimal(0n, 0);

  /** `value = units / 10^scale` */
  private constructor(
    readonly units: bigint,
    readonly scale: number
  ) {}

  /**
   * Parse a plain decimal literal ("10", "2.50", "0,125", "-3").
   * Accepts one '.' or ',' separator; returns undefined for anything else.
   */
  static parse(text: string): Decimal | undefined {
    const match = DECIMAL_PATTERN.exec(text.trim());
    if (!match) return undefined;
    const sign = match[1];
    const whole = match[2] ?? '';
    const fraction = match[3] ?? '';
    if (!whole && !fraction) return undefined;
    const magnitude = BigInt((whole || '0') + fraction);
    return new Decimal(sign === '-' ? -magnitude : magnitude, fraction.length);
  }

  /** Like parse, but throws a RangeError on malformed input. */
  static of(text: string): Decimal {
    const value = Decimal.parse(text);
    if (!value) throw new RangeError(`Not a decimal: "${text}"`);
    return value;
  }

  isZero(): boolean {
    return this.units === 0n;
  }

  isNegative(): boolean {
    return this.units < 0n;
  }

  abs(): Decimal {
    return this.isNegative() ? new Decimal(-this.units, this.scale) : this;
  }

  add(other: Decimal): Decimal {
    const [a, b, scale] = align(this, other);
    return new Decimal(a + b, scale);
  }

  sub(other: Decimal): Decimal {
    const [a, b, scale] = align(this, other);
    return new Decimal(a - b, scale);
  }

  mul(other: Decimal): Decimal {
    return new Decimal(this.units * other.units, this.scale + other.scale);
  }

  compare(other: Decimal): -1 | 0 | 1 {
    const [a, b] = align(this, other);
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
  }

  /** Numeric equality; 2.5 equals 2.50. */
  equals(other: Decimal): boolean {
    return this.compare(other) === 0;
  }

  /** Round half away from zero to `scale` fraction digits. */
  round(scale: number): Decimal {
    if (scale >= this.scale) {
      return new Decimal(this.units * pow10(scale - this.scale), scale);
    }
    const factor = pow10(this.scale - scale);
    const magnitude = this.units < 0n ? -this.units : this.units;
    let quotient = magnitude / factor;
    if ((magnitude % factor) * 2n >= factor) quotient += 1n;
    return new Decimal(this.units < 0n ? -quotient : quotient, scale);
  }

  toString(): string {
    const negative = this.units < 0n;
    const digits = (negative ? -this.units : this.units).toString().padStart(this.scale + 1, '0');
    const whole = digits.slice(0, digits.length - this.scale);
    const fraction = digits.slice(digits.length - this.scale);
    return (negative ? '-' : '') + (this.scale > 0 ? `${whole}.${fraction}` : whole);
  }

  toJSON(): string {
    return this.toString();
  }
}

function align(a: Decimal, b: Decimal): [bigint, bigint, number] {
  const scale = Math.max(a.scale, b.scale);
  return [a.units * pow10(scale - a.scale), b.units * pow10(scale - b.scale), scale];
}

/** Cent precision, half-up. */
export function money(value: Decimal): Decimal {
  return value.round(2);
}
