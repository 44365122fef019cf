/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { describe, it, expect } from 'vitest';
import { ConfigError } from '../boq/errors';
import { resolveConfig } from './config';

describe('resolveConfig', () => {
  it('applies defaults', () => {
    const config = resolveConfig({}, {});
    expect(config.phase).toBeUndefined();
    expect(config.matchKey).toBe('ordinalPath');
    expect(config.quantityTolerance.toString()).toBe('0');
    expect(config.vatRate.toString()).toBe('0.19');
    expect(config.logLevel).toBe('info');
  });

  it('accepts phase aliases', () => {
    expect(resolveConfig({ phase: 'x83' }, {}).phase).toBe('A');
    expect(resolveConfig({ phase: '84' }, {}).phase).toBe('B');
    expect(resolveConfig({ phase: 'B' }, {}).phase).toBe('B');
  });

  it('falls back to the environment and lets explicit options win', () => {
    const env = { GAEB_PHASE: 'X84', GAEB_MATCH_KEY: 'itemId', GAEB_QUANTITY_TOLERANCE: '0,5', GAEB_LOG_LEVEL: 'debug' };
    const config = resolveConfig({ matchKey: 'label' }, env);
    expect(config.phase).toBe('B');
    expect(config.matchKey).toBe('label');
    expect(config.quantityTolerance.toString()).toBe('0.5');
    expect(config.logLevel).toBe('debug');
  });

  it('ignores empty values', () => {
    expect(resolveConfig({ vatRate: '' }, { GAEB_VAT_RATE: '' }).vatRate.toString()).toBe('0.19');
  });

  it('lists every invalid option', () => {
    try {
      resolveConfig({ phase: 'C', quantityTolerance: '-1', matchKey: 'position' }, {});
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      if (err instanceof ConfigError) {
        expect(err.issues).toHaveLength(3);
        expect(err.issues[0]).toBe('phase: unknown phase "C", expected A or B');
        expect(err.issues[1].startsWith('matchKey: ')).toBe(true);
        expect(err.issues[2]).toBe('quantityTolerance: quantityTolerance must be a non-negative decimal, got "-1"');
      }
    }
  });
});
