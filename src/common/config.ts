/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause

  Options handed to the core by the command line or a service, validated once.
*/

import { z } from 'zod';
import { ConfigError } from '../boq/errors';
import type { Phase } from '../boq/types';
import { MATCH_KEY_NAMES } from '../merge/match-key';
import type { MatchKeyName } from '../merge/match-key';
import { Decimal } from './decimal';
import { LOG_LEVELS } from './logger';
import type { LogLevel } from './logger';

const PHASE_ALIASES = new Map<string, Phase>([
  ['a', 'A'],
  ['x83', 'A'],
  ['83', 'A'],
  ['b', 'B'],
  ['x84', 'B'],
  ['84', 'B'],
]);

const phaseSchema = z
  .string()
  .transform((value, ctx): Phase => {
    const phase = PHASE_ALIASES.get(value.trim().toLowerCase());
    if (!phase) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unknown phase "${value}", expected A or B` });
      return z.NEVER;
    }
    return phase;
  });

const nonNegativeDecimal = (label: string) =>
  z.string().transform((value, ctx): Decimal => {
    const parsed = Decimal.parse(value);
    if (!parsed || parsed.isNegative()) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${label} must be a non-negative decimal, got "${value}"` });
      return z.NEVER;
    }
    return parsed;
  });

export const BoqConfigSchema = z.object({
  phase: phaseSchema.optional(),
  matchKey: z.enum(MATCH_KEY_NAMES).default('ordinalPath'),
  quantityTolerance: nonNegativeDecimal('quantityTolerance').default('0'),
  vatRate: nonNegativeDecimal('vatRate').default('0.19'),
  logLevel: z.enum(LOG_LEVELS).default('info'),
});

export type BoqConfigInput = z.input<typeof BoqConfigSchema>;

export interface BoqConfig {
  phase?: Phase;
  matchKey: MatchKeyName;
  quantityTolerance: Decimal;
  vatRate: Decimal;
  logLevel: LogLevel;
}

const CONFIG_KEYS = ['phase', 'matchKey', 'quantityTolerance', 'vatRate', 'logLevel'] as const;

type ConfigKey = (typeof CONFIG_KEYS)[number];

const ENV_KEYS: Record<ConfigKey, string> = {
  phase: 'GAEB_PHASE',
  matchKey: 'GAEB_MATCH_KEY',
  quantityTolerance: 'GAEB_QUANTITY_TOLERANCE',
  vatRate: 'GAEB_VAT_RATE',
  logLevel: 'GAEB_LOG_LEVEL',
};

/**
 * Validate explicit options, falling back to GAEB_* environment variables for
 * anything not given. Throws ConfigError listing every invalid option.
 */
export function resolveConfig(
  input: Partial<Record<ConfigKey, string | undefined>> = {},
  env: NodeJS.ProcessEnv = process.env
): BoqConfig {
  const merged: Record<string, string> = {};
  for (const key of CONFIG_KEYS) {
    const value = input[key] ?? env[ENV_KEYS[key]];
    if (value !== undefined && value !== '') merged[key] = value;
  }
  const result = BoqConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`)
    );
  }
  return result.data;
}
