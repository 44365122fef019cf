/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

export * from './boq';
export * from './parser';
export * from './merge';
export * from './export';
export { Decimal, money } from './common/decimal';
export { ConsoleLogger, contextLogger } from './common/console-logger';
export { LOG_LEVELS, isLevelEnabled } from './common/logger';
export type { Logger, LogLevel } from './common/logger';
export { resolveConfig, BoqConfigSchema } from './common/config';
export type { BoqConfig, BoqConfigInput } from './common/config';
