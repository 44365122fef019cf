/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { isLevelEnabled } from './logger';
import type { Logger, LogLevel } from './logger';

/**
 * Writes every level to stderr (console.error) so stdout stays free for command output.
 */
export class ConsoleLogger implements Logger {
  private context: string | undefined;
  private readonly level: LogLevel;

  constructor(level: LogLevel = 'info') {
    this.context = undefined;
    this.level = level;
  }

  clone(): ConsoleLogger {
    return new ConsoleLogger(this.level);
  }

  setContext(context: string | undefined): void {
    this.context = context;
  }

  trace(message: string, ...attributes: unknown[]): void {
    this.write('trace', message, attributes);
  }

  debug(message: string, ...attributes: unknown[]): void {
    this.write('debug', message, attributes);
  }

  info(message: string, ...attributes: unknown[]): void {
    this.write('info', message, attributes);
  }

  warn(message: string, ...attributes: unknown[]): void {
    this.write('warn', message, attributes);
  }

  error(message: string, ...attributes: unknown[]): void {
    this.write('error', message, attributes);
  }

  private write(level: LogLevel, message: string, attributes: unknown[]): void {
    if (!isLevelEnabled(level, this.level)) return;
    const tag = level.toUpperCase();
    if (this.context) console.error(tag, this.context, message, ...attributes);
    else console.error(tag, message, ...attributes);
  }
}

/**
 * Clone of `logger` tagged with `context`; a silent logger when none is given, so only
 * callers that pass a logger see output.
 */
export function contextLogger(logger: Logger | undefined, context: string): Logger {
  const scoped = logger ? logger.clone() : new ConsoleLogger('silent');
  scoped.setContext(context);
  return scoped;
}
