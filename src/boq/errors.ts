/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

export const BOQ_ERROR_CODES = {
  MALFORMED_DOCUMENT: 'BOQ_MALFORMED_DOCUMENT',
  UNSUPPORTED_PHASE: 'BOQ_UNSUPPORTED_PHASE',
  STRUCTURAL: 'BOQ_STRUCTURAL',
  UNBALANCED_STRUCTURE: 'BOQ_UNBALANCED_STRUCTURE',
  DUPLICATE_PATH: 'BOQ_DUPLICATE_PATH',
  FIELD_RULE: 'BOQ_FIELD_RULE',
  FIELD_FORMAT: 'BOQ_FIELD_FORMAT',
  VALIDATION_FAILED: 'BOQ_VALIDATION_FAILED',
  AMBIGUOUS_MATCH: 'BOQ_AMBIGUOUS_MATCH',
  INVALID_CONFIG: 'BOQ_INVALID_CONFIG',
  PERSISTENCE_BLOCKED: 'BOQ_PERSISTENCE_BLOCKED',
  SOURCE_UNREADABLE: 'BOQ_SOURCE_UNREADABLE',
} as const;

export type BoqErrorCode = (typeof BOQ_ERROR_CODES)[keyof typeof BOQ_ERROR_CODES];

/**
 * Base of every error raised while reading, building, validating or merging a BoQ.
 * `path` is the ordinal path of the offending node, when one is known.
 */
export class BoqError extends Error {
  readonly code: BoqErrorCode;
  readonly path: string | undefined;

  constructor(code: BoqErrorCode, message: string, path?: string) {
    super(message);
    this.name = 'BoqError';
    this.code = code;
    this.path = path;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

function at(path: string | undefined): string {
  return path ? ` (at ${path})` : '';
}

/** A BoQ file that cannot be opened or read. `reason` is the system error code when there is one. */
export class SourceUnreadableError extends BoqError {
  readonly file: string;
  readonly reason: string;

  constructor(file: string, reason: string) {
    super(BOQ_ERROR_CODES.SOURCE_UNREADABLE, `Cannot read ${file} (${reason})`);
    this.name = 'SourceUnreadableError';
    this.file = file;
    this.reason = reason;
  }
}

/** The XML itself cannot be parsed, or it is not a GAEB document. */
export class MalformedDocumentError extends BoqError {
  readonly line: number | undefined;
  readonly column: number | undefined;

  constructor(message: string, path?: string, line?: number, column?: number) {
    super(BOQ_ERROR_CODES.MALFORMED_DOCUMENT, `Malformed document: ${message}${at(path)}`, path);
    this.name = 'MalformedDocumentError';
    this.line = line;
    this.column = column;
  }
}

export class UnsupportedPhaseError extends BoqError {
  constructor(message: string) {
    super(BOQ_ERROR_CODES.UNSUPPORTED_PHASE, message);
    this.name = 'UnsupportedPhaseError';
  }
}

/** Nesting is broken: unmatched open/close, a second root, a node without a label. */
export class StructuralError extends BoqError {
  constructor(message: string, path?: string, code: BoqErrorCode = BOQ_ERROR_CODES.STRUCTURAL) {
    super(code, `${message}${at(path)}`, path);
    this.name = 'StructuralError';
  }
}

export class UnbalancedStructureError extends StructuralError {
  constructor(message: string, path?: string) {
    super(message, path, BOQ_ERROR_CODES.UNBALANCED_STRUCTURE);
    this.name = 'UnbalancedStructureError';
  }
}

export class DuplicatePathError extends BoqError {
  constructor(path: string, firstId: string, secondId: string) {
    super(
      BOQ_ERROR_CODES.DUPLICATE_PATH,
      `Ordinal path ${path} is used by two positions (${firstId} and ${secondId})`,
      path
    );
    this.name = 'DuplicatePathError';
  }
}

export type PositionField = 'quantity' | 'unit' | 'unitPrice' | 'totalPrice';

/** One field of one position breaks a phase rule. */
export class FieldError extends BoqError {
  readonly field: PositionField;

  constructor(path: string, field: PositionField, message: string, code: BoqErrorCode = BOQ_ERROR_CODES.FIELD_RULE) {
    super(code, `${path} ${field}: ${message}`, path);
    this.name = 'FieldError';
    this.field = field;
  }
}

/** A numeric field is not a well-formed non-negative decimal. */
export class FieldFormatError extends FieldError {
  readonly value: string;

  constructor(path: string, field: PositionField, value: string) {
    super(path, field, `"${value}" is not a non-negative decimal`, BOQ_ERROR_CODES.FIELD_FORMAT);
    this.name = 'FieldFormatError';
    this.value = value;
  }
}

/** Every field violation of one tree, collected in a single pass. */
export class ValidationError extends BoqError {
  readonly violations: readonly FieldError[];

  constructor(violations: FieldError[]) {
    const lines = violations.map((v) => `  - ${v.message}`).join('\n');
    super(
      BOQ_ERROR_CODES.VALIDATION_FAILED,
      `Validation failed with ${violations.length} violation(s):\n${lines}`,
      violations[0]?.path
    );
    this.name = 'ValidationError';
    this.violations = violations;
  }
}

export type MatchSide = 'reference' | 'priced';

export class AmbiguousMatchError extends BoqError {
  readonly key: string;
  readonly side: MatchSide;
  readonly paths: readonly string[];

  constructor(key: string, side: MatchSide, paths: string[]) {
    super(
      BOQ_ERROR_CODES.AMBIGUOUS_MATCH,
      `Match key "${key}" resolves to more than one ${side} position: ${paths.join(', ')}`,
      paths[0]
    );
    this.name = 'AmbiguousMatchError';
    this.key = key;
    this.side = side;
    this.paths = paths;
  }
}

export class ConfigError extends BoqError {
  readonly issues: readonly string[];

  constructor(issues: string[]) {
    super(BOQ_ERROR_CODES.INVALID_CONFIG, `Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export class PersistenceBlockedError extends BoqError {
  readonly reasons: readonly string[];

  constructor(reasons: string[]) {
    super(BOQ_ERROR_CODES.PERSISTENCE_BLOCKED, `Write blocked by policy: ${reasons.join('; ')}`);
    this.name = 'PersistenceBlockedError';
    this.reasons = reasons;
  }
}
