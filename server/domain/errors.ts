/**
 * Ledger Format Error Classification
 * Every failure the codecs, comparer and tools can report, with the
 * location data a caller needs to point at the offending input.
 */

export enum LedgerErrorCode {
  PARSE_ERROR = 'PARSE_ERROR',
  UNSUPPORTED_VERSION = 'UNSUPPORTED_VERSION',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  DUPLICATE_KEY = 'DUPLICATE_KEY',
  UNKNOWN_FORMAT = 'UNKNOWN_FORMAT',
  DUPLICATE_FORMAT = 'DUPLICATE_FORMAT',
  IO_ERROR = 'IO_ERROR',
  CONFIG_ERROR = 'CONFIG_ERROR',
}

/**
 * Base class for all ledger format errors
 */
export abstract class LedgerFormatError extends Error {
  abstract readonly code: LedgerErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

export type LocationUnit = 'line' | 'offset';

export interface ParseErrorDetails {
  unit?: LocationUnit;
  field?: string;
  cause?: ValidationError;
}

/**
 * Syntax error at a known place in the input.
 * `location` is a 1-based line number for text formats and a byte offset
 * for the binary format.
 */
export class ParseError extends LedgerFormatError {
  readonly code: LedgerErrorCode = LedgerErrorCode.PARSE_ERROR;
  readonly unit: LocationUnit;
  readonly field?: string;

  constructor(
    public readonly location: number,
    public readonly reason: string,
    details: ParseErrorDetails = {}
  ) {
    const unit = details.unit ?? 'line';
    const where = details.field ? ` (${details.field})` : '';
    super(`${unit} ${location}: ${reason}${where}`, details.cause ? { cause: details.cause } : undefined);
    this.unit = unit;
    this.field = details.field;
  }
}

export class UnsupportedVersionError extends ParseError {
  override readonly code = LedgerErrorCode.UNSUPPORTED_VERSION;

  constructor(public readonly version: number) {
    super(0, 'unsupported version', { unit: 'offset' });
    this.message = `offset 0: unsupported version ${version}`;
  }
}

/**
 * Syntactically valid value that breaks a record rule
 */
export class ValidationError extends LedgerFormatError {
  readonly code = LedgerErrorCode.VALIDATION_ERROR;

  constructor(
    public readonly field: string,
    public readonly reason: string,
    public readonly offset?: number
  ) {
    super(
      offset === undefined
        ? `Invalid ${field}: ${reason}`
        : `Invalid ${field} in record at offset ${offset}: ${reason}`
    );
  }
}

export type SequenceSide = 'left' | 'right';

export class DuplicateKeyError extends LedgerFormatError {
  readonly code = LedgerErrorCode.DUPLICATE_KEY;

  constructor(
    public readonly id: string,
    public readonly side: SequenceSide
  ) {
    super(`Duplicate id "${id}" in ${side} sequence`);
  }
}

export class UnknownFormatError extends LedgerFormatError {
  readonly code = LedgerErrorCode.UNKNOWN_FORMAT;

  constructor(
    public readonly format: string,
    public readonly known: readonly string[]
  ) {
    super(`Unknown format "${format}" (expected one of: ${known.join(', ')})`);
  }
}

/**
 * A format name or alias registered twice
 */
export class DuplicateFormatError extends LedgerFormatError {
  readonly code = LedgerErrorCode.DUPLICATE_FORMAT;

  constructor(
    public readonly format: string,
    public readonly alias: boolean
  ) {
    super(alias ? `Format alias "${format}" is already registered` : `Format "${format}" is already registered`);
  }
}

export class IoError extends LedgerFormatError {
  readonly code = LedgerErrorCode.IO_ERROR;

  constructor(
    public readonly path: string,
    message: string,
    cause?: unknown
  ) {
    super(`${path}: ${message}`, { cause });
  }
}

export class ConfigError extends LedgerFormatError {
  readonly code = LedgerErrorCode.CONFIG_ERROR;

  constructor(public readonly issues: readonly string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
  }
}

/**
 * One-line, user-facing description of any error
 */
export function describeError(error: unknown): string {
  if (error instanceof LedgerFormatError) {
    return `${error.code} ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
