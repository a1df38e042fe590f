import type { RecordSequence } from '../../shared/transaction-record.js';
import type { ParseError, ValidationError } from '../domain/errors.js';

export type DecodeError = ParseError | ValidationError;

export type DecodeResult =
  | { ok: true; records: RecordSequence }
  | { ok: false; error: DecodeError };

/**
 * A decode/encode pair for one on-disk representation.
 * Input and output are raw bytes so that text and binary formats share
 * one contract; text codecs read and write UTF-8.
 */
export interface RecordCodec {
  readonly format: string;
  readonly description: string;
  readonly binary: boolean;
  decode(input: Uint8Array): DecodeResult;
  encode(records: RecordSequence): Buffer;
}
