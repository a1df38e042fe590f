/**
 * Format conversion: decode with the source codec, encode with the target.
 * The canonical record sequence is the only intermediate form.
 */

import type { RecordSequence } from '../../shared/transaction-record.js';
import type { UnknownFormatError } from '../domain/errors.js';
import { createDefaultRegistry, type FormatRegistry } from '../formats/registry.js';
import type { DecodeError } from '../formats/types.js';

export type ConvertResult =
  | { ok: true; output: Buffer; records: RecordSequence }
  | { ok: false; error: DecodeError | UnknownFormatError };

export function convert(
  input: Uint8Array,
  sourceFormat: string,
  targetFormat: string,
  registry: FormatRegistry = createDefaultRegistry()
): ConvertResult {
  const source = registry.resolve(sourceFormat);
  if (!source.ok) {
    return source;
  }
  const target = registry.resolve(targetFormat);
  if (!target.ok) {
    return target;
  }

  const decoded = source.codec.decode(input);
  if (!decoded.ok) {
    return decoded;
  }
  return { ok: true, output: target.codec.encode(decoded.records), records: decoded.records };
}
