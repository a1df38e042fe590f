/**
 * Record Sequence Comparer
 * Aligns two record sequences by id (never by position) and reports what
 * was added, removed and changed, down to the individual field.
 */

import type { RecordSequence, TransactionRecord } from '../../shared/transaction-record.js';
import { DuplicateKeyError, type SequenceSide, type UnknownFormatError } from '../domain/errors.js';
import { diffRecordFields, type FieldDiff } from '../domain/record.js';
import type { FormatRegistry } from '../formats/registry.js';
import type { DecodeError } from '../formats/types.js';

export interface ChangedRecord {
  id: string;
  left: TransactionRecord;
  right: TransactionRecord;
  fields: FieldDiff[];
}

export interface DiffReport {
  added: TransactionRecord[];
  removed: TransactionRecord[];
  changed: ChangedRecord[];
  unchangedCount: number;
}

export type CompareResult =
  | { ok: true; report: DiffReport }
  | { ok: false; error: DuplicateKeyError };

// Code-unit order, independent of locale
const byId = (a: { id: string }, b: { id: string }) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0);

function indexById(records: RecordSequence, side: SequenceSide): Map<string, TransactionRecord> {
  const index = new Map<string, TransactionRecord>();
  for (const record of records) {
    if (index.has(record.id)) {
      throw new DuplicateKeyError(record.id, side);
    }
    index.set(record.id, record);
  }
  return index;
}

function buildReport(left: RecordSequence, right: RecordSequence): DiffReport {
  const leftIndex = indexById(left, 'left');
  const rightIndex = indexById(right, 'right');

  const report: DiffReport = { added: [], removed: [], changed: [], unchangedCount: 0 };

  for (const [id, leftRecord] of leftIndex) {
    const rightRecord = rightIndex.get(id);
    if (!rightRecord) {
      report.removed.push(leftRecord);
      continue;
    }
    const fields = diffRecordFields(leftRecord, rightRecord);
    if (fields.length === 0) {
      report.unchangedCount++;
    } else {
      report.changed.push({ id, left: leftRecord, right: rightRecord, fields });
    }
  }

  for (const [id, rightRecord] of rightIndex) {
    if (!leftIndex.has(id)) {
      report.added.push(rightRecord);
    }
  }

  report.added.sort(byId);
  report.removed.sort(byId);
  report.changed.sort(byId);
  return report;
}

export function compareSequences(left: RecordSequence, right: RecordSequence): CompareResult {
  try {
    return { ok: true, report: buildReport(left, right) };
  } catch (error) {
    if (error instanceof DuplicateKeyError) {
      return { ok: false, error };
    }
    throw error;
  }
}

export function hasDifferences(report: DiffReport): boolean {
  return report.added.length > 0 || report.removed.length > 0 || report.changed.length > 0;
}

export interface EncodedInput {
  bytes: Uint8Array;
  format: string;
}

export type EncodedCompareResult =
  | { ok: true; report: DiffReport; leftCount: number; rightCount: number }
  | { ok: false; side?: SequenceSide; error: DecodeError | DuplicateKeyError | UnknownFormatError };

/**
 * Decode both inputs through the registry, then compare
 */
export function compareEncoded(
  left: EncodedInput,
  right: EncodedInput,
  registry: FormatRegistry
): EncodedCompareResult {
  const sides: Array<[SequenceSide, EncodedInput]> = [
    ['left', left],
    ['right', right],
  ];
  const decoded: RecordSequence[] = [];

  for (const [side, input] of sides) {
    const codec = registry.resolve(input.format);
    if (!codec.ok) {
      return { ok: false, side, error: codec.error };
    }
    const result = codec.codec.decode(input.bytes);
    if (!result.ok) {
      return { ok: false, side, error: result.error };
    }
    decoded.push(result.records);
  }

  const [leftRecords = [], rightRecords = []] = decoded;
  const compared = compareSequences(leftRecords, rightRecords);
  if (!compared.ok) {
    return { ok: false, side: compared.error.side, error: compared.error };
  }
  return {
    ok: true,
    report: compared.report,
    leftCount: leftRecords.length,
    rightCount: rightRecords.length,
  };
}
