/**
 * Transaction record construction, equality and field-level diffing
 */

import {
  RECORD_FIELDS,
  TransactionRecordSchema,
  type RawRecordFields,
  type RecordField,
  type RecordFieldValue,
  type TransactionRecord,
} from '../../shared/transaction-record.js';
import { ValidationError } from './errors.js';
import { currencyScale, parseAmount } from './money.js';

export type RecordValidationResult =
  | { ok: true; record: TransactionRecord }
  | { ok: false; error: ValidationError };

export interface FieldDiff {
  field: RecordField;
  left: RecordFieldValue;
  right: RecordFieldValue;
}

const CURRENCY_PATTERN = /^[A-Z]{3}$/;

/**
 * Validate raw field values. When several fields are invalid the first one
 * in canonical order is reported; a textual amount is only checked once the
 * currency (which fixes its scale) is known to be valid.
 */
export function validateRecord(raw: RawRecordFields): RecordValidationResult {
  const failures = new Map<string, string>();

  let amount = 0n;
  if (typeof raw.amount === 'bigint') {
    amount = raw.amount;
  } else if (CURRENCY_PATTERN.test(raw.currency)) {
    const parsed = parseAmount(raw.amount, currencyScale(raw.currency));
    if (parsed.ok) {
      amount = parsed.minor;
    } else {
      failures.set('amount', parsed.reason);
    }
  }

  const result = TransactionRecordSchema.safeParse({ ...raw, amount });
  if (!result.success) {
    for (const issue of result.error.issues) {
      const field = String(issue.path[0] ?? 'record');
      if (!failures.has(field)) {
        failures.set(field, issue.message);
      }
    }
  }

  for (const field of RECORD_FIELDS) {
    const reason = failures.get(field);
    if (reason !== undefined) {
      return { ok: false, error: new ValidationError(field, reason) };
    }
  }

  if (!result.success) {
    const [issue] = result.error.issues;
    return { ok: false, error: new ValidationError('record', issue?.message ?? 'invalid record') };
  }
  return { ok: true, record: Object.freeze(result.data) };
}

/**
 * Build an immutable record or throw ValidationError
 */
export function createRecord(raw: RawRecordFields): TransactionRecord {
  const result = validateRecord(raw);
  if (!result.ok) {
    throw result.error;
  }
  return result.record;
}

export function diffRecordFields(left: TransactionRecord, right: TransactionRecord): FieldDiff[] {
  const diffs: FieldDiff[] = [];
  for (const field of RECORD_FIELDS) {
    if (field === 'id') continue;
    if (left[field] !== right[field]) {
      diffs.push({ field, left: left[field], right: right[field] });
    }
  }
  return diffs;
}

/**
 * Field-wise structural equality
 */
export function recordsEqual(left: TransactionRecord, right: TransactionRecord): boolean {
  return left.id === right.id && diffRecordFields(left, right).length === 0;
}
