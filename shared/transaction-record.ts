/**
 * Zod schemas for the canonical bank transaction record
 * Every codec decodes into this shape and encodes from it
 */
import { z } from 'zod';
import { INT64_MAX, INT64_MIN } from '../server/domain/money.js';
import { isCalendarDate, isIsoDateFormat } from '../server/domain/calendar.js';

export const OPERATION_TYPES = [
  'DEPOSIT',
  'TRANSFER',
  'WITHDRAWAL',
  'DEBIT',
  'CREDIT',
  'FEE',
  'ADJUSTMENT',
] as const;

export type OperationType = (typeof OPERATION_TYPES)[number];

/**
 * Canonical field order, shared by the csv header, the txt block layout
 * and the binary record layout
 */
export const RECORD_FIELDS = [
  'id',
  'occurredAt',
  'amount',
  'currency',
  'counterparty',
  'description',
  'operationType',
] as const;

export type RecordField = (typeof RECORD_FIELDS)[number];

export function isRecordField(value: string): value is RecordField {
  return (RECORD_FIELDS as readonly string[]).includes(value);
}

/**
 * Column / label names as they appear in the text formats
 */
export const FIELD_LABELS: Readonly<Record<RecordField, string>> = {
  id: 'ID',
  occurredAt: 'OCCURRED_AT',
  amount: 'AMOUNT',
  currency: 'CURRENCY',
  counterparty: 'COUNTERPARTY',
  description: 'DESCRIPTION',
  operationType: 'OPERATION_TYPE',
};

// Length prefixes in the binary layout are unsigned 16-bit
export const MAX_TEXT_BYTES = 0xffff;

const CONTROL_CHARS = /[\u0000-\u001f\u007f]/;
const CONTROL_CHARS_EXCEPT_NL_TAB = /[\u0000-\u0008\u000b-\u001f\u007f]/;

// A lone surrogate has no UTF-8 form and would come back from any codec as U+FFFD
const UNPAIRED_SURROGATE = /\p{Cs}/u;

const withinByteLimit = (value: string) => Buffer.byteLength(value, 'utf8') <= MAX_TEXT_BYTES;
const isWellFormed = (value: string) => !UNPAIRED_SURROGATE.test(value);

const FreeTextSchema = z
  .string()
  .refine((value) => !CONTROL_CHARS_EXCEPT_NL_TAB.test(value), {
    message: 'must not contain control characters other than newline and tab',
  })
  .refine(isWellFormed, { message: 'must not contain unpaired surrogates' })
  .refine(withinByteLimit, { message: `must not exceed ${MAX_TEXT_BYTES} bytes` });

export const OperationTypeSchema = z.enum(OPERATION_TYPES, {
  errorMap: () => ({ message: 'unknown operation type' }),
});

export const TransactionRecordSchema = z.object({
  id: z
    .string()
    .min(1, 'must not be empty')
    .refine((value) => value.trim() === value, {
      message: 'must not have leading or trailing whitespace',
    })
    .refine((value) => !CONTROL_CHARS.test(value), {
      message: 'must not contain control characters',
    })
    .refine(isWellFormed, { message: 'must not contain unpaired surrogates' })
    .refine(withinByteLimit, { message: `must not exceed ${MAX_TEXT_BYTES} bytes` }),
  occurredAt: z
    .string()
    .refine(isIsoDateFormat, { message: 'must be a YYYY-MM-DD date' })
    .refine(isCalendarDate, { message: 'is not a valid calendar date' }),
  amount: z
    .bigint()
    .gte(INT64_MIN, 'is out of range for a 64-bit amount')
    .lte(INT64_MAX, 'is out of range for a 64-bit amount'),
  currency: z.string().regex(/^[A-Z]{3}$/, 'must be a 3-letter uppercase code'),
  counterparty: FreeTextSchema,
  description: FreeTextSchema,
  operationType: OperationTypeSchema,
});

export type TransactionRecord = Readonly<z.infer<typeof TransactionRecordSchema>>;

export type RecordSequence = readonly TransactionRecord[];

/**
 * Field values as they arrive from a codec, before validation.
 * Text formats hand over the amount as decimal text, the binary
 * format as minor units.
 */
export interface RawRecordFields {
  id: string;
  occurredAt: string;
  amount: string | bigint;
  currency: string;
  counterparty: string;
  description: string;
  operationType: string;
}

export type RecordFieldValue = TransactionRecord[RecordField];
