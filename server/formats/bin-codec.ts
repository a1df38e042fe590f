/**
 * Binary Record Codec
 *
 * Layout (all integers little-endian):
 *   header   magic "BTXR" (4) | version (1) | record count (u32)
 *   record   id (u16 length + UTF-8) | occurred_at (i32 days since 1970-01-01)
 *            | amount (i64 minor units) | currency (3 ASCII) | operation type (u8)
 *            | counterparty (u16 length + UTF-8) | description (u16 length + UTF-8)
 *
 * The version byte is a hard compatibility contract: any version other than
 * the ones listed in SUPPORTED_VERSIONS is rejected before a record is read.
 */

import {
  OPERATION_TYPES,
  type OperationType,
  type RecordSequence,
  type TransactionRecord,
} from '../../shared/transaction-record.js';
import { fromEpochDay, toEpochDay } from '../domain/calendar.js';
import { ParseError, UnsupportedVersionError, ValidationError } from '../domain/errors.js';
import { validateRecord } from '../domain/record.js';
import type { DecodeResult, RecordCodec } from './types.js';

export const BIN_MAGIC = Buffer.from('BTXR', 'ascii');
export const BIN_VERSION = 1;
export const SUPPORTED_VERSIONS: readonly number[] = [BIN_VERSION];

const HEADER_SIZE = BIN_MAGIC.length + 1 + 4;
const CURRENCY_SIZE = 3;

// Tag values are persisted; append new operation types, never reorder
const OPERATION_TAGS: Readonly<Record<OperationType, number>> = {
  DEPOSIT: 0,
  TRANSFER: 1,
  WITHDRAWAL: 2,
  DEBIT: 3,
  CREDIT: 4,
  FEE: 5,
  ADJUSTMENT: 6,
};

const OPERATION_BY_TAG: ReadonlyMap<number, OperationType> = new Map(
  OPERATION_TYPES.map((type) => [OPERATION_TAGS[type], type])
);

const utf8 = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

/**
 * Cursor over the input that fails with the offset of any short read
 */
class ByteReader {
  private offset = 0;
  private readonly view: Buffer;

  constructor(bytes: Uint8Array) {
    this.view = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  get position(): number {
    return this.offset;
  }

  get remaining(): number {
    return this.view.length - this.offset;
  }

  private take(size: number): number {
    if (this.remaining < size) {
      throw new ParseError(this.offset, 'unexpected end of input', { unit: 'offset' });
    }
    const start = this.offset;
    this.offset += size;
    return start;
  }

  peek(size: number): Buffer {
    return this.view.subarray(this.offset, this.offset + size);
  }

  bytes(size: number): Buffer {
    const start = this.take(size);
    return this.view.subarray(start, start + size);
  }

  u8(): number {
    return this.view.readUInt8(this.take(1));
  }

  u16(): number {
    return this.view.readUInt16LE(this.take(2));
  }

  u32(): number {
    return this.view.readUInt32LE(this.take(4));
  }

  i32(): number {
    return this.view.readInt32LE(this.take(4));
  }

  i64(): bigint {
    return this.view.readBigInt64LE(this.take(8));
  }

  text(): string {
    const length = this.u16();
    const start = this.offset;
    const raw = this.bytes(length);
    try {
      return utf8.decode(raw);
    } catch {
      throw new ParseError(start, 'invalid utf-8', { unit: 'offset' });
    }
  }
}

function readHeader(reader: ByteReader): number {
  const available = Math.min(reader.remaining, BIN_MAGIC.length);
  if (!reader.peek(available).equals(BIN_MAGIC.subarray(0, available))) {
    throw new ParseError(0, 'bad magic', { unit: 'offset' });
  }
  reader.bytes(BIN_MAGIC.length);
  const version = reader.u8();
  if (!SUPPORTED_VERSIONS.includes(version)) {
    throw new UnsupportedVersionError(version);
  }
  return reader.u32();
}

function readRecord(reader: ByteReader): TransactionRecord {
  const offset = reader.position;
  const id = reader.text();
  const days = reader.i32();
  const amount = reader.i64();
  const currency = reader.bytes(CURRENCY_SIZE).toString('latin1');
  const tag = reader.u8();
  const counterparty = reader.text();
  const description = reader.text();

  const operationType = OPERATION_BY_TAG.get(tag);
  if (operationType === undefined) {
    throw new ValidationError('operationType', `unknown operation type tag ${tag}`, offset);
  }
  const occurredAt = fromEpochDay(days);
  if (occurredAt === null) {
    throw new ValidationError('occurredAt', `day ${days} is outside the supported date range`, offset);
  }

  const result = validateRecord({ id, occurredAt, amount, currency, counterparty, description, operationType });
  if (!result.ok) {
    throw new ValidationError(result.error.field, result.error.reason, offset);
  }
  return result.record;
}

function readSequence(bytes: Uint8Array): TransactionRecord[] {
  const reader = new ByteReader(bytes);
  const count = readHeader(reader);

  const seen = new Set<string>();
  const records: TransactionRecord[] = [];
  for (let index = 0; index < count; index++) {
    const offset = reader.position;
    const record = readRecord(reader);
    if (seen.has(record.id)) {
      throw new ValidationError('id', 'duplicate id', offset);
    }
    seen.add(record.id);
    records.push(record);
  }

  if (reader.remaining > 0) {
    throw new ParseError(reader.position, 'trailing data', { unit: 'offset' });
  }
  return records;
}

export function decodeBin(bytes: Uint8Array): DecodeResult {
  try {
    return { ok: true, records: readSequence(bytes) };
  } catch (error) {
    if (error instanceof ParseError || error instanceof ValidationError) {
      return { ok: false, error };
    }
    throw error;
  }
}

function lengthPrefixed(value: string): Buffer {
  const body = Buffer.from(value, 'utf8');
  const prefix = Buffer.alloc(2);
  prefix.writeUInt16LE(body.length);
  return Buffer.concat([prefix, body]);
}

function encodeRecord(record: TransactionRecord): Buffer {
  const fixed = Buffer.alloc(4 + 8 + CURRENCY_SIZE + 1);
  let offset = fixed.writeInt32LE(toEpochDay(record.occurredAt), 0);
  offset = fixed.writeBigInt64LE(record.amount, offset);
  offset += fixed.write(record.currency, offset, CURRENCY_SIZE, 'latin1');
  fixed.writeUInt8(OPERATION_TAGS[record.operationType], offset);

  return Buffer.concat([
    lengthPrefixed(record.id),
    fixed,
    lengthPrefixed(record.counterparty),
    lengthPrefixed(record.description),
  ]);
}

export function encodeBin(records: RecordSequence): Buffer {
  const header = Buffer.alloc(HEADER_SIZE);
  BIN_MAGIC.copy(header, 0);
  const offset = header.writeUInt8(BIN_VERSION, BIN_MAGIC.length);
  header.writeUInt32LE(records.length, offset);

  return Buffer.concat([header, ...records.map(encodeRecord)]);
}

export const binCodec: RecordCodec = {
  format: 'bin',
  description: `Binary layout, magic "BTXR", version ${BIN_VERSION}`,
  binary: true,
  decode: decodeBin,
  encode: encodeBin,
};
