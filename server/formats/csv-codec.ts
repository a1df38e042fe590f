/**
 * CSV Record Codec
 *
 * Fixed header row followed by one row per record. Quoting follows RFC 4180:
 * values holding the delimiter, a quote or a line break are wrapped in
 * quotes and embedded quotes are doubled.
 */

import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { z } from 'zod';
import {
  FIELD_LABELS,
  RECORD_FIELDS,
  type RecordSequence,
  type TransactionRecord,
} from '../../shared/transaction-record.js';
import { ParseError } from '../domain/errors.js';
import { formatMoney } from '../domain/money.js';
import { validateRecord } from '../domain/record.js';
import type { DecodeResult, RecordCodec } from './types.js';
import { decodeUtf8Text } from './utf8.js';

export const CSV_HEADER: readonly string[] = RECORD_FIELDS.map((field) => FIELD_LABELS[field]);

// Shape of csv-parse output with `info: true`
const ParsedRowsSchema = z.array(
  z.object({
    record: z.array(z.string()),
    info: z.object({ lines: z.number() }),
  })
);

const CsvErrorSchema = z.object({ lines: z.number(), message: z.string() });

interface CsvRow {
  line: number;
  cells: string[];
}

function countLineBreaks(value: string): number {
  return value.match(/\r\n|\r|\n/g)?.length ?? 0;
}

function readRows(text: string): CsvRow[] {
  let parsed: unknown;
  try {
    // Line breaks inside quoted values are stored as LF
    parsed = parse(text.replace(/\r\n/g, '\n'), {
      bom: true,
      info: true,
      relax_column_count: true,
      skip_empty_lines: true,
    });
  } catch (error) {
    const csvError = CsvErrorSchema.safeParse(error);
    if (csvError.success) {
      throw new ParseError(csvError.data.lines, `malformed csv: ${csvError.data.message}`);
    }
    throw error;
  }

  // info.lines is the line a row ends on; report the line it starts on
  return ParsedRowsSchema.parse(parsed).map(({ record, info }) => ({
    line: info.lines - record.reduce((sum, cell) => sum + countLineBreaks(cell), 0),
    cells: record,
  }));
}

function checkHeader(header: CsvRow | undefined): void {
  if (!header) {
    throw new ParseError(1, 'missing header');
  }
  const matches =
    header.cells.length === CSV_HEADER.length &&
    header.cells.every((cell, index) => cell === CSV_HEADER[index]);
  if (!matches) {
    throw new ParseError(header.line, 'invalid header');
  }
}

function toRecords(rows: CsvRow[]): TransactionRecord[] {
  const [header, ...body] = rows;
  checkHeader(header);

  const seen = new Set<string>();
  const records: TransactionRecord[] = [];

  for (const { line, cells } of body) {
    if (cells.length !== CSV_HEADER.length) {
      throw new ParseError(line, `expected ${CSV_HEADER.length} fields, got ${cells.length}`);
    }

    const [id, occurredAt, amount, currency, counterparty, description, operationType] = cells;
    const result = validateRecord({
      id,
      occurredAt,
      amount,
      currency,
      counterparty,
      description,
      operationType,
    });
    if (!result.ok) {
      throw new ParseError(line, result.error.reason, { field: result.error.field, cause: result.error });
    }
    if (seen.has(result.record.id)) {
      throw new ParseError(line, 'duplicate id', { field: 'id' });
    }
    seen.add(result.record.id);
    records.push(result.record);
  }

  return records;
}

export function decodeCsv(text: string): DecodeResult {
  try {
    return { ok: true, records: toRecords(readRows(text)) };
  } catch (error) {
    if (error instanceof ParseError) {
      return { ok: false, error };
    }
    throw error;
  }
}

function toRow(record: TransactionRecord): string[] {
  return [
    record.id,
    record.occurredAt,
    formatMoney(record.amount, record.currency),
    record.currency,
    record.counterparty,
    record.description,
    record.operationType,
  ];
}

export function encodeCsv(records: RecordSequence): string {
  return stringify([[...CSV_HEADER], ...records.map(toRow)], { record_delimiter: 'unix' });
}

export const csvCodec: RecordCodec = {
  format: 'csv',
  description: 'Comma-separated values with a fixed header row',
  binary: false,
  decode: (input) => {
    const decoded = decodeUtf8Text(input);
    return decoded.ok ? decodeCsv(decoded.text) : decoded;
  },
  encode: (records) => Buffer.from(encodeCsv(records), 'utf8'),
};
