/**
 * Text Block Record Codec
 *
 * One block of `LABEL: value` lines per record, blocks separated by an
 * empty line. Multi-line values continue on lines indented with two spaces.
 * Lines starting with `#` are comments.
 */

import {
  FIELD_LABELS,
  RECORD_FIELDS,
  isRecordField,
  type RawRecordFields,
  type RecordField,
  type RecordSequence,
  type TransactionRecord,
} from '../../shared/transaction-record.js';
import { ParseError } from '../domain/errors.js';
import { formatMoney } from '../domain/money.js';
import { validateRecord } from '../domain/record.js';
import type { DecodeResult, RecordCodec } from './types.js';
import { decodeUtf8Text } from './utf8.js';

const CONTINUATION_INDENT = '  ';

const FIELD_BY_LABEL: ReadonlyMap<string, RecordField> = new Map(
  RECORD_FIELDS.map((field) => [FIELD_LABELS[field], field])
);

interface BlockField {
  line: number;
  value: string;
}

/**
 * Fields collected for the record currently being read
 */
class PendingBlock {
  readonly fields = new Map<RecordField, BlockField>();
  private lastField: RecordField | null = null;

  constructor(readonly startLine: number) {}

  set(field: RecordField, line: number, value: string): void {
    if (this.fields.has(field)) {
      throw new ParseError(line, 'duplicate field', { field: FIELD_LABELS[field] });
    }
    this.fields.set(field, { line, value });
    this.lastField = field;
  }

  continueValue(line: number, text: string): void {
    const current = this.lastField ? this.fields.get(this.lastField) : undefined;
    if (!current) {
      throw new ParseError(line, 'unexpected continuation line');
    }
    current.value += `\n${text}`;
  }

  toRecord(): TransactionRecord {
    const raw: Partial<Record<RecordField, string>> = {};
    for (const field of RECORD_FIELDS) {
      const entry = this.fields.get(field);
      if (!entry) {
        throw new ParseError(this.startLine, 'missing field', { field: FIELD_LABELS[field] });
      }
      raw[field] = entry.value;
    }

    const result = validateRecord(toRawFields(raw));
    if (!result.ok) {
      const { field, reason } = result.error;
      const known = isRecordField(field) ? field : null;
      throw new ParseError((known && this.fields.get(known)?.line) ?? this.startLine, reason, {
        field: known ? FIELD_LABELS[known] : field,
        cause: result.error,
      });
    }
    return result.record;
  }
}

function toRawFields(raw: Partial<Record<RecordField, string>>): RawRecordFields {
  return {
    id: raw.id ?? '',
    occurredAt: raw.occurredAt ?? '',
    amount: raw.amount ?? '',
    currency: raw.currency ?? '',
    counterparty: raw.counterparty ?? '',
    description: raw.description ?? '',
    operationType: raw.operationType ?? '',
  };
}

function stripIndent(line: string): string {
  return line.startsWith(CONTINUATION_INDENT) ? line.slice(CONTINUATION_INDENT.length) : line.slice(1);
}

function parseBlocks(text: string): TransactionRecord[] {
  const lines = text.replace(/^\uFEFF/, '').split('\n');
  const records: TransactionRecord[] = [];
  const seen = new Set<string>();
  let block: PendingBlock | null = null;

  const closeBlock = () => {
    if (!block) return;
    const record = block.toRecord();
    if (seen.has(record.id)) {
      throw new ParseError(block.fields.get('id')?.line ?? block.startLine, 'duplicate id', { field: FIELD_LABELS.id });
    }
    seen.add(record.id);
    records.push(record);
    block = null;
  };

  for (const [index, rawLine] of lines.entries()) {
    const lineNumber = index + 1;
    const line = rawLine.endsWith('\r') ? rawLine.slice(0, -1) : rawLine;

    if (line === '') {
      closeBlock();
      continue;
    }
    if (line.startsWith('#')) {
      continue;
    }
    if (line.startsWith(' ') || line.startsWith('\t')) {
      if (!block) {
        throw new ParseError(lineNumber, 'unexpected continuation line');
      }
      block.continueValue(lineNumber, stripIndent(line));
      continue;
    }

    const colon = line.indexOf(':');
    if (colon <= 0) {
      throw new ParseError(lineNumber, 'expected LABEL: value');
    }
    const label = line.slice(0, colon).trim();
    const field = FIELD_BY_LABEL.get(label);
    if (!field) {
      throw new ParseError(lineNumber, 'unknown field', { field: label });
    }

    const rest = line.slice(colon + 1);
    block ??= new PendingBlock(lineNumber);
    block.set(field, lineNumber, rest.startsWith(' ') ? rest.slice(1) : rest);
  }

  closeBlock();
  return records;
}

export function decodeTxt(text: string): DecodeResult {
  try {
    return { ok: true, records: parseBlocks(text) };
  } catch (error) {
    if (error instanceof ParseError) {
      return { ok: false, error };
    }
    throw error;
  }
}

function fieldText(record: TransactionRecord, field: RecordField): string {
  return field === 'amount' ? formatMoney(record.amount, record.currency) : String(record[field]);
}

function formatField(label: string, value: string): string[] {
  const [first, ...rest] = value.split('\n');
  const head = first ? `${label}: ${first}` : `${label}:`;
  return [head, ...rest.map((line) => `${CONTINUATION_INDENT}${line}`)];
}

function formatBlock(record: TransactionRecord): string {
  return RECORD_FIELDS.flatMap((field) => formatField(FIELD_LABELS[field], fieldText(record, field))).join('\n');
}

export function encodeTxt(records: RecordSequence): string {
  if (records.length === 0) {
    return '';
  }
  return `${records.map(formatBlock).join('\n\n')}\n`;
}

export const txtCodec: RecordCodec = {
  format: 'txt',
  description: 'Labeled KEY: value blocks separated by blank lines',
  binary: false,
  decode: (input) => {
    const decoded = decodeUtf8Text(input);
    return decoded.ok ? decodeTxt(decoded.text) : decoded;
  },
  encode: (records) => Buffer.from(encodeTxt(records), 'utf8'),
};
