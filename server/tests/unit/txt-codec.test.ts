/**
 * Unit Tests: Text Block Codec
 */

import { describe, it, expect } from 'vitest';
import { decodeTxt, encodeTxt, txtCodec } from '../../formats/txt-codec.js';
import { ParseError } from '../../domain/errors.js';
import { record, sampleRecords } from '../helpers.js';

const ENCODED_SAMPLE = [
  'ID: tx-1',
  'OCCURRED_AT: 2024-03-15',
  'AMOUNT: 123.45',
  'CURRENCY: USD',
  'COUNTERPARTY: ACME Corp',
  'DESCRIPTION: Invoice 42',
  'OPERATION_TYPE: DEPOSIT',
  '',
  'ID: tx-2',
  'OCCURRED_AT: 2024-03-16',
  'AMOUNT: -49.99',
  'CURRENCY: EUR',
  'COUNTERPARTY: Corner Cafe, Ltd.',
  'DESCRIPTION: Lunch "team"',
  '  second line',
  'OPERATION_TYPE: DEBIT',
  '',
  'ID: tx-3',
  'OCCURRED_AT: 2024-02-29',
  'AMOUNT: 1500',
  'CURRENCY: JPY',
  'COUNTERPARTY:',
  'DESCRIPTION:',
  'OPERATION_TYPE: FEE',
  '',
].join('\n');

const BLOCK = [
  'ID: tx-1',
  'OCCURRED_AT: 2024-03-15',
  'AMOUNT: 123.45',
  'CURRENCY: USD',
  'COUNTERPARTY: ACME Corp',
  'DESCRIPTION: Invoice 42',
  'OPERATION_TYPE: DEPOSIT',
];

function decodeError(text: string): ParseError {
  const result = decodeTxt(text);
  if (result.ok) {
    throw new Error('expected decode to fail');
  }
  if (!(result.error instanceof ParseError)) {
    throw result.error;
  }
  return result.error;
}

describe('Text Block Codec', () => {
  describe('encode', () => {
    it('writes one labeled block per record', () => {
      expect(encodeTxt(sampleRecords)).toBe(ENCODED_SAMPLE);
    });

    it('writes nothing for an empty sequence', () => {
      expect(encodeTxt([])).toBe('');
    });
  });

  describe('decode', () => {
    it('reads back what it writes', () => {
      expect(decodeTxt(ENCODED_SAMPLE)).toEqual({ ok: true, records: sampleRecords });
    });

    it('keeps awkward free text intact through a round trip', () => {
      const records = [
        record({ description: ' leading space' }),
        record({ id: 'tx-2', description: '\nstarts on a new line' }),
        record({ id: 'tx-3', description: 'gap\n\nbelow\n\tindented' }),
        record({ id: 'tx-4', counterparty: '# not a comment', description: 'ID: not a label' }),
      ];
      expect(txtCodec.decode(txtCodec.encode(records))).toEqual({ ok: true, records });
    });

    it('skips comments and extra blank lines, accepts CRLF', () => {
      const text = ['# exported ledger', '', '', ...BLOCK, '', ''].join('\r\n');
      expect(decodeTxt(text)).toEqual({ ok: true, records: [sampleRecords[0]] });
    });

    it('decodes empty input to no records', () => {
      expect(decodeTxt('')).toEqual({ ok: true, records: [] });
    });

    it('rejects unknown labels', () => {
      expect(decodeError('ID: tx-1\nBOGUS: 1\n').message).toBe('line 2: unknown field (BOGUS)');
    });

    it('rejects lines without a label', () => {
      expect(decodeError('hello\n').message).toBe('line 1: expected LABEL: value');
      expect(decodeError(': value\n').message).toBe('line 1: expected LABEL: value');
    });

    it('rejects a continuation line outside a block', () => {
      expect(decodeError('  stray\n').message).toBe('line 1: unexpected continuation line');
    });

    it('rejects repeated labels within a block', () => {
      expect(decodeError('ID: a\nID: b\n').message).toBe('line 2: duplicate field (ID)');
    });

    it('reports a missing field at the start of its block', () => {
      const text = ['# comment', ...BLOCK.filter((line) => !line.startsWith('AMOUNT'))].join('\n');
      expect(decodeError(text).message).toBe('line 2: missing field (AMOUNT)');
    });

    it('reports invalid values on their own line', () => {
      const text = BLOCK.map((line) => (line.startsWith('CURRENCY') ? 'CURRENCY: usd' : line)).join('\n');
      const error = decodeError(text);
      expect(error.location).toBe(4);
      expect(error.field).toBe('CURRENCY');
      expect(error.message).toBe('line 4: must be a 3-letter uppercase code (CURRENCY)');
    });

    it('rejects bytes that are not valid utf-8', () => {
      const before = BLOCK.slice(0, 5).join('\n');
      const bytes = Buffer.concat([
        Buffer.from(`${before}\nDESCRIPTION: `),
        Buffer.from([0xc3]),
        Buffer.from('\nOPERATION_TYPE: DEPOSIT\n'),
      ]);
      const result = txtCodec.decode(bytes);
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(ParseError);
        expect(result.error.message).toBe('line 6: invalid utf-8');
      }
    });

    it('rejects duplicate ids', () => {
      const text = [...BLOCK, '', ...BLOCK].join('\n');
      expect(decodeError(text).message).toBe('line 9: duplicate id (ID)');
    });
  });
});
