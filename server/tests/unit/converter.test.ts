import { describe, it, expect } from 'vitest';
import { convert } from '../../convert/converter.js';
import { UnknownFormatError, UnsupportedVersionError } from '../../domain/errors.js';
import { encodeBin } from '../../formats/bin-codec.js';
import { encodeCsv } from '../../formats/csv-codec.js';
import { encodeTxt } from '../../formats/txt-codec.js';
import { sampleRecords } from '../helpers.js';

describe('Converter', () => {
  it('decodes with the source codec and encodes with the target', () => {
    const result = convert(Buffer.from(encodeCsv(sampleRecords)), 'csv', 'txt');
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.output.toString('utf8')).toBe(encodeTxt(sampleRecords));
      expect(result.records).toEqual(sampleRecords);
    }
  });

  it('produces identical binary output from any source format', () => {
    const fromCsv = convert(Buffer.from(encodeCsv(sampleRecords)), 'csv', 'bin');
    const fromTxt = convert(Buffer.from(encodeTxt(sampleRecords)), 'text', 'binary');
    expect(fromCsv.ok && fromCsv.output).toEqual(encodeBin(sampleRecords));
    expect(fromTxt.ok && fromTxt.output).toEqual(encodeBin(sampleRecords));
  });

  it('reports unknown formats before decoding', () => {
    const result = convert(Buffer.from('anything'), 'csv', 'xml');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(UnknownFormatError);
      expect(result.error.message).toBe('Unknown format "xml" (expected one of: csv, txt, bin)');
    }
  });

  it('passes decode errors through', () => {
    const bytes = encodeBin(sampleRecords);
    bytes.writeUInt8(9, 4);
    const result = convert(bytes, 'bin', 'csv');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(UnsupportedVersionError);
    }
  });
});
