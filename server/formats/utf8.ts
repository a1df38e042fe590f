import { ParseError } from '../domain/errors.js';

export type TextDecodeResult = { ok: true; text: string } | { ok: false; error: ParseError };

const NEWLINE = 0x0a;

// BOM is kept so each codec can strip it itself
const utf8 = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

/**
 * Strict UTF-8 decode for the text formats.
 * Decodes line by line (0x0A never occurs inside a multi-byte sequence) so a
 * malformed byte is reported on its own line.
 */
export function decodeUtf8Text(input: Uint8Array): TextDecodeResult {
  const lines: string[] = [];
  let start = 0;
  let line = 1;

  while (start <= input.length) {
    const newline = input.indexOf(NEWLINE, start);
    const end = newline === -1 ? input.length : newline;
    try {
      lines.push(utf8.decode(input.subarray(start, end)));
    } catch {
      return { ok: false, error: new ParseError(line, 'invalid utf-8') };
    }
    start = end + 1;
    line++;
  }
  return { ok: true, text: lines.join('\n') };
}
