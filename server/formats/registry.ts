/**
 * Format Registry
 * Maps a format name (or alias) to its codec. The converter and comparer
 * only ever reach a codec through here, so a new format is one register() call.
 */

import { DuplicateFormatError, UnknownFormatError } from '../domain/errors.js';
import { binCodec } from './bin-codec.js';
import { csvCodec } from './csv-codec.js';
import { txtCodec } from './txt-codec.js';
import type { RecordCodec } from './types.js';

export type ResolveResult =
  | { ok: true; codec: RecordCodec }
  | { ok: false; error: UnknownFormatError };

export class FormatRegistry {
  private readonly codecs = new Map<string, RecordCodec>();
  private readonly aliases = new Map<string, string>();

  register(codec: RecordCodec, aliases: readonly string[] = []): this {
    const name = normalize(codec.format);
    if (this.has(name)) {
      throw new DuplicateFormatError(codec.format, false);
    }
    const names = aliases.map(normalize);
    for (const [index, alias] of names.entries()) {
      if (alias === name || this.has(alias) || names.indexOf(alias) !== index) {
        throw new DuplicateFormatError(alias, true);
      }
    }

    // nothing is stored unless every name is free
    this.codecs.set(name, codec);
    for (const alias of names) {
      this.aliases.set(alias, name);
    }
    return this;
  }

  has(format: string): boolean {
    const name = normalize(format);
    return this.codecs.has(name) || this.aliases.has(name);
  }

  /**
   * Canonical format names, in registration order
   */
  formats(): string[] {
    return [...this.codecs.keys()];
  }

  resolve(format: string): ResolveResult {
    const name = normalize(format);
    const codec = this.codecs.get(this.aliases.get(name) ?? name);
    if (!codec) {
      return { ok: false, error: new UnknownFormatError(format, this.formats()) };
    }
    return { ok: true, codec };
  }

  get(format: string): RecordCodec {
    const result = this.resolve(format);
    if (!result.ok) {
      throw result.error;
    }
    return result.codec;
  }
}

function normalize(format: string): string {
  return format.trim().toLowerCase();
}

export function createDefaultRegistry(): FormatRegistry {
  return new FormatRegistry()
    .register(csvCodec)
    .register(txtCodec, ['text'])
    .register(binCodec, ['binary']);
}
