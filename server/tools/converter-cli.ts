/**
 * Converter tool
 *
 * Reads one input file, decodes it with the source format and writes the
 * target encoding to standard output.
 */

import { parseArgs } from 'util';
import { convert } from '../convert/converter.js';
import { describeError } from '../domain/errors.js';
import { createDefaultRegistry } from '../formats/registry.js';
import { readInput, type ToolContext } from './io.js';

export const CONVERTER_USAGE =
  'Usage: converter --input <path> --input-format <format> --output-format <format>';

export enum ConverterExit {
  Success = 0,
  Failure = 1,
  Usage = 2,
}

interface ConverterArgs {
  input: string;
  inputFormat: string;
  outputFormat: string;
}

function parseConverterArgs(argv: string[]): ConverterArgs | string {
  try {
    const { values } = parseArgs({
      args: argv,
      options: {
        input: { type: 'string' },
        'input-format': { type: 'string' },
        'output-format': { type: 'string' },
      },
      strict: true,
      allowPositionals: false,
    });
    const { input, 'input-format': inputFormat, 'output-format': outputFormat } = values;
    if (!input || !inputFormat || !outputFormat) {
      return 'missing required option';
    }
    return { input, inputFormat, outputFormat };
  } catch (error) {
    // parseArgs reports unknown or malformed options by throwing
    return error instanceof Error ? error.message : String(error);
  }
}

export async function runConverter(argv: string[], ctx: ToolContext): Promise<number> {
  const { logger, streams, paint } = ctx;
  const registry = ctx.registry ?? createDefaultRegistry();

  const args = parseConverterArgs(argv);
  if (typeof args === 'string') {
    streams.stderr.write(`${paint.red(args)}\n${CONVERTER_USAGE}\n`);
    return ConverterExit.Usage;
  }

  let bytes: Buffer;
  try {
    bytes = await readInput(args.input, ctx.config.maxInputBytes);
  } catch (error) {
    logger.error({ err: error, input: args.input }, 'input read failed');
    streams.stderr.write(`${paint.red('Error:')} ${describeError(error)}\n`);
    return ConverterExit.Failure;
  }

  const result = convert(bytes, args.inputFormat, args.outputFormat, registry);
  if (!result.ok) {
    logger.error({ err: result.error, input: args.input }, 'conversion failed');
    streams.stderr.write(`${paint.red('Error:')} ${describeError(result.error)}\n`);
    return ConverterExit.Failure;
  }

  streams.stdout.write(result.output);
  logger.info(
    { input: args.input, from: args.inputFormat, to: args.outputFormat, records: result.records.length },
    'conversion complete'
  );
  return ConverterExit.Success;
}
