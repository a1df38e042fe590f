/**
 * Comparer tool
 *
 * Reads two files, possibly in different formats, and prints how their
 * record sets differ.
 */

import { parseArgs } from 'util';
import { describeError } from '../domain/errors.js';
import { createDefaultRegistry } from '../formats/registry.js';
import { compareEncoded, hasDifferences, type EncodedInput } from '../reconciliation/comparer.js';
import { readInput, type ToolContext } from './io.js';
import { renderDiffReport, reportToJson } from './report.js';

export const COMPARER_USAGE =
  'Usage: comparer --file1 <path> --format1 <format> --file2 <path> --format2 <format> [--json]';

export enum ComparerExit {
  Identical = 0,
  Different = 1,
  Error = 2,
}

interface ComparerArgs {
  file1: string;
  format1: string;
  file2: string;
  format2: string;
  json: boolean;
}

function parseComparerArgs(argv: string[]): ComparerArgs | string {
  try {
    const { values } = parseArgs({
      args: argv,
      options: {
        file1: { type: 'string' },
        format1: { type: 'string' },
        file2: { type: 'string' },
        format2: { type: 'string' },
        json: { type: 'boolean', default: false },
      },
      strict: true,
      allowPositionals: false,
    });
    const { file1, format1, file2, format2, json = false } = values;
    if (!file1 || !format1 || !file2 || !format2) {
      return 'missing required option';
    }
    return { file1, format1, file2, format2, json };
  } catch (error) {
    return error instanceof Error ? error.message : String(error);
  }
}

export async function runComparer(argv: string[], ctx: ToolContext): Promise<number> {
  const { logger, streams, paint } = ctx;
  const registry = ctx.registry ?? createDefaultRegistry();

  const args = parseComparerArgs(argv);
  if (typeof args === 'string') {
    streams.stderr.write(`${paint.red(args)}\n${COMPARER_USAGE}\n`);
    return ComparerExit.Error;
  }

  let left: EncodedInput;
  let right: EncodedInput;
  try {
    left = { bytes: await readInput(args.file1, ctx.config.maxInputBytes), format: args.format1 };
    right = { bytes: await readInput(args.file2, ctx.config.maxInputBytes), format: args.format2 };
  } catch (error) {
    logger.error({ err: error }, 'input read failed');
    streams.stderr.write(`${paint.red('Error:')} ${describeError(error)}\n`);
    return ComparerExit.Error;
  }

  const result = compareEncoded(left, right, registry);
  if (!result.ok) {
    const path = result.side === 'right' ? args.file2 : args.file1;
    logger.error({ err: result.error, side: result.side }, 'comparison failed');
    streams.stderr.write(`${paint.red('Error:')} ${path}: ${describeError(result.error)}\n`);
    return ComparerExit.Error;
  }

  const { report } = result;
  if (args.json) {
    streams.stdout.write(`${JSON.stringify(reportToJson(report), null, 2)}\n`);
  } else {
    streams.stdout.write(
      renderDiffReport(
        report,
        { path: args.file1, format: args.format1, count: result.leftCount },
        { path: args.file2, format: args.format2, count: result.rightCount },
        paint
      )
    );
  }

  logger.info(
    {
      added: report.added.length,
      removed: report.removed.length,
      changed: report.changed.length,
      unchanged: report.unchangedCount,
    },
    'comparison complete'
  );
  return hasDifferences(report) ? ComparerExit.Different : ComparerExit.Identical;
}
