/**
 * Diff report rendering for the comparer tool
 */

import type { ChalkInstance } from 'chalk';
import type { TransactionRecord } from '../../shared/transaction-record.js';
import { formatMoney } from '../domain/money.js';
import type { FieldDiff } from '../domain/record.js';
import type { ChangedRecord, DiffReport } from '../reconciliation/comparer.js';

export interface ReportSource {
  path: string;
  format: string;
  count: number;
}

function amountText(record: TransactionRecord): string {
  return `${formatMoney(record.amount, record.currency)} ${record.currency}`;
}

function recordLine(record: TransactionRecord): string {
  return [
    record.id,
    record.occurredAt,
    record.operationType,
    amountText(record),
    JSON.stringify(record.counterparty),
    JSON.stringify(record.description),
  ].join('  ');
}

function fieldValue(diff: FieldDiff, record: TransactionRecord): string {
  return diff.field === 'amount' ? formatMoney(record.amount, record.currency) : JSON.stringify(String(record[diff.field]));
}

function changedLines(entry: ChangedRecord, paint: ChalkInstance): string[] {
  return [
    paint.yellow(`~ changed  ${entry.id}`),
    ...entry.fields.map(
      (diff) => `    ${diff.field}: ${fieldValue(diff, entry.left)} -> ${fieldValue(diff, entry.right)}`
    ),
  ];
}

export function renderDiffReport(
  report: DiffReport,
  left: ReportSource,
  right: ReportSource,
  paint: ChalkInstance
): string {
  const lines = [
    `Comparing ${left.path} (${left.format}, ${left.count} records) with ${right.path} (${right.format}, ${right.count} records)`,
  ];

  const identical = report.added.length === 0 && report.removed.length === 0 && report.changed.length === 0;
  if (identical) {
    lines.push(paint.green(`The records in '${left.path}' and '${right.path}' are identical.`));
    return `${lines.join('\n')}\n`;
  }

  lines.push(
    ...report.removed.map((record) => paint.red(`- removed  ${recordLine(record)}`)),
    ...report.added.map((record) => paint.green(`+ added    ${recordLine(record)}`)),
    ...report.changed.flatMap((entry) => changedLines(entry, paint)),
    `Summary: ${report.added.length} added, ${report.removed.length} removed, ` +
      `${report.changed.length} changed, ${report.unchangedCount} unchanged`
  );
  return `${lines.join('\n')}\n`;
}

function recordJson(record: TransactionRecord) {
  return { ...record, amount: formatMoney(record.amount, record.currency) };
}

/**
 * JSON-safe view of a report: amounts become decimal strings
 */
export function reportToJson(report: DiffReport) {
  return {
    added: report.added.map(recordJson),
    removed: report.removed.map(recordJson),
    changed: report.changed.map((entry) => ({
      id: entry.id,
      fields: entry.fields.map((diff) => ({
        field: diff.field,
        left: diff.field === 'amount' ? formatMoney(entry.left.amount, entry.left.currency) : String(diff.left),
        right: diff.field === 'amount' ? formatMoney(entry.right.amount, entry.right.currency) : String(diff.right),
      })),
    })),
    unchangedCount: report.unchangedCount,
  };
}
