/**
 * Shared test fixtures and in-memory tool context
 */

import { Chalk } from 'chalk';
import { pino } from 'pino';
import type { RawRecordFields, TransactionRecord } from '../../shared/transaction-record.js';
import { createRecord } from '../domain/record.js';
import type { OutputSink, ToolContext } from '../tools/io.js';

export function record(overrides: Partial<RawRecordFields> = {}): TransactionRecord {
  return createRecord({
    id: 'tx-1',
    occurredAt: '2024-03-15',
    amount: 12345n,
    currency: 'USD',
    counterparty: 'ACME Corp',
    description: 'Invoice 42',
    operationType: 'DEPOSIT',
    ...overrides,
  });
}

export const sampleRecords: TransactionRecord[] = [
  record(),
  record({
    id: 'tx-2',
    occurredAt: '2024-03-16',
    amount: -4999n,
    currency: 'EUR',
    counterparty: 'Corner Cafe, Ltd.',
    description: 'Lunch "team"\nsecond line',
    operationType: 'DEBIT',
  }),
  record({
    id: 'tx-3',
    occurredAt: '2024-02-29',
    amount: 1500n,
    currency: 'JPY',
    counterparty: '',
    description: '',
    operationType: 'FEE',
  }),
];

export class MemorySink implements OutputSink {
  private readonly chunks: Buffer[] = [];

  write(chunk: string | Uint8Array): boolean {
    this.chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : Buffer.from(chunk));
    return true;
  }

  get buffer(): Buffer {
    return Buffer.concat(this.chunks);
  }

  get text(): string {
    return this.buffer.toString('utf8');
  }
}

export function memoryContext(maxInputBytes = 1024 * 1024) {
  const stdout = new MemorySink();
  const stderr = new MemorySink();
  const ctx: ToolContext = {
    config: { maxInputBytes },
    logger: pino({ level: 'silent' }),
    streams: { stdout, stderr },
    paint: new Chalk({ level: 0 }),
  };
  return { ctx, stdout, stderr };
}
