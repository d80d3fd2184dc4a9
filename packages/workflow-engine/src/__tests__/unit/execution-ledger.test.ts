import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterEach, describe, expect, it } from 'vitest';

import {
  FileExecutionLedger,
  InMemoryExecutionLedger,
  LedgerConflictError,
  type ExecutionRecord,
} from '../../index.js';

function record(overrides: Partial<ExecutionRecord> = {}): ExecutionRecord {
  return {
    id: 'exec-1',
    tenantId: 'tenant-a',
    triggerId: 'trigger-1',
    dedupKey: 'rule:tenant-a:low-recovery:2026-03-02T00:00:00.000Z',
    workflowId: 'recovery-check',
    source: { kind: 'rule', ruleId: 'low-recovery' },
    severity: 'critical',
    workflowSeverity: 'info',
    configVersion: 1,
    steps: [{ name: 'collect', capability: 'data-collector', onFailure: 'fatal', state: 'succeeded', attempts: 1 }],
    status: 'completed',
    startedAt: '2026-03-02T00:00:00.000Z',
    endedAt: '2026-03-02T00:00:05.000Z',
    ...overrides,
  };
}

describe('in-memory execution ledger', () => {
  it('stores frozen copies and finds them by dedup key and id', () => {
    const ledger = new InMemoryExecutionLedger();
    const original = record();

    const stored = ledger.append(original);
    original.status = 'failed';

    expect(stored.status).toBe('completed');
    expect(Object.isFrozen(stored)).toBe(true);
    expect(Object.isFrozen(stored.steps[0])).toBe(true);
    expect(ledger.findByDedupKey(original.dedupKey)).toBe(stored);
    expect(ledger.findById('exec-1')).toBe(stored);
    expect(ledger.findByDedupKey('unknown')).toBeNull();
  });

  it('rejects a second terminal record for the same dedup key', () => {
    const ledger = new InMemoryExecutionLedger();
    ledger.append(record());

    expect(() => ledger.append(record({ id: 'exec-2' }))).toThrow(LedgerConflictError);
  });

  it('accepts compensating records that reference an existing record of the same tenant', () => {
    const ledger = new InMemoryExecutionLedger();
    ledger.append(record());

    const correction = ledger.append(
      record({ id: 'exec-2', dedupKey: 'compensation:exec-1', status: 'failed', compensates: 'exec-1' }),
    );

    expect(correction.compensates).toBe('exec-1');
    expect(() =>
      ledger.append(record({ id: 'exec-3', dedupKey: 'compensation:missing', compensates: 'missing' })),
    ).toThrow(LedgerConflictError);
    expect(() =>
      ledger.append(
        record({ id: 'exec-4', tenantId: 'tenant-b', dedupKey: 'compensation:cross', compensates: 'exec-1' }),
      ),
    ).toThrow(LedgerConflictError);
  });

  it('lists per tenant within a time range and by status', () => {
    const ledger = new InMemoryExecutionLedger();
    ledger.append(record());
    ledger.append(
      record({ id: 'exec-2', dedupKey: 'k2', status: 'failed', startedAt: '2026-03-03T00:00:00.000Z' }),
    );
    ledger.append(record({ id: 'exec-3', dedupKey: 'k3', tenantId: 'tenant-b' }));

    expect(ledger.listByTenant('tenant-a').map((entry) => entry.id)).toEqual(['exec-1', 'exec-2']);
    expect(
      ledger.listByTenant('tenant-a', { from: '2026-03-02T12:00:00.000Z' }).map((entry) => entry.id),
    ).toEqual(['exec-2']);
    expect(
      ledger.listByTenant('tenant-a', { to: '2026-03-02T12:00:00.000Z' }).map((entry) => entry.id),
    ).toEqual(['exec-1']);
    expect(ledger.listByStatus('tenant-a', ['failed']).map((entry) => entry.id)).toEqual(['exec-2']);
  });

  it('forgets dedup keys older than the retention window but keeps the records', () => {
    const ledger = new InMemoryExecutionLedger({ dedupRetentionMs: 60 * 60_000 });
    ledger.append(record());

    expect(ledger.expireDedupKeys(new Date('2026-03-02T00:30:00.000Z'))).toBe(0);
    expect(ledger.expireDedupKeys(new Date('2026-03-02T01:00:05.000Z'))).toBe(1);
    expect(ledger.findByDedupKey(record().dedupKey)).toBeNull();
    expect(ledger.findById('exec-1')).not.toBeNull();
  });
});

describe('file execution ledger', () => {
  let directory: string | undefined;

  afterEach(() => {
    if (directory !== undefined) {
      rmSync(directory, { recursive: true, force: true });
      directory = undefined;
    }
  });

  it('appends JSON lines and replays them on start', () => {
    directory = mkdtempSync(join(tmpdir(), 'ledger-'));
    const filePath = join(directory, 'nested', 'executions.jsonl');

    const ledger = new FileExecutionLedger(filePath);
    ledger.append(record());
    ledger.append(record({ id: 'exec-2', dedupKey: 'k2', status: 'partially-completed' }));

    expect(readFileSync(filePath, 'utf8').trim().split('\n')).toHaveLength(2);

    const reopened = new FileExecutionLedger(filePath);
    expect(reopened.findById('exec-2')?.status).toBe('partially-completed');
    expect(() => reopened.append(record({ id: 'exec-9' }))).toThrow(LedgerConflictError);
  });

  it('creates the ledger directory when it opens', () => {
    directory = mkdtempSync(join(tmpdir(), 'ledger-'));
    const ledgerDirectory = join(directory, 'data', 'ledger');

    new FileExecutionLedger(join(ledgerDirectory, 'executions.jsonl'));

    expect(existsSync(ledgerDirectory)).toBe(true);
  });

  it('refuses to start from a corrupt ledger file', () => {
    directory = mkdtempSync(join(tmpdir(), 'ledger-'));
    const filePath = join(directory, 'executions.jsonl');
    writeFileSync(filePath, '{"id":"exec-1"}\n', 'utf8');

    expect(() => new FileExecutionLedger(filePath)).toThrow(`Corrupt ledger entry at ${filePath}:1`);
  });
});
