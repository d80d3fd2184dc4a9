import { appendFileSync, existsSync, mkdirSync, readFileSync } from 'node:fs';
import { dirname } from 'node:path';

import { z } from 'zod';

import type { ExecutionRecord, ExecutionStatus, TimeRange } from './types.js';
import { severitySchema } from './validation.js';

export class LedgerConflictError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LedgerConflictError';
  }
}

const failureCauseSchema = z.enum([
  'fatal_step',
  'transient_exhausted',
  'step_timeout',
  'workflow_timeout',
  'configuration',
  'isolation_violation',
]);

const storedRecordSchema = z.object({
  id: z.string().min(1),
  tenantId: z.string().min(1),
  triggerId: z.string().min(1),
  dedupKey: z.string().min(1),
  workflowId: z.string().min(1),
  source: z.discriminatedUnion('kind', [
    z.object({ kind: z.literal('rule'), ruleId: z.string() }),
    z.object({ kind: z.literal('schedule'), scheduleId: z.string(), dueAt: z.string() }),
    z.object({ kind: z.literal('manual'), requestedBy: z.string() }),
  ]),
  severity: severitySchema,
  workflowSeverity: severitySchema,
  configVersion: z.number().int(),
  steps: z.array(
    z.object({
      name: z.string(),
      capability: z.string(),
      onFailure: z.enum(['fatal', 'skippable']),
      state: z.enum(['pending', 'running', 'succeeded', 'failed', 'skipped']),
      attempts: z.number().int().nonnegative(),
      startedAt: z.string().optional(),
      endedAt: z.string().optional(),
      output: z.record(z.string(), z.unknown()).optional(),
      error: z
        .object({ code: z.string(), message: z.string(), cause: failureCauseSchema })
        .optional(),
      skipReason: z.enum(['capability', 'halted']).optional(),
    }),
  ),
  status: z.enum(['completed', 'partially-completed', 'failed']),
  failureCause: failureCauseSchema.optional(),
  startedAt: z.string(),
  endedAt: z.string(),
  compensates: z.string().optional(),
});

export interface ExecutionLedger {
  append(record: ExecutionRecord): ExecutionRecord;
  findByDedupKey(dedupKey: string): ExecutionRecord | null;
  findById(id: string): ExecutionRecord | null;
  listByTenant(tenantId: string, range?: TimeRange): ExecutionRecord[];
  listByStatus(tenantId: string, statuses: ExecutionStatus[], range?: TimeRange): ExecutionRecord[];
  expireDedupKeys(now: Date): number;
}

export interface LedgerOptions {
  dedupRetentionMs?: number;
}

const DEFAULT_DEDUP_RETENTION_MS = 7 * 24 * 60 * 60 * 1000;

function freezeRecord(record: ExecutionRecord): ExecutionRecord {
  const copy = structuredClone(record);
  for (const step of copy.steps) {
    Object.freeze(step.error);
    Object.freeze(step.output);
    Object.freeze(step);
  }
  Object.freeze(copy.steps);
  Object.freeze(copy.source);
  return Object.freeze(copy);
}

function inRange(record: ExecutionRecord, range: TimeRange | undefined): boolean {
  if (range === undefined) {
    return true;
  }

  const startedAt = new Date(record.startedAt).getTime();
  if (range.from !== undefined && startedAt < new Date(range.from).getTime()) {
    return false;
  }

  return range.to === undefined || startedAt <= new Date(range.to).getTime();
}

/**
 * Append-only store of terminal execution records. Records are frozen copies;
 * corrections are new records that name the original in `compensates`.
 */
export class InMemoryExecutionLedger implements ExecutionLedger {
  private readonly records: ExecutionRecord[] = [];
  private readonly byId = new Map<string, ExecutionRecord>();
  private readonly dedupIndex = new Map<string, { recordId: string; endedAtMs: number }>();
  private readonly dedupRetentionMs: number;

  constructor(options: LedgerOptions = {}) {
    this.dedupRetentionMs = options.dedupRetentionMs ?? DEFAULT_DEDUP_RETENTION_MS;
  }

  append(record: ExecutionRecord): ExecutionRecord {
    this.assertAppendable(record);
    const stored = freezeRecord(record);
    this.index(stored);
    return stored;
  }

  findByDedupKey(dedupKey: string): ExecutionRecord | null {
    const entry = this.dedupIndex.get(dedupKey);
    if (entry === undefined) {
      return null;
    }

    return this.byId.get(entry.recordId) ?? null;
  }

  findById(id: string): ExecutionRecord | null {
    return this.byId.get(id) ?? null;
  }

  listByTenant(tenantId: string, range?: TimeRange): ExecutionRecord[] {
    return this.records.filter((record) => record.tenantId === tenantId && inRange(record, range));
  }

  listByStatus(tenantId: string, statuses: ExecutionStatus[], range?: TimeRange): ExecutionRecord[] {
    return this.listByTenant(tenantId, range).filter((record) => statuses.includes(record.status));
  }

  expireDedupKeys(now: Date): number {
    const cutoff = now.getTime() - this.dedupRetentionMs;
    let expired = 0;

    for (const [dedupKey, entry] of this.dedupIndex.entries()) {
      if (entry.endedAtMs <= cutoff) {
        this.dedupIndex.delete(dedupKey);
        expired += 1;
      }
    }

    return expired;
  }

  protected assertAppendable(record: ExecutionRecord): void {
    if (this.byId.has(record.id)) {
      throw new LedgerConflictError(`Execution record already appended: ${record.id}`);
    }

    if (this.dedupIndex.has(record.dedupKey)) {
      throw new LedgerConflictError(`Terminal record already exists for dedup key: ${record.dedupKey}`);
    }

    if (record.compensates !== undefined) {
      const original = this.byId.get(record.compensates);
      if (original === undefined || original.tenantId !== record.tenantId) {
        throw new LedgerConflictError(`Compensated record not found: ${record.compensates}`);
      }
    }
  }

  protected index(record: ExecutionRecord): void {
    this.records.push(record);
    this.byId.set(record.id, record);
    this.dedupIndex.set(record.dedupKey, {
      recordId: record.id,
      endedAtMs: new Date(record.endedAt).getTime(),
    });
  }
}

/** JSON-lines ledger. Replays the file on construction, then appends one line per record. */
export class FileExecutionLedger extends InMemoryExecutionLedger {
  constructor(
    private readonly filePath: string,
    options: LedgerOptions = {},
  ) {
    super(options);
    mkdirSync(dirname(this.filePath), { recursive: true });
    this.load();
  }

  override append(record: ExecutionRecord): ExecutionRecord {
    this.assertAppendable(record);
    appendFileSync(this.filePath, `${JSON.stringify(record)}\n`, 'utf8');
    const stored = freezeRecord(record);
    this.index(stored);
    return stored;
  }

  private load(): void {
    if (!existsSync(this.filePath)) {
      return;
    }

    const lines = readFileSync(this.filePath, 'utf8').split('\n');
    lines.forEach((line, index) => {
      if (line.trim().length === 0) {
        return;
      }

      const parsed = storedRecordSchema.safeParse(JSON.parse(line));
      if (!parsed.success) {
        throw new Error(`Corrupt ledger entry at ${this.filePath}:${index + 1}`);
      }

      this.index(freezeRecord(parsed.data));
    });
  }
}
