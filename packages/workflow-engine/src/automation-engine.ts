import { randomUUID } from 'node:crypto';

import { errorMessage, type Logger, type MetricSnapshot } from '@wellness-automation/shared';

import type { CapabilityRegistry } from './capabilities.js';
import { EscalationManager, type NotificationSender } from './escalation-manager.js';
import type { ExecutionLedger } from './execution-ledger.js';
import { IsolationViolationError } from './isolation-guard.js';
import type { MetricFeed } from './metric-feed.js';
import type { RetryExecutor, RetryPolicy } from './retry-executor.js';
import { RuleEngine } from './rule-engine.js';
import { Scheduler } from './scheduler.js';
import { TenantNotFoundError, type TenantRegistry } from './tenant-registry.js';
import { TenantWorkQueue } from './tenant-work-queue.js';
import type { ExecutionRecord, ExecutionStatus, PendingTrigger, TimeRange, TriggerEvent } from './types.js';
import { ConfigurationError } from './validation.js';
import { WorkflowExecutor } from './workflow-executor.js';

export interface AutomationEngineOptions {
  registry: TenantRegistry;
  ledger: ExecutionLedger;
  capabilities: CapabilityRegistry;
  sender: NotificationSender;
  logger: Logger;
  operatorContact: string;
  concurrency?: number;
  retryPolicy?: RetryPolicy;
  retryExecutor?: RetryExecutor;
  defaultStepTimeoutMs?: number;
  defaultWorkflowDeadlineMs?: number;
  notificationTimeoutMs?: number;
  alertRetentionMs?: number;
  clock?: () => Date;
}

export interface ExecutionQuery {
  statuses?: ExecutionStatus[];
  range?: TimeRange;
}

export interface RuleStatus {
  ruleId: string;
  workflowId: string;
  enabled: boolean;
  triggerCount: number;
  lastTriggeredAt: string | null;
}

export interface WorkflowStatus {
  workflowId: string;
  name: string;
  enabled: boolean;
  runCount: number;
  successCount: number;
  partialCount: number;
  failureCount: number;
  lastRunAt: string | null;
  nextRunAt: string | null;
}

export interface AutomationStatus {
  tenantId: string;
  configVersion: number;
  totalRules: number;
  enabledRules: number;
  totalWorkflows: number;
  enabledWorkflows: number;
  rules: RuleStatus[];
  workflows: WorkflowStatus[];
}

export interface TickSummary {
  scheduled: number;
  expiredDedupKeys: number;
}

/**
 * Wires the data flow: snapshots and schedule ticks become triggers, the
 * per-tenant queue feeds them to the executor, and terminal records go to
 * the escalation manager.
 */
export class AutomationEngine {
  readonly registry: TenantRegistry;
  readonly ledger: ExecutionLedger;
  readonly escalation: EscalationManager;
  private readonly rules: RuleEngine;
  private readonly scheduler: Scheduler;
  private readonly executor: WorkflowExecutor;
  private readonly queue: TenantWorkQueue;
  private readonly logger: Logger;
  private readonly clock: () => Date;

  constructor(options: AutomationEngineOptions) {
    this.registry = options.registry;
    this.ledger = options.ledger;
    this.logger = options.logger.child({ component: 'automation-engine' });
    this.clock = options.clock ?? (() => new Date());

    this.rules = new RuleEngine({ registry: options.registry, logger: options.logger });
    this.scheduler = new Scheduler({ registry: options.registry, logger: options.logger });
    this.escalation = new EscalationManager({
      registry: options.registry,
      sender: options.sender,
      logger: options.logger,
      operatorContact: options.operatorContact,
      clock: this.clock,
      ...(options.notificationTimeoutMs === undefined ? {} : { deliveryTimeoutMs: options.notificationTimeoutMs }),
      ...(options.alertRetentionMs === undefined ? {} : { retentionMs: options.alertRetentionMs }),
    });
    this.executor = new WorkflowExecutor({
      registry: options.registry,
      ledger: options.ledger,
      capabilities: options.capabilities,
      logger: options.logger,
      clock: this.clock,
      ...(options.retryExecutor === undefined ? {} : { retryExecutor: options.retryExecutor }),
      ...(options.retryPolicy === undefined ? {} : { retryPolicy: options.retryPolicy }),
      ...(options.defaultStepTimeoutMs === undefined ? {} : { defaultStepTimeoutMs: options.defaultStepTimeoutMs }),
      ...(options.defaultWorkflowDeadlineMs === undefined
        ? {}
        : { defaultWorkflowDeadlineMs: options.defaultWorkflowDeadlineMs }),
    });
    this.queue = new TenantWorkQueue({
      concurrency: options.concurrency ?? 4,
      handler: (trigger) => this.handle(trigger),
      logger: options.logger,
      clock: this.clock,
    });
  }

  attachFeed(feed: MetricFeed): () => void {
    return feed.subscribe(async (snapshot) => {
      await this.ingestSnapshot(snapshot.tenantId, snapshot);
    });
  }

  /** Evaluates rules for the snapshot and queues what fired. */
  async ingestSnapshot(tenantId: string, snapshot: MetricSnapshot): Promise<TriggerEvent[]> {
    let triggers: TriggerEvent[];
    try {
      triggers = this.rules.evaluate(tenantId, snapshot);
    } catch (error) {
      if (error instanceof IsolationViolationError) {
        await this.reportIsolationViolation(error, tenantId);
      }
      throw error;
    }

    triggers.forEach((trigger) => this.queue.enqueue(trigger));
    return triggers;
  }

  async tick(now: Date): Promise<TickSummary> {
    const triggers = this.scheduler.tick(now);
    triggers.forEach((trigger) => this.queue.enqueue(trigger));
    await this.escalation.tick(now);
    const expiredDedupKeys = this.ledger.expireDedupKeys(now);

    return { scheduled: triggers.length, expiredDedupKeys };
  }

  /** Manual diagnostic run of one workflow, outside the automated loop. */
  retrigger(tenantId: string, workflowId: string, requestedBy: string): TriggerEvent {
    const tenant = this.registry.get(tenantId);
    const workflow = tenant.workflows.find((candidate) => candidate.id === workflowId);
    if (workflow === undefined) {
      throw new ConfigurationError('Unknown workflow', { workflowId: `Workflow ${workflowId} is not configured` });
    }

    const id = randomUUID();
    const trigger: TriggerEvent = {
      id,
      tenantId,
      workflowId,
      source: { kind: 'manual', requestedBy },
      severity: workflow.severity,
      occurredAt: this.clock().toISOString(),
      dedupKey: `manual:${tenantId}:${id}`,
      payload: {},
    };

    this.logger.info('manual retrigger queued', { tenantId, workflowId, requestedBy, triggerId: id });
    this.queue.enqueue(trigger);
    return trigger;
  }

  listExecutions(tenantId: string, query: ExecutionQuery = {}): ExecutionRecord[] {
    return query.statuses === undefined
      ? this.ledger.listByTenant(tenantId, query.range)
      : this.ledger.listByStatus(tenantId, query.statuses, query.range);
  }

  /** Per-rule and per-workflow counters, derived from the ledger and the watermark cells. */
  automationStatus(tenantId: string): AutomationStatus {
    const tenant = this.registry.get(tenantId);
    const records = this.ledger.listByTenant(tenantId);

    const rules = tenant.rules.map((rule): RuleStatus => {
      const lastFiredMs = this.registry.readWatermark({ tenantId, kind: 'rule-fired', id: rule.id });
      return {
        ruleId: rule.id,
        workflowId: rule.workflowId,
        enabled: rule.enabled,
        triggerCount: records.filter(
          (record) => record.source.kind === 'rule' && record.source.ruleId === rule.id,
        ).length,
        lastTriggeredAt: lastFiredMs === undefined ? null : new Date(lastFiredMs).toISOString(),
      };
    });

    const workflows = tenant.workflows.map((workflow): WorkflowStatus => {
      const runs = records.filter((record) => record.workflowId === workflow.id);
      const lastRunAt = runs.reduce<string | null>(
        (latest, record) => (latest === null || record.startedAt > latest ? record.startedAt : latest),
        null,
      );
      let nextDue: Date | null = null;
      if (workflow.enabled) {
        for (const schedule of tenant.schedules) {
          if (!schedule.enabled || schedule.workflowId !== workflow.id) {
            continue;
          }
          const due = this.scheduler.nextDueAt(tenantId, schedule.id);
          if (due !== null && (nextDue === null || due < nextDue)) {
            nextDue = due;
          }
        }
      }

      return {
        workflowId: workflow.id,
        name: workflow.name,
        enabled: workflow.enabled,
        runCount: runs.length,
        successCount: runs.filter((record) => record.status === 'completed').length,
        partialCount: runs.filter((record) => record.status === 'partially-completed').length,
        failureCount: runs.filter((record) => record.status === 'failed').length,
        lastRunAt,
        nextRunAt: nextDue === null ? null : nextDue.toISOString(),
      };
    });

    return {
      tenantId,
      configVersion: tenant.configVersion,
      totalRules: rules.length,
      enabledRules: rules.filter((rule) => rule.enabled).length,
      totalWorkflows: workflows.length,
      enabledWorkflows: workflows.filter((workflow) => workflow.enabled).length,
      rules,
      workflows,
    };
  }

  pendingTriggers(tenantId: string): PendingTrigger[] {
    return this.queue.pending(tenantId);
  }

  schedulerResolutionMs(): number {
    return this.scheduler.minimumResolutionMs();
  }

  drain(): Promise<void> {
    return this.queue.drain();
  }

  private async handle(trigger: TriggerEvent): Promise<void> {
    let record: ExecutionRecord;
    try {
      record = await this.executor.execute(trigger);
    } catch (error) {
      if (error instanceof IsolationViolationError) {
        await this.reportIsolationViolation(error, trigger.tenantId, trigger.workflowId);
        return;
      }

      if (error instanceof TenantNotFoundError) {
        this.logger.warn('trigger dropped, tenant not active', {
          tenantId: trigger.tenantId,
          triggerId: trigger.id,
        });
        return;
      }

      throw error;
    }

    // A duplicate trigger gets the earlier record back; it was already classified.
    if (record.triggerId !== trigger.id) {
      return;
    }

    const alert = this.escalation.classify(record);
    if (alert !== null) {
      await this.escalation.raise(alert);
    }
  }

  private async reportIsolationViolation(
    error: IsolationViolationError,
    tenantId: string,
    workflowId?: string,
  ): Promise<void> {
    this.logger.fatal('tenant isolation violation', {
      tenantId,
      expectedTenantId: error.expectedTenantId,
      actualTenantId: error.actualTenantId,
      reason: errorMessage(error),
    });
    await this.escalation.raiseInternal({
      tenantId,
      message: error.message,
      ...(workflowId === undefined ? {} : { workflowId }),
    });
  }
}
