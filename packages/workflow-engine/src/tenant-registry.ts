import { z } from 'zod';

import type { Logger } from '@wellness-automation/shared';

import { initialDueAt } from './recurrence.js';
import { SERVICE_LEVEL_PROFILES } from './service-levels.js';
import type {
  AutomationRule,
  EscalationPolicy,
  ScheduleSpec,
  ServiceLevel,
  Tenant,
  TenantConfig,
  TenantConfigInput,
  WorkflowDefinition,
} from './types.js';
import {
  ConfigurationError,
  automationRuleSchema,
  parseConfig,
  scheduleSpecSchema,
  tenantConfigSchema,
  workflowDefinitionSchema,
  type EscalationPolicyInput,
} from './validation.js';

export class TenantNotFoundError extends Error {
  constructor(public readonly tenantId: string) {
    super(`Tenant not found or inactive: ${tenantId}`);
    this.name = 'TenantNotFoundError';
  }
}

export type WatermarkKind = 'rule-fired' | 'schedule-due';

export interface WatermarkKey {
  tenantId: string;
  kind: WatermarkKind;
  id: string;
}

export interface TenantRegistryDependencies {
  logger: Logger;
  clock?: () => Date;
}

const tenantIdSchema = z
  .string()
  .min(1)
  .max(128)
  .regex(/^[A-Za-z0-9][A-Za-z0-9._-]*$/, 'Tenant id may only contain letters, digits, ".", "_" and "-"');

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
    Object.freeze(value);
  }

  return value;
}

/** A workflow removed from the config counts as disabled. */
export function workflowEnabled(tenant: Tenant, workflowId: string): boolean {
  return tenant.workflows.some((workflow) => workflow.id === workflowId && workflow.enabled);
}

function watermarkId(key: WatermarkKey): string {
  return `${key.tenantId}\u0000${key.kind}\u0000${key.id}`;
}

function resolveEscalationPolicy(
  input: EscalationPolicyInput,
  serviceLevel: ServiceLevel,
): EscalationPolicy {
  const defaults = SERVICE_LEVEL_PROFILES[serviceLevel].escalation;
  return {
    channel: input.channel,
    primaryContact: input.primaryContact,
    ...(input.secondaryContact === undefined ? {} : { secondaryContact: input.secondaryContact }),
    renotifyIntervalMs: input.renotifyIntervalMs ?? defaults.renotifyIntervalMs,
    escalationDelayMs: input.escalationDelayMs ?? defaults.escalationDelayMs,
    maxDeliveryAttempts: input.maxDeliveryAttempts,
    expireAfterMs: input.expireAfterMs ?? defaults.expireAfterMs,
  };
}

function toConfigInput(tenant: Tenant): TenantConfigInput {
  return {
    name: tenant.name,
    serviceLevel: tenant.serviceLevel,
    timeZone: tenant.timeZone,
    rules: tenant.rules,
    schedules: tenant.schedules,
    workflows: tenant.workflows,
    escalation: tenant.escalation,
  };
}

function sameRecurrence(left: ScheduleSpec, right: ScheduleSpec): boolean {
  return JSON.stringify(left.recurrence) === JSON.stringify(right.recurrence) && left.startAt === right.startAt;
}

/**
 * Owns tenant configuration. Reads hand out frozen snapshots, so a caller that
 * captured a tenant keeps a consistent view while later writes swap in a new
 * snapshot. The only in-place mutable state is the watermark cells, which are
 * written through compare-and-set.
 */
export class TenantRegistry {
  private readonly snapshots = new Map<string, Tenant>();
  private readonly watermarks = new Map<string, number>();
  private readonly logger: Logger;
  private readonly clock: () => Date;

  constructor(dependencies: TenantRegistryDependencies) {
    this.logger = dependencies.logger.child({ component: 'tenant-registry' });
    this.clock = dependencies.clock ?? (() => new Date());
  }

  create(tenantId: string, input: TenantConfigInput): Tenant {
    parseConfig(tenantIdSchema, tenantId, 'Invalid tenant id');
    if (this.snapshots.has(tenantId)) {
      throw new ConfigurationError('Tenant already exists', { tenantId: `Tenant ${tenantId} already exists` });
    }

    return this.upsertConfig(tenantId, input);
  }

  get(tenantId: string): Tenant {
    const tenant = this.snapshots.get(tenantId);
    if (tenant === undefined || tenant.status !== 'active') {
      throw new TenantNotFoundError(tenantId);
    }

    return tenant;
  }

  find(tenantId: string): Tenant | null {
    return this.snapshots.get(tenantId) ?? null;
  }

  listActiveTenants(): Tenant[] {
    return Array.from(this.snapshots.values()).filter((tenant) => tenant.status === 'active');
  }

  upsertConfig(tenantId: string, input: TenantConfigInput): Tenant {
    parseConfig(tenantIdSchema, tenantId, 'Invalid tenant id');
    const config = parseConfig(tenantConfigSchema, input, 'Invalid tenant configuration');
    const previous = this.snapshots.get(tenantId);
    const now = this.clock();
    const timestamp = now.toISOString();

    const tenant = deepFreeze<Tenant>({
      id: tenantId,
      name: config.name,
      serviceLevel: config.serviceLevel,
      timeZone: config.timeZone,
      status: previous?.status ?? 'active',
      rules: config.rules,
      schedules: config.schedules,
      workflows: config.workflows,
      escalation: resolveEscalationPolicy(config.escalation, config.serviceLevel),
      configVersion: (previous?.configVersion ?? 0) + 1,
      createdAt: previous?.createdAt ?? timestamp,
      updatedAt: timestamp,
    });

    this.reconcileWatermarks(previous, tenant, config, now.getTime());
    this.snapshots.set(tenantId, tenant);

    this.logger.info(previous === undefined ? 'tenant created' : 'tenant config updated', {
      tenantId,
      configVersion: tenant.configVersion,
      serviceLevel: tenant.serviceLevel,
      rules: tenant.rules.length,
      schedules: tenant.schedules.length,
      workflows: tenant.workflows.length,
    });

    return tenant;
  }

  deactivate(tenantId: string): Tenant {
    const current = this.get(tenantId);
    const deactivated = deepFreeze<Tenant>({
      ...current,
      status: 'deactivated',
      updatedAt: this.clock().toISOString(),
    });
    this.snapshots.set(tenantId, deactivated);
    this.logger.info('tenant deactivated', { tenantId });
    return deactivated;
  }

  setServiceLevel(tenantId: string, serviceLevel: ServiceLevel): Tenant {
    const current = this.get(tenantId);
    return this.upsertConfig(tenantId, {
      ...toConfigInput(current),
      serviceLevel,
      escalation: {
        channel: current.escalation.channel,
        primaryContact: current.escalation.primaryContact,
        ...(current.escalation.secondaryContact === undefined
          ? {}
          : { secondaryContact: current.escalation.secondaryContact }),
        maxDeliveryAttempts: current.escalation.maxDeliveryAttempts,
      },
    });
  }

  addRule(tenantId: string, input: unknown): AutomationRule {
    const rule = parseConfig(automationRuleSchema, input, 'Invalid automation rule');
    const current = this.get(tenantId);
    if (current.rules.some((existing) => existing.id === rule.id)) {
      throw new ConfigurationError('Invalid automation rule', { id: `Duplicate id ${rule.id}` });
    }

    const updated = this.upsertConfig(tenantId, {
      ...toConfigInput(current),
      rules: [...current.rules, rule],
    });
    return this.requireRule(updated, rule.id);
  }

  setRuleEnabled(tenantId: string, ruleId: string, enabled: boolean): AutomationRule {
    const current = this.get(tenantId);
    this.requireRule(current, ruleId);

    const updated = this.upsertConfig(tenantId, {
      ...toConfigInput(current),
      rules: current.rules.map((rule) => (rule.id === ruleId ? { ...rule, enabled } : rule)),
    });
    return this.requireRule(updated, ruleId);
  }

  addSchedule(tenantId: string, input: unknown): ScheduleSpec {
    const schedule = parseConfig(scheduleSpecSchema, input, 'Invalid schedule');
    const current = this.get(tenantId);
    if (current.schedules.some((existing) => existing.id === schedule.id)) {
      throw new ConfigurationError('Invalid schedule', { id: `Duplicate id ${schedule.id}` });
    }

    this.upsertConfig(tenantId, {
      ...toConfigInput(current),
      schedules: [...current.schedules, schedule],
    });
    return schedule;
  }

  removeSchedule(tenantId: string, scheduleId: string): void {
    const current = this.get(tenantId);
    if (!current.schedules.some((schedule) => schedule.id === scheduleId)) {
      throw new ConfigurationError('Invalid schedule', { id: `Unknown schedule ${scheduleId}` });
    }

    this.upsertConfig(tenantId, {
      ...toConfigInput(current),
      schedules: current.schedules.filter((schedule) => schedule.id !== scheduleId),
    });
  }

  addWorkflow(tenantId: string, input: unknown): WorkflowDefinition {
    const workflow = parseConfig(workflowDefinitionSchema, input, 'Invalid workflow');
    const current = this.get(tenantId);
    if (current.workflows.some((existing) => existing.id === workflow.id)) {
      throw new ConfigurationError('Invalid workflow', { id: `Duplicate id ${workflow.id}` });
    }

    this.upsertConfig(tenantId, {
      ...toConfigInput(current),
      workflows: [...current.workflows, workflow],
    });
    return workflow;
  }

  setWorkflowEnabled(tenantId: string, workflowId: string, enabled: boolean): WorkflowDefinition {
    const current = this.get(tenantId);
    this.requireWorkflow(current, workflowId);

    const updated = this.upsertConfig(tenantId, {
      ...toConfigInput(current),
      workflows: current.workflows.map((workflow) => (workflow.id === workflowId ? { ...workflow, enabled } : workflow)),
    });
    return this.requireWorkflow(updated, workflowId);
  }

  readWatermark(key: WatermarkKey): number | undefined {
    return this.watermarks.get(watermarkId(key));
  }

  /**
   * Writes `next` only when the cell still holds `expected`. Returns false
   * when another producer moved the cell first.
   */
  compareAndSetWatermark(key: WatermarkKey, expected: number | undefined, next: number): boolean {
    const id = watermarkId(key);
    if (this.watermarks.get(id) !== expected) {
      return false;
    }

    this.watermarks.set(id, next);
    return true;
  }

  private requireWorkflow(tenant: Tenant, workflowId: string): WorkflowDefinition {
    const workflow = tenant.workflows.find((candidate) => candidate.id === workflowId);
    if (workflow === undefined) {
      throw new ConfigurationError('Invalid workflow', { id: `Unknown workflow ${workflowId}` });
    }

    return workflow;
  }

  private requireRule(tenant: Tenant, ruleId: string): AutomationRule {
    const rule = tenant.rules.find((candidate) => candidate.id === ruleId);
    if (rule === undefined) {
      throw new ConfigurationError('Invalid automation rule', { id: `Unknown rule ${ruleId}` });
    }

    return rule;
  }

  private reconcileWatermarks(
    previous: Tenant | undefined,
    next: Tenant,
    config: TenantConfig,
    nowMs: number,
  ): void {
    const ruleIds = new Set(config.rules.map((rule) => rule.id));
    for (const rule of previous?.rules ?? []) {
      if (!ruleIds.has(rule.id)) {
        this.watermarks.delete(watermarkId({ tenantId: next.id, kind: 'rule-fired', id: rule.id }));
      }
    }

    const previousSchedules = new Map((previous?.schedules ?? []).map((schedule) => [schedule.id, schedule]));
    const zoneChanged = previous !== undefined && previous.timeZone !== next.timeZone;

    for (const schedule of next.schedules) {
      const key: WatermarkKey = { tenantId: next.id, kind: 'schedule-due', id: schedule.id };
      const before = previousSchedules.get(schedule.id);
      previousSchedules.delete(schedule.id);

      const unchanged =
        before !== undefined &&
        sameRecurrence(before, schedule) &&
        !(zoneChanged && schedule.recurrence.kind !== 'interval') &&
        this.watermarks.has(watermarkId(key));
      if (unchanged) {
        continue;
      }

      const anchorMs = schedule.startAt === undefined ? nowMs : new Date(schedule.startAt).getTime();
      this.watermarks.set(watermarkId(key), initialDueAt(schedule.recurrence, next.timeZone, anchorMs));
    }

    for (const removed of previousSchedules.values()) {
      this.watermarks.delete(watermarkId({ tenantId: next.id, kind: 'schedule-due', id: removed.id }));
    }
  }
}
