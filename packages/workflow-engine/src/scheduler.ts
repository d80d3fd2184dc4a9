import { randomUUID } from 'node:crypto';

import type { Logger } from '@wellness-automation/shared';

import { MINUTE_MS, nextDueAfter, recurrencePeriodMs } from './recurrence.js';
import { workflowEnabled, type TenantRegistry, type WatermarkKey } from './tenant-registry.js';
import type { ScheduleSpec, Tenant, TriggerEvent } from './types.js';

export interface SchedulerDependencies {
  registry: TenantRegistry;
  logger: Logger;
}

export const MAX_TICK_RESOLUTION_MS = 15 * MINUTE_MS;

export function scheduleDedupKey(tenantId: string, scheduleId: string, dueAt: string): string {
  return `schedule:${tenantId}:${scheduleId}:${dueAt}`;
}

export class Scheduler {
  private readonly registry: TenantRegistry;
  private readonly logger: Logger;

  constructor(dependencies: SchedulerDependencies) {
    this.registry = dependencies.registry;
    this.logger = dependencies.logger.child({ component: 'scheduler' });
  }

  /**
   * Emits one trigger per schedule whose next-due instant is at or before
   * `now`, then moves next-due past `now`. A schedule that missed several
   * periods fires once.
   */
  tick(now: Date): TriggerEvent[] {
    const triggers: TriggerEvent[] = [];

    for (const tenant of this.registry.listActiveTenants()) {
      for (const schedule of tenant.schedules) {
        if (!schedule.enabled) {
          continue;
        }

        const trigger = this.fireIfDue(tenant, schedule, now);
        if (trigger !== null) {
          triggers.push(trigger);
        }
      }
    }

    return triggers;
  }

  nextDueAt(tenantId: string, scheduleId: string): Date | null {
    const dueMs = this.registry.readWatermark({ tenantId, kind: 'schedule-due', id: scheduleId });
    return dueMs === undefined ? null : new Date(dueMs);
  }

  /** Tick interval the driver should use: the finest configured period, capped at 15 minutes. */
  minimumResolutionMs(): number {
    let resolution = MAX_TICK_RESOLUTION_MS;
    for (const tenant of this.registry.listActiveTenants()) {
      for (const schedule of tenant.schedules) {
        if (schedule.enabled) {
          resolution = Math.min(resolution, recurrencePeriodMs(schedule.recurrence));
        }
      }
    }

    return resolution;
  }

  private fireIfDue(tenant: Tenant, schedule: ScheduleSpec, now: Date): TriggerEvent | null {
    const key: WatermarkKey = { tenantId: tenant.id, kind: 'schedule-due', id: schedule.id };
    const dueMs = this.registry.readWatermark(key);
    const nowMs = now.getTime();
    if (dueMs === undefined || dueMs > nowMs) {
      return null;
    }

    const nextMs = nextDueAfter(schedule.recurrence, tenant.timeZone, dueMs, nowMs);
    if (!this.registry.compareAndSetWatermark(key, dueMs, nextMs)) {
      this.logger.debug('schedule already claimed', { tenantId: tenant.id, scheduleId: schedule.id });
      return null;
    }

    const dueAt = new Date(dueMs).toISOString();
    if (!workflowEnabled(tenant, schedule.workflowId)) {
      this.logger.debug('schedule passed, workflow disabled', {
        tenantId: tenant.id,
        scheduleId: schedule.id,
        dueAt,
      });
      return null;
    }

    if (nowMs - dueMs >= recurrencePeriodMs(schedule.recurrence)) {
      this.logger.warn('schedule overdue, firing single catch-up', {
        tenantId: tenant.id,
        scheduleId: schedule.id,
        dueAt,
      });
    }

    this.logger.info('schedule fired', {
      tenantId: tenant.id,
      scheduleId: schedule.id,
      workflowId: schedule.workflowId,
      dueAt,
      nextDueAt: new Date(nextMs).toISOString(),
    });

    return {
      id: randomUUID(),
      tenantId: tenant.id,
      workflowId: schedule.workflowId,
      source: { kind: 'schedule', scheduleId: schedule.id, dueAt },
      severity: this.workflowSeverity(tenant, schedule.workflowId),
      occurredAt: now.toISOString(),
      dedupKey: scheduleDedupKey(tenant.id, schedule.id, dueAt),
      payload: { dueAt },
    };
  }

  private workflowSeverity(tenant: Tenant, workflowId: string): TriggerEvent['severity'] {
    return tenant.workflows.find((workflow) => workflow.id === workflowId)?.severity ?? 'info';
  }
}
