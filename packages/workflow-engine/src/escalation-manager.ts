import { randomUUID } from 'node:crypto';

import { errorMessage, type Logger, type NotificationDeliveryResult } from '@wellness-automation/shared';

import type { TenantRegistry } from './tenant-registry.js';
import type {
  Alert,
  AlertState,
  EscalationChannel,
  EscalationPolicy,
  ExecutionRecord,
  ExecutionStatus,
  Severity,
} from './types.js';

export interface NotificationRequest {
  tenantId: string;
  alert: Alert;
  contact: string;
  channel: EscalationChannel;
}

export interface NotificationSender {
  send(request: NotificationRequest): Promise<NotificationDeliveryResult>;
}

export class AlertNotFoundError extends Error {
  constructor(public readonly alertId: string) {
    super(`Alert not found: ${alertId}`);
    this.name = 'AlertNotFoundError';
  }
}

export interface InternalAlertInput {
  tenantId: string;
  message: string;
  executionId?: string;
  workflowId?: string;
}

export interface EscalationManagerDependencies {
  registry: TenantRegistry;
  sender: NotificationSender;
  logger: Logger;
  operatorContact: string;
  /** Upper bound on one send; a send still running at the bound counts as failed. */
  deliveryTimeoutMs?: number;
  /** How long acknowledged and expired alerts stay listable. */
  retentionMs?: number;
  clock?: () => Date;
}

export const DEFAULT_DELIVERY_TIMEOUT_MS = 10_000;
export const DEFAULT_ALERT_RETENTION_MS = 7 * 24 * 60 * 60_000;

const SEVERITY_RANK: Record<Severity, number> = { info: 0, warning: 1, critical: 2 };

export function maxSeverity(left: Severity, right: Severity): Severity {
  return SEVERITY_RANK[left] >= SEVERITY_RANK[right] ? left : right;
}

/**
 * Alert severity for a terminal execution, or null when no alert is due.
 * `tag` is the higher of the trigger's and the workflow's severity.
 */
export function alertSeverityFor(status: ExecutionStatus, tag: Severity): Severity | null {
  switch (status) {
    case 'failed':
      return tag === 'critical' ? 'critical' : 'warning';
    case 'partially-completed':
      return SEVERITY_RANK[tag] >= SEVERITY_RANK.warning ? 'warning' : 'info';
    case 'completed':
      return null;
    default:
      return null;
  }
}

const INTERNAL_POLICY_TIMINGS = {
  renotifyIntervalMs: 15 * 60_000,
  escalationDelayMs: 30 * 60_000,
  maxDeliveryAttempts: 5,
  expireAfterMs: 72 * 60 * 60_000,
} as const;

function isOpen(alert: Alert): boolean {
  return alert.state === 'pending' || alert.state === 'notified';
}

function closedAtMs(alert: Alert): number | null {
  const closedAt = alert.acknowledgedAt ?? alert.expiredAt;
  return closedAt === undefined ? null : new Date(closedAt).getTime();
}

export class EscalationManager {
  private readonly alerts = new Map<string, Alert>();
  // Alerts with a send in progress; ticks leave them alone.
  private readonly delivering = new Set<string>();
  private readonly registry: TenantRegistry;
  private readonly sender: NotificationSender;
  private readonly logger: Logger;
  private readonly internalPolicy: EscalationPolicy;
  private readonly deliveryTimeoutMs: number;
  private readonly retentionMs: number;
  private readonly clock: () => Date;

  constructor(dependencies: EscalationManagerDependencies) {
    this.registry = dependencies.registry;
    this.sender = dependencies.sender;
    this.logger = dependencies.logger.child({ component: 'escalation-manager' });
    this.internalPolicy = {
      channel: 'pager',
      primaryContact: dependencies.operatorContact,
      ...INTERNAL_POLICY_TIMINGS,
    };
    this.deliveryTimeoutMs = dependencies.deliveryTimeoutMs ?? DEFAULT_DELIVERY_TIMEOUT_MS;
    this.retentionMs = dependencies.retentionMs ?? DEFAULT_ALERT_RETENTION_MS;
    this.clock = dependencies.clock ?? (() => new Date());
  }

  classify(record: ExecutionRecord): Alert | null {
    const severity = alertSeverityFor(record.status, maxSeverity(record.severity, record.workflowSeverity));
    if (severity === null) {
      return null;
    }

    const cause = record.failureCause === undefined ? '' : ` (${record.failureCause})`;
    return {
      id: randomUUID(),
      tenantId: record.tenantId,
      kind: 'tenant',
      severity,
      executionId: record.id,
      workflowId: record.workflowId,
      message: `Workflow ${record.workflowId} ${record.status}${cause}`,
      state: 'pending',
      createdAt: this.clock().toISOString(),
      deliveryAttempts: 0,
      undeliverable: false,
    };
  }

  async raise(alert: Alert): Promise<Alert> {
    this.alerts.set(alert.id, alert);
    this.logger.info('alert raised', {
      tenantId: alert.tenantId,
      alertId: alert.id,
      severity: alert.severity,
      executionId: alert.executionId,
    });

    return this.whileDelivering(alert.id, () => this.attemptDelivery(alert, this.clock()));
  }

  async raiseInternal(input: InternalAlertInput): Promise<Alert> {
    this.logger.fatal('internal alert', { tenantId: input.tenantId, message: input.message });
    return this.raise({
      id: randomUUID(),
      tenantId: input.tenantId,
      kind: 'internal',
      severity: 'critical',
      executionId: input.executionId ?? '',
      workflowId: input.workflowId ?? '',
      message: input.message,
      state: 'pending',
      createdAt: this.clock().toISOString(),
      deliveryAttempts: 0,
      undeliverable: false,
    });
  }

  /**
   * Drives every open alert forward: expiry, delivery retries, critical
   * re-notification and the one-time secondary escalation. Closed alerts
   * older than the retention window are dropped.
   */
  async tick(now: Date): Promise<void> {
    this.prune(now);

    for (const alertId of Array.from(this.alerts.keys())) {
      const alert = this.alerts.get(alertId);
      if (alert === undefined || !isOpen(alert) || this.delivering.has(alertId)) {
        continue;
      }

      const policy = this.policyFor(alert);
      if (policy === null) {
        continue;
      }

      const ageMs = now.getTime() - new Date(alert.createdAt).getTime();
      if (ageMs >= policy.expireAfterMs) {
        this.update({ ...alert, state: 'expired', expiredAt: now.toISOString() });
        this.logger.info('alert expired', { tenantId: alert.tenantId, alertId: alert.id });
        continue;
      }

      await this.whileDelivering(alertId, () => this.advance(alert, policy, ageMs, now));
    }
  }

  acknowledge(tenantId: string, alertId: string, acknowledgedBy: string): Alert {
    const alert = this.alerts.get(alertId);
    if (alert === undefined || alert.tenantId !== tenantId || alert.kind !== 'tenant') {
      throw new AlertNotFoundError(alertId);
    }

    if (!isOpen(alert)) {
      return alert;
    }

    const updated = this.update({
      ...alert,
      state: 'acknowledged',
      acknowledgedAt: this.clock().toISOString(),
      acknowledgedBy,
    });
    this.logger.info('alert acknowledged', { tenantId, alertId, acknowledgedBy });
    return updated;
  }

  acknowledgeInternal(alertId: string, acknowledgedBy: string): Alert {
    const alert = this.alerts.get(alertId);
    if (alert === undefined || alert.kind !== 'internal') {
      throw new AlertNotFoundError(alertId);
    }

    return isOpen(alert)
      ? this.update({ ...alert, state: 'acknowledged', acknowledgedAt: this.clock().toISOString(), acknowledgedBy })
      : alert;
  }

  /** Tenant-facing alerts only; internal alerts are listed through `listInternalAlerts`. */
  listAlerts(tenantId: string, state?: AlertState): Alert[] {
    return Array.from(this.alerts.values()).filter(
      (alert) =>
        alert.tenantId === tenantId && alert.kind === 'tenant' && (state === undefined || alert.state === state),
    );
  }

  listInternalAlerts(state?: AlertState): Alert[] {
    return Array.from(this.alerts.values()).filter(
      (alert) => alert.kind === 'internal' && (state === undefined || alert.state === state),
    );
  }

  private policyFor(alert: Alert): EscalationPolicy | null {
    if (alert.kind === 'internal') {
      return this.internalPolicy;
    }

    const tenant = this.registry.find(alert.tenantId);
    return tenant === null ? null : tenant.escalation;
  }

  private async whileDelivering<T>(alertId: string, work: () => Promise<T>): Promise<T> {
    this.delivering.add(alertId);
    try {
      return await work();
    } finally {
      this.delivering.delete(alertId);
    }
  }

  // The stored alert may have been acknowledged while a send was awaited.
  private latest(alert: Alert): Alert {
    return this.alerts.get(alert.id) ?? alert;
  }

  private async advance(alert: Alert, policy: EscalationPolicy, ageMs: number, now: Date): Promise<void> {
    let current = alert;
    if (current.state === 'pending' && !current.undeliverable) {
      current = await this.attemptDelivery(current, now);
    } else if (current.severity === 'critical' && current.state === 'notified') {
      current = await this.renotifyIfDue(current, policy, now);
    }

    if (
      isOpen(current) &&
      current.severity === 'critical' &&
      current.escalatedAt === undefined &&
      policy.secondaryContact !== undefined &&
      ageMs >= policy.escalationDelayMs
    ) {
      await this.escalate(current, policy.secondaryContact, policy.channel, now);
    }
  }

  private async attemptDelivery(alert: Alert, now: Date): Promise<Alert> {
    const policy = this.policyFor(alert);
    if (policy === null) {
      this.logger.warn('no escalation policy for alert', { tenantId: alert.tenantId, alertId: alert.id });
      return alert;
    }

    const delivered = await this.send(alert, policy.primaryContact, policy.channel);
    const latest = this.latest(alert);
    if (!isOpen(latest)) {
      return latest;
    }

    const deliveryAttempts = latest.deliveryAttempts + 1;
    const at = now.toISOString();

    if (delivered) {
      return this.update({ ...latest, state: 'notified', deliveryAttempts, lastAttemptAt: at, lastNotifiedAt: at });
    }

    const undeliverable = deliveryAttempts >= policy.maxDeliveryAttempts;
    if (undeliverable) {
      this.logger.error('alert undeliverable', {
        tenantId: alert.tenantId,
        alertId: alert.id,
        severity: alert.severity,
        deliveryAttempts,
      });
    }

    return this.update({ ...latest, deliveryAttempts, lastAttemptAt: at, undeliverable });
  }

  private async renotifyIfDue(alert: Alert, policy: EscalationPolicy, now: Date): Promise<Alert> {
    const lastNotifiedMs = new Date(alert.lastNotifiedAt ?? alert.createdAt).getTime();
    if (now.getTime() - lastNotifiedMs < policy.renotifyIntervalMs) {
      return alert;
    }

    const delivered = await this.send(alert, policy.primaryContact, policy.channel);
    const latest = this.latest(alert);
    if (!isOpen(latest)) {
      return latest;
    }

    const at = now.toISOString();
    return this.update(
      delivered ? { ...latest, lastAttemptAt: at, lastNotifiedAt: at } : { ...latest, lastAttemptAt: at },
    );
  }

  private async escalate(alert: Alert, contact: string, channel: EscalationChannel, now: Date): Promise<void> {
    this.update({ ...this.latest(alert), escalatedAt: now.toISOString() });
    const delivered = await this.send(alert, contact, channel);
    this.logger.warn('alert escalated to secondary contact', {
      tenantId: alert.tenantId,
      alertId: alert.id,
      delivered,
    });
  }

  private async send(alert: Alert, contact: string, channel: EscalationChannel): Promise<boolean> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<NotificationDeliveryResult>((resolve) => {
      timer = setTimeout(
        () => resolve({ status: 'failed', reason: `Delivery timed out after ${this.deliveryTimeoutMs}ms` }),
        this.deliveryTimeoutMs,
      );
    });

    try {
      const result = await Promise.race([
        this.sender.send({ tenantId: alert.tenantId, alert, contact, channel }),
        timeout,
      ]);
      if (result.status === 'failed') {
        this.logger.warn('alert delivery failed', {
          tenantId: alert.tenantId,
          alertId: alert.id,
          ...(result.reason === undefined ? {} : { reason: result.reason }),
        });
      }
      return result.status === 'delivered';
    } catch (error) {
      this.logger.warn('alert delivery failed', {
        tenantId: alert.tenantId,
        alertId: alert.id,
        reason: errorMessage(error),
      });
      return false;
    } finally {
      clearTimeout(timer);
    }
  }

  private prune(now: Date): void {
    for (const alert of Array.from(this.alerts.values())) {
      const closedAt = closedAtMs(alert);
      if (closedAt !== null && now.getTime() - closedAt >= this.retentionMs) {
        this.alerts.delete(alert.id);
      }
    }
  }

  private update(alert: Alert): Alert {
    this.alerts.set(alert.id, alert);
    return alert;
  }
}
