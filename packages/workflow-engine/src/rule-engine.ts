import { randomUUID } from 'node:crypto';

import type { Logger, MetricSnapshot } from '@wellness-automation/shared';

import { assertSameTenant } from './isolation-guard.js';
import { workflowEnabled, type TenantRegistry, type WatermarkKey } from './tenant-registry.js';
import type { AutomationRule, RuleOperator, TriggerEvent } from './types.js';

export interface RuleEngineDependencies {
  registry: TenantRegistry;
  logger: Logger;
}

export function evaluatePredicate(operator: RuleOperator, value: number, threshold: number): boolean {
  switch (operator) {
    case '<':
      return value < threshold;
    case '<=':
      return value <= threshold;
    case '>':
      return value > threshold;
    case '>=':
      return value >= threshold;
    case '==':
      return value === threshold;
    case '!=':
      return value !== threshold;
    default:
      return false;
  }
}

export function ruleDedupKey(tenantId: string, ruleId: string, timestamp: string): string {
  return `rule:${tenantId}:${ruleId}:${timestamp}`;
}

export class RuleEngine {
  private readonly registry: TenantRegistry;
  private readonly logger: Logger;

  constructor(dependencies: RuleEngineDependencies) {
    this.registry = dependencies.registry;
    this.logger = dependencies.logger.child({ component: 'rule-engine' });
  }

  /**
   * Applies every enabled rule of the tenant, in definition order, to the
   * snapshot. A rule whose metric is missing from the snapshot is skipped.
   * Cooldown is measured against the snapshot timestamp.
   */
  evaluate(tenantId: string, snapshot: MetricSnapshot): TriggerEvent[] {
    assertSameTenant(tenantId, snapshot.tenantId, 'metric snapshot');
    const tenant = this.registry.get(tenantId);
    const observedAtMs = new Date(snapshot.timestamp).getTime();
    const triggers: TriggerEvent[] = [];

    for (const rule of tenant.rules) {
      if (!rule.enabled || !workflowEnabled(tenant, rule.workflowId)) {
        continue;
      }

      const value = snapshot.metrics[rule.metricKey];
      if (value === undefined) {
        this.logger.trace('rule skipped, metric absent', { tenantId, ruleId: rule.id, metricKey: rule.metricKey });
        continue;
      }

      if (!evaluatePredicate(rule.operator, value, rule.threshold)) {
        continue;
      }

      if (!this.claimFire(tenantId, rule, observedAtMs)) {
        this.logger.debug('rule in cooldown', { tenantId, ruleId: rule.id });
        continue;
      }

      triggers.push({
        id: randomUUID(),
        tenantId,
        workflowId: rule.workflowId,
        source: { kind: 'rule', ruleId: rule.id },
        severity: rule.severity,
        occurredAt: snapshot.timestamp,
        dedupKey: ruleDedupKey(tenantId, rule.id, snapshot.timestamp),
        payload: { metricKey: rule.metricKey, value, threshold: rule.threshold, operator: rule.operator },
      });
      this.logger.info('rule fired', { tenantId, ruleId: rule.id, workflowId: rule.workflowId, value });
    }

    return triggers;
  }

  private claimFire(tenantId: string, rule: AutomationRule, observedAtMs: number): boolean {
    const key: WatermarkKey = { tenantId, kind: 'rule-fired', id: rule.id };
    const lastFiredMs = this.registry.readWatermark(key);
    if (lastFiredMs !== undefined && observedAtMs - lastFiredMs < rule.cooldownMs) {
      return false;
    }

    return this.registry.compareAndSetWatermark(key, lastFiredMs, observedAtMs);
  }
}
