import { describe, expect, it } from 'vitest';

import {
  CapabilityRegistry,
  TenantRegistry,
  UnknownCapabilityError,
  onboardingConfig,
} from '../../index.js';
import { silentLogger, succeeding } from '../fixtures.js';

describe('default automation', () => {
  it('onboards a basic tenant with the default workflows, rules and schedules', () => {
    const registry = new TenantRegistry({ logger: silentLogger });

    const tenant = registry.create(
      'tenant-a',
      onboardingConfig({
        name: 'Acme Wellness',
        serviceLevel: 'basic',
        timeZone: 'Europe/Paris',
        escalation: { channel: 'email', primaryContact: 'coach@example.test' },
      }),
    );

    expect(tenant.workflows.map((workflow) => workflow.id)).toEqual([
      'daily_health_check',
      'weekly_optimization',
      'proactive_monitoring',
      'recovery_protocol',
    ]);
    expect(tenant.rules.map((rule) => `${rule.metricKey} ${rule.operator} ${rule.threshold}`)).toEqual([
      'recovery_score < 30',
      'heart_rate_variability < 15',
    ]);
    expect(tenant.schedules.map((schedule) => schedule.recurrence.kind)).toEqual(['daily', 'weekly', 'interval']);
  });
});

describe('capability registry', () => {
  it('resolves registered capabilities by name', () => {
    const capabilities = new CapabilityRegistry([succeeding('notifier'), succeeding('data-collector')]);

    expect(capabilities.list()).toEqual(['data-collector', 'notifier']);
    expect(capabilities.resolve('notifier').name).toBe('notifier');
    expect(() => capabilities.resolve('sleep-optimizer')).toThrow(UnknownCapabilityError);
  });
});
