import { describe, expect, it } from 'vitest';

import type { NotificationDeliveryResult } from '@wellness-automation/shared';

import {
  AlertNotFoundError,
  EscalationManager,
  TenantRegistry,
  alertSeverityFor,
  type EscalationManagerDependencies,
  type ExecutionRecord,
  type NotificationRequest,
  type NotificationSender,
} from '../../index.js';
import { fixedClock, silentLogger, tenantConfig } from '../fixtures.js';

const T0 = '2026-03-02T00:00:00.000Z';
const minutes = (count: number) => new Date(Date.parse(T0) + count * 60_000);

class RecordingSender implements NotificationSender {
  readonly requests: NotificationRequest[] = [];

  constructor(private readonly respond: () => Promise<NotificationDeliveryResult> = async () => ({ status: 'delivered' })) {}

  async send(request: NotificationRequest): Promise<NotificationDeliveryResult> {
    this.requests.push(request);
    return this.respond();
  }

  contacts(): string[] {
    return this.requests.map((request) => request.contact);
  }
}

function executionRecord(overrides: Partial<ExecutionRecord> = {}): ExecutionRecord {
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
    steps: [],
    status: 'failed',
    failureCause: 'transient_exhausted',
    startedAt: T0,
    endedAt: T0,
    ...overrides,
  };
}

function setup(
  sender: NotificationSender = new RecordingSender(),
  options: Pick<Partial<EscalationManagerDependencies>, 'deliveryTimeoutMs' | 'retentionMs'> = {},
) {
  const registry = new TenantRegistry({ logger: silentLogger });
  registry.create(
    'tenant-a',
    tenantConfig({
      escalation: {
        channel: 'sms',
        primaryContact: 'primary-contact',
        secondaryContact: 'secondary-contact',
        renotifyIntervalMs: 10 * 60_000,
        escalationDelayMs: 30 * 60_000,
      },
    }),
  );
  const manager = new EscalationManager({
    registry,
    sender,
    logger: silentLogger,
    operatorContact: 'operator-contact',
    clock: fixedClock(T0).now,
    ...options,
  });
  return { registry, manager };
}

async function raiseFor(manager: EscalationManager, record: ExecutionRecord) {
  const alert = manager.classify(record);
  if (alert === null) {
    throw new Error('expected an alert');
  }
  return manager.raise(alert);
}

describe('alert severity decision table', () => {
  it('maps execution status and severity tag to alert severity', () => {
    expect(alertSeverityFor('failed', 'critical')).toBe('critical');
    expect(alertSeverityFor('failed', 'warning')).toBe('warning');
    expect(alertSeverityFor('failed', 'info')).toBe('warning');
    expect(alertSeverityFor('partially-completed', 'critical')).toBe('warning');
    expect(alertSeverityFor('partially-completed', 'info')).toBe('info');
    expect(alertSeverityFor('completed', 'critical')).toBeNull();
  });
});

describe('escalation manager', () => {
  it('keeps a critical rule tag when the workflow itself is tagged info', () => {
    const { manager } = setup();

    const alert = manager.classify(executionRecord());

    expect(alert).toMatchObject({
      tenantId: 'tenant-a',
      kind: 'tenant',
      severity: 'critical',
      executionId: 'exec-1',
      state: 'pending',
      message: 'Workflow recovery-check failed (transient_exhausted)',
    });
    expect(manager.classify(executionRecord({ status: 'completed' }))).toBeNull();
  });

  it('escalates an unacknowledged critical alert to the secondary contact exactly once', async () => {
    const sender = new RecordingSender();
    const { manager } = setup(sender);

    const alert = await raiseFor(manager, executionRecord());
    expect(alert.state).toBe('notified');
    expect(sender.requests[0]).toMatchObject({ tenantId: 'tenant-a', contact: 'primary-contact', channel: 'sms' });

    await manager.tick(minutes(29));
    expect(sender.contacts()).toEqual(['primary-contact', 'primary-contact']);

    await manager.tick(minutes(31));
    await manager.tick(minutes(45));

    expect(sender.contacts().filter((contact) => contact === 'secondary-contact')).toHaveLength(1);
    expect(manager.listAlerts('tenant-a')[0]?.escalatedAt).toBe(minutes(31).toISOString());
  });

  it('stops the notification cycle once acknowledged', async () => {
    const sender = new RecordingSender();
    const { manager } = setup(sender);
    const alert = await raiseFor(manager, executionRecord());

    const acknowledged = manager.acknowledge('tenant-a', alert.id, 'coach-1');
    await manager.tick(minutes(60));

    expect(acknowledged).toMatchObject({ state: 'acknowledged', acknowledgedBy: 'coach-1', acknowledgedAt: T0 });
    expect(sender.requests).toHaveLength(1);
  });

  it('does not re-notify alerts below critical', async () => {
    const sender = new RecordingSender();
    const { manager } = setup(sender);
    await raiseFor(manager, executionRecord({ severity: 'warning' }));

    await manager.tick(minutes(120));

    expect(sender.requests).toHaveLength(1);
  });

  it('marks an alert undeliverable after the maximum delivery attempts', async () => {
    const sender = new RecordingSender(async () => ({ status: 'failed', reason: 'gateway down' }));
    const { manager } = setup(sender);
    await raiseFor(manager, executionRecord({ severity: 'warning' }));

    await manager.tick(minutes(1));
    await manager.tick(minutes(2));
    await manager.tick(minutes(3));

    const [alert] = manager.listAlerts('tenant-a');
    expect(sender.requests).toHaveLength(3);
    expect(alert).toMatchObject({ state: 'pending', deliveryAttempts: 3, undeliverable: true });
  });

  it('counts a throwing sender as a failed delivery', async () => {
    const sender = new RecordingSender(async () => {
      throw new Error('connection refused');
    });
    const { manager } = setup(sender);

    const alert = await raiseFor(manager, executionRecord({ severity: 'warning' }));

    expect(alert).toMatchObject({ state: 'pending', deliveryAttempts: 1, undeliverable: false });
  });

  it('expires alerts that stay unacknowledged past the policy window', async () => {
    const { manager } = setup();
    await raiseFor(manager, executionRecord({ severity: 'warning' }));

    await manager.tick(minutes(24 * 60));

    expect(manager.listAlerts('tenant-a', 'expired')).toHaveLength(1);
  });

  it('hides alerts from other tenants', async () => {
    const { manager, registry } = setup();
    registry.create('tenant-b', tenantConfig());
    const alert = await raiseFor(manager, executionRecord());

    expect(manager.listAlerts('tenant-b')).toEqual([]);
    expect(() => manager.acknowledge('tenant-b', alert.id, 'someone')).toThrow(AlertNotFoundError);
  });

  it('pages the operator for internal alerts without exposing them to the tenant', async () => {
    const sender = new RecordingSender();
    const { manager } = setup(sender);

    const alert = await manager.raiseInternal({ tenantId: 'tenant-a', message: 'isolation breach' });

    expect(alert).toMatchObject({ kind: 'internal', severity: 'critical', state: 'notified' });
    expect(sender.requests[0]).toMatchObject({ contact: 'operator-contact', channel: 'pager' });
    expect(manager.listAlerts('tenant-a')).toEqual([]);
    expect(manager.listInternalAlerts().map((entry) => entry.id)).toEqual([alert.id]);
    expect(manager.acknowledgeInternal(alert.id, 'operator').state).toBe('acknowledged');
  });

  it('keeps an acknowledgement made while a redelivery is in flight', async () => {
    let calls = 0;
    let finishRedelivery = (_result: NotificationDeliveryResult): void => undefined;
    const sender = new RecordingSender((): Promise<NotificationDeliveryResult> => {
      calls += 1;
      if (calls === 1) {
        return Promise.resolve({ status: 'failed', reason: 'gateway down' });
      }
      return new Promise((resolve) => {
        finishRedelivery = resolve;
      });
    });
    const { manager } = setup(sender);
    const alert = await raiseFor(manager, executionRecord());

    const redelivery = manager.tick(minutes(1));
    await manager.tick(minutes(2));
    expect(sender.requests).toHaveLength(2);

    manager.acknowledge('tenant-a', alert.id, 'coach-1');
    finishRedelivery({ status: 'delivered' });
    await redelivery;
    await manager.tick(minutes(40));

    expect(manager.listAlerts('tenant-a')[0]).toMatchObject({
      state: 'acknowledged',
      acknowledgedBy: 'coach-1',
      deliveryAttempts: 1,
    });
    expect(sender.contacts()).toEqual(['primary-contact', 'primary-contact']);
  });

  it('counts a send that outlasts the delivery timeout as failed', async () => {
    const sender = new RecordingSender(() => new Promise(() => undefined));
    const { manager } = setup(sender, { deliveryTimeoutMs: 20 });

    const alert = await raiseFor(manager, executionRecord({ severity: 'warning' }));
    await manager.tick(minutes(1));

    expect(alert).toMatchObject({ state: 'pending', deliveryAttempts: 1 });
    expect(manager.listAlerts('tenant-a')[0]?.deliveryAttempts).toBe(2);
  });

  it('drops closed alerts once the retention window has passed', async () => {
    const { manager } = setup(new RecordingSender(), { retentionMs: 60 * 60_000 });
    const closed = await raiseFor(manager, executionRecord({ severity: 'warning' }));
    const open = await raiseFor(manager, executionRecord({ id: 'exec-2', severity: 'warning' }));
    manager.acknowledge('tenant-a', closed.id, 'coach-1');

    await manager.tick(minutes(59));
    expect(manager.listAlerts('tenant-a')).toHaveLength(2);

    await manager.tick(minutes(60));
    expect(manager.listAlerts('tenant-a').map((alert) => alert.id)).toEqual([open.id]);
  });
});
