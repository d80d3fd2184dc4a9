import { describe, expect, it } from 'vitest';

import { TenantWorkQueue, type TriggerEvent } from '../../index.js';
import { silentLogger } from '../fixtures.js';

function trigger(id: string, tenantId: string): TriggerEvent {
  return {
    id,
    tenantId,
    workflowId: 'recovery-check',
    source: { kind: 'manual', requestedBy: 'test' },
    severity: 'info',
    occurredAt: '2026-03-02T00:00:00.000Z',
    dedupKey: `manual:${tenantId}:${id}`,
    payload: {},
  };
}

function gatedHandler() {
  const started: string[] = [];
  const gates = new Map<string, () => void>();
  const handler = (event: TriggerEvent) =>
    new Promise<void>((resolve) => {
      started.push(event.id);
      gates.set(event.id, resolve);
    });
  const release = async (id: string) => {
    gates.get(id)?.();
    await new Promise((resolve) => setTimeout(resolve, 0));
  };
  return { started, handler, release };
}

describe('tenant work queue', () => {
  it('runs one trigger per tenant at a time while tenants proceed in parallel', async () => {
    const { started, handler, release } = gatedHandler();
    const queue = new TenantWorkQueue({ concurrency: 2, handler, logger: silentLogger });

    queue.enqueue(trigger('a1', 'tenant-a'));
    queue.enqueue(trigger('a2', 'tenant-a'));
    queue.enqueue(trigger('b1', 'tenant-b'));

    expect(started).toEqual(['a1', 'b1']);
    expect(queue.pending('tenant-a').map((entry) => `${entry.trigger.id}:${entry.state}`)).toEqual([
      'a1:running',
      'a2:queued',
    ]);

    await release('a1');
    expect(started).toEqual(['a1', 'b1', 'a2']);
    expect(queue.pending('tenant-a')).toHaveLength(1);
  });

  it('respects the global worker limit', async () => {
    const { started, handler, release } = gatedHandler();
    const queue = new TenantWorkQueue({ concurrency: 1, handler, logger: silentLogger });

    queue.enqueue(trigger('a1', 'tenant-a'));
    queue.enqueue(trigger('b1', 'tenant-b'));
    expect(started).toEqual(['a1']);

    await release('a1');
    expect(started).toEqual(['a1', 'b1']);
  });

  it('keeps going after a handler failure and drains', async () => {
    const handled: string[] = [];
    const queue = new TenantWorkQueue({
      concurrency: 2,
      logger: silentLogger,
      handler: async (event) => {
        handled.push(event.id);
        if (event.id === 'a1') {
          throw new Error('boom');
        }
      },
    });

    queue.enqueue(trigger('a1', 'tenant-a'));
    queue.enqueue(trigger('a2', 'tenant-a'));
    await queue.drain();

    expect(handled).toEqual(['a1', 'a2']);
    expect(queue.size()).toBe(0);
  });

  it('rejects a non-positive worker limit', () => {
    expect(() => new TenantWorkQueue({ concurrency: 0, handler: async () => undefined, logger: silentLogger })).toThrow(
      RangeError,
    );
  });
});
