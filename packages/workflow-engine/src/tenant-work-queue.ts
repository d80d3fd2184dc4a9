import { errorMessage, type Logger } from '@wellness-automation/shared';

import type { PendingTrigger, TriggerEvent } from './types.js';

export interface TenantWorkQueueOptions {
  concurrency: number;
  handler: (trigger: TriggerEvent) => Promise<void>;
  logger: Logger;
  clock?: () => Date;
}

/**
 * Per-tenant FIFO with a global worker limit. A tenant has at most one
 * trigger in flight, so its executions finish in dequeue order; different
 * tenants run in parallel up to `concurrency`.
 */
export class TenantWorkQueue {
  private readonly queues = new Map<string, PendingTrigger[]>();
  private readonly readyTenants: string[] = [];
  private readonly concurrency: number;
  private readonly handler: (trigger: TriggerEvent) => Promise<void>;
  private readonly logger: Logger;
  private readonly clock: () => Date;
  private running = 0;
  private idleWaiters: Array<() => void> = [];

  constructor(options: TenantWorkQueueOptions) {
    if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
      throw new RangeError('concurrency must be a positive integer');
    }

    this.concurrency = options.concurrency;
    this.handler = options.handler;
    this.logger = options.logger.child({ component: 'tenant-work-queue' });
    this.clock = options.clock ?? (() => new Date());
  }

  enqueue(trigger: TriggerEvent): void {
    const queue = this.queues.get(trigger.tenantId) ?? [];
    queue.push({ trigger, enqueuedAt: this.clock().toISOString(), state: 'queued' });
    this.queues.set(trigger.tenantId, queue);

    if (queue.length === 1) {
      this.readyTenants.push(trigger.tenantId);
    }

    this.pump();
  }

  pending(tenantId: string): PendingTrigger[] {
    return (this.queues.get(tenantId) ?? []).map((entry) => ({ ...entry }));
  }

  size(): number {
    let total = 0;
    for (const queue of this.queues.values()) {
      total += queue.length;
    }
    return total;
  }

  drain(): Promise<void> {
    if (this.size() === 0) {
      return Promise.resolve();
    }

    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  private pump(): void {
    while (this.running < this.concurrency) {
      const tenantId = this.readyTenants.shift();
      if (tenantId === undefined) {
        return;
      }

      const head = this.queues.get(tenantId)?.[0];
      if (head === undefined) {
        continue;
      }

      head.state = 'running';
      this.running += 1;
      void this.process(tenantId, head);
    }
  }

  private async process(tenantId: string, entry: PendingTrigger): Promise<void> {
    try {
      await this.handler(entry.trigger);
    } catch (error) {
      this.logger.error('trigger handler failed', {
        tenantId,
        triggerId: entry.trigger.id,
        reason: errorMessage(error),
      });
    }

    this.running -= 1;
    const queue = this.queues.get(tenantId) ?? [];
    queue.shift();
    if (queue.length === 0) {
      this.queues.delete(tenantId);
    } else {
      this.readyTenants.push(tenantId);
    }

    this.pump();

    if (this.size() === 0) {
      const waiters = this.idleWaiters;
      this.idleWaiters = [];
      waiters.forEach((resolve) => resolve());
    }
  }
}
