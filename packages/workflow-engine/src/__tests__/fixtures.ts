import type { Logger } from '@wellness-automation/shared';

import type { Capability, CapabilityOutcome, CapabilityRequest } from '../capabilities.js';
import { RetryExecutor } from '../retry-executor.js';
import type { TenantConfigInput } from '../types.js';

export const silentLogger: Logger = {
  child: () => silentLogger,
  trace: () => undefined,
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  fatal: () => undefined,
};

export function fixedClock(iso: string): { now: () => Date; set: (next: string) => void } {
  let current = new Date(iso);
  return {
    now: () => new Date(current.getTime()),
    set: (next) => {
      current = new Date(next);
    },
  };
}

export const immediateRetries = new RetryExecutor({
  sleep: async () => undefined,
  random: () => 0,
});

export function tenantConfig(overrides: Partial<TenantConfigInput> = {}): TenantConfigInput {
  return {
    name: 'Acme Wellness',
    serviceLevel: 'basic',
    timeZone: 'UTC',
    escalation: {
      channel: 'email',
      primaryContact: 'coach@example.test',
      secondaryContact: 'lead@example.test',
    },
    workflows: [
      {
        id: 'recovery-check',
        name: 'Recovery check',
        severity: 'info',
        steps: [
          { name: 'collect', capability: 'data-collector' },
          { name: 'detect', capability: 'pattern-detector', onFailure: 'skippable' },
          { name: 'notify', capability: 'notifier' },
        ],
      },
    ],
    ...overrides,
  };
}

export type CapabilityScript = (request: CapabilityRequest) => Promise<CapabilityOutcome>;

export function scriptedCapability(name: string, script: CapabilityScript): Capability & { calls: CapabilityRequest[] } {
  const calls: CapabilityRequest[] = [];
  return {
    name,
    calls,
    invoke: async (request) => {
      calls.push(request);
      return script(request);
    },
  };
}

export function succeeding(name: string, output: Record<string, unknown> = {}) {
  return scriptedCapability(name, async () => ({ status: 'succeeded', output, retryable: false }));
}

export function failing(name: string, retryable: boolean, code = 'CAPABILITY_DOWN') {
  return scriptedCapability(name, async () => ({
    status: 'failed',
    output: {},
    retryable,
    error: { code, message: `${name} failed` },
  }));
}
