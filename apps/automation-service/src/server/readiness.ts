import { existsSync } from 'node:fs';
import { dirname } from 'node:path';

import type { CapabilityRegistry } from '@wellness-automation/workflow-engine';

import type { AutomationServiceConfig } from './config.js';
import type { TickDriver } from './tick-driver.js';

export interface ReadinessCheck {
  name: string;
  run(): Promise<'up' | 'down'>;
}

export function createDefaultReadinessChecks(
  config: AutomationServiceConfig,
  capabilities: CapabilityRegistry,
  tickDriver: TickDriver,
): ReadinessCheck[] {
  return [
    {
      name: 'ledger',
      async run() {
        const ledgerFile = config.LEDGER_FILE;
        return ledgerFile === undefined || existsSync(dirname(ledgerFile)) ? 'up' : 'down';
      },
    },
    {
      name: 'capabilities',
      async run() {
        return capabilities.list().length > 0 ? 'up' : 'down';
      },
    },
    {
      name: 'scheduler',
      async run() {
        return tickDriver.isRunning() ? 'up' : 'down';
      },
    },
  ];
}
