import { describe, expect, it } from 'vitest';

import { loadAutomationServiceConfig } from '../../server/config.js';

const requiredEnv = {
  NODE_ENV: 'production',
  HOST: '0.0.0.0',
  PORT: '3300',
  LOG_LEVEL: 'info',
  SERVICE_SHARED_TOKEN: 'service-shared-token-test',
  AGENT_GATEWAY_URL: 'http://agents.internal:3400',
  AGENT_GATEWAY_TOKEN: 'agent-gateway-token-test',
  NOTIFICATION_GATEWAY_URL: 'http://notify.internal:3500',
  NOTIFICATION_GATEWAY_TOKEN: 'notification-token-test',
  OPERATOR_CONTACT: 'ops-pager',
};

describe('automation service config', () => {
  it('parses numbers and fills engine defaults', () => {
    const config = loadAutomationServiceConfig(requiredEnv);

    expect(config.PORT).toBe(3300);
    expect(config.LEDGER_FILE).toBeUndefined();
    expect(config).toMatchObject({
      ENGINE_TICK_INTERVAL_MS: 60000,
      ENGINE_WORKER_CONCURRENCY: 4,
      STEP_TIMEOUT_MS: 60000,
      WORKFLOW_DEADLINE_MS: 900000,
      RETRY_MAX_ATTEMPTS: 3,
      RETRY_INITIAL_DELAY_MS: 1000,
      RETRY_MAX_DELAY_MS: 30000,
      DEDUP_RETENTION_HOURS: 168,
      NOTIFICATION_TIMEOUT_MS: 10000,
      ALERT_RETENTION_HOURS: 168,
    });
  });

  it('takes overrides for engine tuning and the ledger file', () => {
    const config = loadAutomationServiceConfig({
      ...requiredEnv,
      LEDGER_FILE: '/var/lib/automation/executions.jsonl',
      ENGINE_WORKER_CONCURRENCY: '8',
      RETRY_MAX_ATTEMPTS: '5',
    });

    expect(config.LEDGER_FILE).toBe('/var/lib/automation/executions.jsonl');
    expect(config.ENGINE_WORKER_CONCURRENCY).toBe(8);
    expect(config.RETRY_MAX_ATTEMPTS).toBe(5);
  });

  it('fails fast with every configuration problem listed', () => {
    expect(() =>
      loadAutomationServiceConfig({ ...requiredEnv, PORT: 'eighty', SERVICE_SHARED_TOKEN: 'short' }),
    ).toThrow(/^Configuration errors: PORT: Invalid; SERVICE_SHARED_TOKEN: /);
  });

  it('rejects a zero tick interval or worker concurrency', () => {
    expect(() =>
      loadAutomationServiceConfig({ ...requiredEnv, ENGINE_TICK_INTERVAL_MS: '0', ENGINE_WORKER_CONCURRENCY: '0' }),
    ).toThrow(
      'Configuration errors: ENGINE_TICK_INTERVAL_MS: Must be greater than 0; ENGINE_WORKER_CONCURRENCY: Must be greater than 0',
    );
  });

  it('rejects a missing operator contact', () => {
    const { OPERATOR_CONTACT: _omitted, ...withoutOperator } = requiredEnv;

    expect(() => loadAutomationServiceConfig(withoutOperator)).toThrow('OPERATOR_CONTACT: Required');
  });
});
