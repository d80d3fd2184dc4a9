import type { Logger } from '@wellness-automation/shared';

import type { AutomationServiceConfig } from '../server/config.js';

export const silentLogger: Logger = {
  child: () => silentLogger,
  trace: () => undefined,
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  fatal: () => undefined,
};

export const baseConfig: AutomationServiceConfig = {
  NODE_ENV: 'test',
  HOST: '127.0.0.1',
  PORT: 3300,
  LOG_LEVEL: 'error',
  SERVICE_SHARED_TOKEN: 'service-shared-token-test',
  AGENT_GATEWAY_URL: 'http://127.0.0.1:3400',
  AGENT_GATEWAY_TOKEN: 'agent-gateway-token-test',
  NOTIFICATION_GATEWAY_URL: 'http://127.0.0.1:3500',
  NOTIFICATION_GATEWAY_TOKEN: 'notification-token-test',
  OPERATOR_CONTACT: 'operator-contact',
  ENGINE_TICK_INTERVAL_MS: 60000,
  ENGINE_WORKER_CONCURRENCY: 2,
  STEP_TIMEOUT_MS: 5000,
  WORKFLOW_DEADLINE_MS: 60000,
  RETRY_MAX_ATTEMPTS: 3,
  RETRY_INITIAL_DELAY_MS: 10,
  RETRY_MAX_DELAY_MS: 100,
  DEDUP_RETENTION_HOURS: 168,
  NOTIFICATION_TIMEOUT_MS: 10000,
  ALERT_RETENTION_HOURS: 168,
};

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

export function requestBody(init: RequestInit | undefined): unknown {
  return typeof init?.body === 'string' ? JSON.parse(init.body) : null;
}
