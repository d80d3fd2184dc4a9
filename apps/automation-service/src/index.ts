import { resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { createLogger, errorMessage } from '@wellness-automation/shared';
import {
  AutomationEngine,
  CapabilityRegistry,
  DEFAULT_RETRY_POLICY,
  FileExecutionLedger,
  InMemoryExecutionLedger,
  TenantRegistry,
  type ExecutionLedger,
} from '@wellness-automation/workflow-engine';

import { buildAutomationServiceApp } from './server/app.js';
import { GATEWAY_RETRYABLE_CODES, createCapabilityClients } from './server/capability-client.js';
import { loadAutomationServiceConfig, type AutomationServiceConfig } from './server/config.js';
import { HttpNotificationSender } from './server/notification-sender.js';
import { createDefaultReadinessChecks } from './server/readiness.js';
import { SERVICE_NAME } from './server/routes.js';
import { TickDriver } from './server/tick-driver.js';

function createLedger(config: AutomationServiceConfig): ExecutionLedger {
  const options = { dedupRetentionMs: config.DEDUP_RETENTION_HOURS * 60 * 60 * 1000 };
  if (config.LEDGER_FILE === undefined) {
    return new InMemoryExecutionLedger(options);
  }

  return new FileExecutionLedger(config.LEDGER_FILE, options);
}

export async function createAutomationServer(config: AutomationServiceConfig = loadAutomationServiceConfig()) {
  const logger = createLogger({ service: SERVICE_NAME, level: config.LOG_LEVEL });

  const registry = new TenantRegistry({ logger });
  const capabilities = new CapabilityRegistry(
    createCapabilityClients({ baseUrl: config.AGENT_GATEWAY_URL, sharedToken: config.AGENT_GATEWAY_TOKEN }),
  );

  const engine = new AutomationEngine({
    registry,
    ledger: createLedger(config),
    capabilities,
    sender: new HttpNotificationSender({
      baseUrl: config.NOTIFICATION_GATEWAY_URL,
      sharedToken: config.NOTIFICATION_GATEWAY_TOKEN,
      timeoutMs: config.NOTIFICATION_TIMEOUT_MS,
    }),
    logger,
    operatorContact: config.OPERATOR_CONTACT,
    concurrency: config.ENGINE_WORKER_CONCURRENCY,
    defaultStepTimeoutMs: config.STEP_TIMEOUT_MS,
    defaultWorkflowDeadlineMs: config.WORKFLOW_DEADLINE_MS,
    notificationTimeoutMs: config.NOTIFICATION_TIMEOUT_MS,
    alertRetentionMs: config.ALERT_RETENTION_HOURS * 60 * 60 * 1000,
    retryPolicy: {
      maxAttempts: config.RETRY_MAX_ATTEMPTS,
      initialDelayMs: config.RETRY_INITIAL_DELAY_MS,
      maxDelayMs: config.RETRY_MAX_DELAY_MS,
      retryableErrorCodes: [
        ...new Set([...DEFAULT_RETRY_POLICY.retryableErrorCodes, ...GATEWAY_RETRYABLE_CODES]),
      ],
    },
  });

  const tickDriver = new TickDriver({ engine, logger });

  const app = buildAutomationServiceApp({
    config,
    logger,
    engine,
    tickDriver,
    readinessChecks: createDefaultReadinessChecks(config, capabilities, tickDriver),
  });

  return { app, config, logger, engine, tickDriver };
}

export async function startAutomationServer(): Promise<void> {
  const { app, config, logger, engine, tickDriver } = await createAutomationServer();

  try {
    await app.listen({ host: config.HOST, port: config.PORT });
    const tickIntervalMs = Math.min(config.ENGINE_TICK_INTERVAL_MS, engine.schedulerResolutionMs());
    tickDriver.start(tickIntervalMs);
    logger.info('automation-service started', {
      host: config.HOST,
      port: config.PORT,
      env: config.NODE_ENV,
      tickIntervalMs,
      durableLedger: config.LEDGER_FILE !== undefined,
    });
  } catch (error) {
    logger.error('automation-service failed to start', { error: errorMessage(error) });
    process.exitCode = 1;
    throw error;
  }
}

const executedDirectly =
  process.argv[1] !== undefined && fileURLToPath(import.meta.url) === resolve(process.argv[1]);

if (executedDirectly) {
  void startAutomationServer();
}
