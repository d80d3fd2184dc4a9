import { LOG_LEVELS } from '@wellness-automation/shared';
import { z } from 'zod';

const numeric = z.string().regex(/^\d+$/);
const numericWithDefault = (fallback: string) => numeric.default(fallback).transform(Number);
const positiveWithDefault = (fallback: string) =>
  numericWithDefault(fallback).refine((value) => value > 0, { message: 'Must be greater than 0' });

const automationServiceEnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'staging', 'production']),
  HOST: z.string().min(1),
  PORT: numeric.transform(Number),
  LOG_LEVEL: z.enum(LOG_LEVELS),
  SERVICE_SHARED_TOKEN: z.string().min(16),
  AGENT_GATEWAY_URL: z.string().url(),
  AGENT_GATEWAY_TOKEN: z.string().min(16),
  NOTIFICATION_GATEWAY_URL: z.string().url(),
  NOTIFICATION_GATEWAY_TOKEN: z.string().min(16),
  OPERATOR_CONTACT: z.string().min(1),
  LEDGER_FILE: z.string().min(1).optional(),
  ENGINE_TICK_INTERVAL_MS: positiveWithDefault('60000'),
  ENGINE_WORKER_CONCURRENCY: positiveWithDefault('4'),
  STEP_TIMEOUT_MS: numericWithDefault('60000'),
  WORKFLOW_DEADLINE_MS: numericWithDefault('900000'),
  RETRY_MAX_ATTEMPTS: numericWithDefault('3'),
  RETRY_INITIAL_DELAY_MS: numericWithDefault('1000'),
  RETRY_MAX_DELAY_MS: numericWithDefault('30000'),
  DEDUP_RETENTION_HOURS: numericWithDefault('168'),
  NOTIFICATION_TIMEOUT_MS: positiveWithDefault('10000'),
  ALERT_RETENTION_HOURS: numericWithDefault('168'),
});

export type AutomationServiceConfig = z.infer<typeof automationServiceEnvSchema>;

export function loadAutomationServiceConfig(
  source: NodeJS.ProcessEnv = process.env,
): AutomationServiceConfig {
  try {
    return automationServiceEnvSchema.parse(source);
  } catch (error) {
    if (error instanceof z.ZodError) {
      const issueText = error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      throw new Error(`Configuration errors: ${issueText}`);
    }

    throw error;
  }
}
