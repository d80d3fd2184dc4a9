import { z } from 'zod';

import { SERVICE_LEVELS, isCapabilityAvailable } from './service-levels.js';

export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly details: Record<string, string> = {},
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

const identifierSchema = z
  .string()
  .min(1)
  .max(128)
  .regex(/^[A-Za-z0-9][A-Za-z0-9._-]*$/, 'Identifier may only contain letters, digits, ".", "_" and "-"');

const timeOfDaySchema = z
  .string()
  .regex(/^([01]\d|2[0-3]):[0-5]\d$/, 'Time of day must be HH:MM (24h)');

export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
}

export const serviceLevelSchema = z.enum(SERVICE_LEVELS);
export const severitySchema = z.enum(['info', 'warning', 'critical']);
export const ruleOperatorSchema = z.enum(['<', '<=', '>', '>=', '==', '!=']);
export const weekdaySchema = z.enum([
  'sunday',
  'monday',
  'tuesday',
  'wednesday',
  'thursday',
  'friday',
  'saturday',
]);
export const escalationChannelSchema = z.enum(['email', 'sms', 'push', 'pager', 'webhook']);

export const automationRuleSchema = z.object({
  id: identifierSchema,
  name: z.string().min(1).max(255).optional(),
  metricKey: z.string().min(1).max(128),
  operator: ruleOperatorSchema,
  threshold: z
    .number({ invalid_type_error: 'Threshold must be a number' })
    .finite('Threshold must be finite'),
  cooldownMs: z.number().int().nonnegative(),
  workflowId: identifierSchema,
  severity: severitySchema.default('warning'),
  enabled: z.boolean().default(true),
});

export const recurrenceSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('interval'),
    everyMs: z.number().int().min(60_000, 'Interval must be at least one minute'),
  }),
  z.object({
    kind: z.literal('daily'),
    at: timeOfDaySchema,
  }),
  z.object({
    kind: z.literal('weekly'),
    day: weekdaySchema,
    at: timeOfDaySchema,
  }),
]);

export const scheduleSpecSchema = z.object({
  id: identifierSchema,
  workflowId: identifierSchema,
  recurrence: recurrenceSchema,
  enabled: z.boolean().default(true),
  startAt: z.string().datetime().optional(),
});

export const workflowStepSchema = z.object({
  name: identifierSchema,
  capability: identifierSchema,
  onFailure: z.enum(['fatal', 'skippable']).default('fatal'),
  timeoutMs: z.number().int().positive().optional(),
  input: z.record(z.string(), z.unknown()).default({}),
});

export const workflowDefinitionSchema = z
  .object({
    id: identifierSchema,
    name: z.string().min(1).max(255),
    severity: severitySchema.default('info'),
    enabled: z.boolean().default(true),
    deadlineMs: z.number().int().positive().optional(),
    steps: z.array(workflowStepSchema).min(1, 'Workflow needs at least one step'),
  })
  .superRefine((workflow, context) => {
    const seen = new Set<string>();
    workflow.steps.forEach((step, index) => {
      if (seen.has(step.name)) {
        context.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['steps', index, 'name'],
          message: `Duplicate step name ${step.name}`,
        });
      }
      seen.add(step.name);
    });
  });

export const escalationPolicyInputSchema = z.object({
  channel: escalationChannelSchema,
  primaryContact: z.string().min(1),
  secondaryContact: z.string().min(1).optional(),
  renotifyIntervalMs: z.number().int().positive().optional(),
  escalationDelayMs: z.number().int().positive().optional(),
  maxDeliveryAttempts: z.number().int().min(1).max(10).default(3),
  expireAfterMs: z.number().int().positive().optional(),
});

function addDuplicateIssues(
  ids: string[],
  collection: 'rules' | 'schedules' | 'workflows',
  context: z.RefinementCtx,
): void {
  const seen = new Set<string>();
  ids.forEach((id, index) => {
    if (seen.has(id)) {
      context.addIssue({
        code: z.ZodIssueCode.custom,
        path: [collection, index, 'id'],
        message: `Duplicate id ${id}`,
      });
    }
    seen.add(id);
  });
}

export const tenantConfigSchema = z
  .object({
    name: z.string().min(1).max(255),
    serviceLevel: serviceLevelSchema,
    timeZone: z.string().refine(isValidTimeZone, 'Unknown IANA time zone'),
    rules: z.array(automationRuleSchema).default([]),
    schedules: z.array(scheduleSpecSchema).default([]),
    workflows: z.array(workflowDefinitionSchema).default([]),
    escalation: escalationPolicyInputSchema,
  })
  .superRefine((config, context) => {
    addDuplicateIssues(config.rules.map((rule) => rule.id), 'rules', context);
    addDuplicateIssues(config.schedules.map((schedule) => schedule.id), 'schedules', context);
    addDuplicateIssues(config.workflows.map((workflow) => workflow.id), 'workflows', context);

    const workflowIds = new Set(config.workflows.map((workflow) => workflow.id));
    config.rules.forEach((rule, index) => {
      if (!workflowIds.has(rule.workflowId)) {
        context.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['rules', index, 'workflowId'],
          message: `Unknown workflow ${rule.workflowId}`,
        });
      }
    });
    config.schedules.forEach((schedule, index) => {
      if (!workflowIds.has(schedule.workflowId)) {
        context.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['schedules', index, 'workflowId'],
          message: `Unknown workflow ${schedule.workflowId}`,
        });
      }
    });

    config.workflows.forEach((workflow, workflowIndex) => {
      workflow.steps.forEach((step, stepIndex) => {
        if (!isCapabilityAvailable(config.serviceLevel, step.capability)) {
          context.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['workflows', workflowIndex, 'steps', stepIndex, 'capability'],
            message: `Capability ${step.capability} is not available at service level ${config.serviceLevel}`,
          });
        }
      });
    });
  });

export type ServiceLevel = z.infer<typeof serviceLevelSchema>;
export type Severity = z.infer<typeof severitySchema>;
export type RuleOperator = z.infer<typeof ruleOperatorSchema>;
export type Weekday = z.infer<typeof weekdaySchema>;
export type EscalationChannel = z.infer<typeof escalationChannelSchema>;
export type AutomationRule = z.infer<typeof automationRuleSchema>;
export type Recurrence = z.infer<typeof recurrenceSchema>;
export type ScheduleSpec = z.infer<typeof scheduleSpecSchema>;
export type WorkflowStep = z.infer<typeof workflowStepSchema>;
export type WorkflowDefinition = z.infer<typeof workflowDefinitionSchema>;
export type EscalationPolicyInput = z.infer<typeof escalationPolicyInputSchema>;
export type TenantConfig = z.infer<typeof tenantConfigSchema>;
export type TenantConfigInput = z.input<typeof tenantConfigSchema>;

export function parseConfig<T extends z.ZodTypeAny>(
  schema: T,
  input: unknown,
  message = 'Invalid configuration',
): z.infer<T> {
  const result = schema.safeParse(input);
  if (result.success) {
    return result.data;
  }

  const details: Record<string, string> = {};
  for (const issue of result.error.issues) {
    const issueKey = issue.path.length > 0 ? issue.path.join('.') : 'config';
    details[issueKey] = issue.message;
  }

  throw new ConfigurationError(message, details);
}
