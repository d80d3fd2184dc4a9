import { z } from 'zod';

export const metricSnapshotSchema = z.object({
  tenantId: z.string().min(1),
  timestamp: z.string().datetime(),
  metrics: z.record(z.string().min(1), z.number().finite()),
});

export const capabilityInvocationSchema = z.object({
  tenantId: z.string().min(1),
  capability: z.string().min(1),
  executionId: z.string().uuid(),
  stepName: z.string().min(1),
  attempt: z.number().int().positive(),
  stepInput: z.record(z.string(), z.unknown()),
});

export const capabilityOutcomeSchema = z.object({
  status: z.enum(['succeeded', 'failed', 'skipped']),
  output: z.record(z.string(), z.unknown()).default({}),
  retryable: z.boolean().default(false),
  error: z
    .object({
      code: z.string().min(1),
      message: z.string(),
    })
    .optional(),
});

export const notificationDeliveryResultSchema = z.object({
  status: z.enum(['delivered', 'failed']),
  reason: z.string().optional(),
});

export type MetricSnapshot = z.infer<typeof metricSnapshotSchema>;
export type CapabilityInvocation = z.infer<typeof capabilityInvocationSchema>;
export type CapabilityOutcome = z.infer<typeof capabilityOutcomeSchema>;
export type NotificationDeliveryResult = z.infer<typeof notificationDeliveryResultSchema>;
