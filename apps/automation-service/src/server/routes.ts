import { randomUUID } from 'node:crypto';

import { metricSnapshotSchema } from '@wellness-automation/shared';
import {
  escalationPolicyInputSchema,
  onboardingConfig,
  parseConfig,
  serviceLevelSchema,
  tenantConfigSchema,
  type AutomationEngine,
  type ExecutionStatus,
  type TimeRange,
} from '@wellness-automation/workflow-engine';
import type { FastifyInstance, FastifyRequest } from 'fastify';
import { z } from 'zod';

import { EngineError, ERROR_CODES } from './errors.js';
import type { ReadinessCheck } from './readiness.js';

declare module 'fastify' {
  interface FastifyRequest {
    correlationId: string;
  }
}

export const SERVICE_NAME = 'automation-service';

export function getCorrelationId(request: FastifyRequest): string {
  const headerValue = request.headers['x-correlation-id'];
  if (typeof headerValue === 'string' && headerValue.length > 0) {
    return headerValue;
  }

  return randomUUID();
}

export async function registerHealthRoutes(
  app: FastifyInstance,
  readinessChecks: ReadinessCheck[],
): Promise<void> {
  app.get('/health', async (_request, reply) => {
    const memoryUsage = process.memoryUsage();
    return reply.status(200).send({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      service: SERVICE_NAME,
      metrics: {
        uptime: process.uptime(),
        memoryUsage: {
          rss: memoryUsage.rss,
          heapUsed: memoryUsage.heapUsed,
          heapTotal: memoryUsage.heapTotal,
        },
      },
    });
  });

  app.get('/ready', async (_request, reply) => {
    const checks = await Promise.all(
      readinessChecks.map(async (check) => ({ name: check.name, status: await check.run() })),
    );

    const services = Object.fromEntries(checks.map((check) => [check.name, check.status]));
    const allChecksUp = checks.every((check) => check.status === 'up');

    return reply.status(allChecksUp ? 200 : 503).send({
      status: allChecksUp ? 'ready' : 'not_ready',
      timestamp: new Date().toISOString(),
      services,
    });
  });
}

const tenantParamsSchema = z.object({ tenantId: z.string().min(1) });
const ruleParamsSchema = tenantParamsSchema.extend({ ruleId: z.string().min(1) });
const scheduleParamsSchema = tenantParamsSchema.extend({ scheduleId: z.string().min(1) });
const alertParamsSchema = tenantParamsSchema.extend({ alertId: z.string().min(1) });
const workflowParamsSchema = tenantParamsSchema.extend({ workflowId: z.string().min(1) });

const onboardingBodySchema = z.object({
  name: z.string().min(1),
  serviceLevel: serviceLevelSchema,
  timeZone: z.string().min(1),
  escalation: escalationPolicyInputSchema,
});

const serviceLevelBodySchema = z.object({ serviceLevel: serviceLevelSchema });

const toggleBodySchema = z.object({ enabled: z.boolean() });

const executionStatusFilterSchema = z.array(
  z.enum(['pending', 'completed', 'partially-completed', 'failed']),
);

const listExecutionsQuerySchema = z.object({
  status: z.string().min(1).optional(),
  from: z.string().datetime().optional(),
  to: z.string().datetime().optional(),
});

const retriggerBodySchema = z.object({
  workflowId: z.string().min(1),
  requestedBy: z.string().min(1),
});

const listAlertsQuerySchema = z.object({
  state: z.enum(['pending', 'notified', 'acknowledged', 'expired']).optional(),
});

const acknowledgeBodySchema = z.object({ acknowledgedBy: z.string().min(1) });

function toTimeRange(query: { from?: string | undefined; to?: string | undefined }): TimeRange | undefined {
  if (query.from === undefined && query.to === undefined) {
    return undefined;
  }

  return {
    ...(query.from === undefined ? {} : { from: query.from }),
    ...(query.to === undefined ? {} : { to: query.to }),
  };
}

function assertTenantBoundary(request: FastifyRequest): void {
  const { tenantId } = tenantParamsSchema.parse(request.params);
  if (request.headers['x-tenant-id'] !== tenantId) {
    throw new EngineError(
      ERROR_CODES.TENANT_MISMATCH,
      403,
      'x-tenant-id header does not match the tenant in the path',
    );
  }
}

interface TenantRouteDependencies {
  engine: AutomationEngine;
}

export async function registerTenantRoutes(
  app: FastifyInstance,
  dependencies: TenantRouteDependencies,
): Promise<void> {
  const { engine } = dependencies;
  const { registry } = engine;

  app.addHook('preHandler', async (request) => {
    assertTenantBoundary(request);
  });

  app.put('/v1/tenants/:tenantId', async (request, reply) => {
    const { tenantId } = tenantParamsSchema.parse(request.params);
    const config = parseConfig(tenantConfigSchema, request.body, 'Invalid tenant configuration');

    if (registry.find(tenantId) === null) {
      return reply.status(201).send({ tenant: registry.create(tenantId, config) });
    }

    return reply.status(200).send({ tenant: registry.upsertConfig(tenantId, config) });
  });

  app.get('/v1/tenants/:tenantId', async (request, reply) => {
    const { tenantId } = tenantParamsSchema.parse(request.params);
    return reply.status(200).send({ tenant: registry.get(tenantId) });
  });

  app.delete('/v1/tenants/:tenantId', async (request, reply) => {
    const { tenantId } = tenantParamsSchema.parse(request.params);
    return reply.status(200).send({ tenant: registry.deactivate(tenantId) });
  });

  // Creates the tenant with the standard workflows, schedules and monitoring rules.
  app.post('/v1/tenants/:tenantId/onboard', async (request, reply) => {
    const { tenantId } = tenantParamsSchema.parse(request.params);
    const input = onboardingBodySchema.parse(request.body);
    return reply.status(201).send({ tenant: registry.create(tenantId, onboardingConfig(input)) });
  });

  app.put('/v1/tenants/:tenantId/service-level', async (request, reply) => {
    const { tenantId } = tenantParamsSchema.parse(request.params);
    const { serviceLevel } = serviceLevelBodySchema.parse(request.body);
    return reply.status(200).send({ tenant: registry.setServiceLevel(tenantId, serviceLevel) });
  });

  app.post('/v1/tenants/:tenantId/workflows', async (request, reply) => {
    const { tenantId } = tenantParamsSchema.parse(request.params);
    return reply.status(201).send({ workflow: registry.addWorkflow(tenantId, request.body) });
  });

  app.patch('/v1/tenants/:tenantId/workflows/:workflowId', async (request, reply) => {
    const { tenantId, workflowId } = workflowParamsSchema.parse(request.params);
    const { enabled } = toggleBodySchema.parse(request.body);
    return reply.status(200).send({ workflow: registry.setWorkflowEnabled(tenantId, workflowId, enabled) });
  });

  app.get('/v1/tenants/:tenantId/automation', async (request, reply) => {
    const { tenantId } = tenantParamsSchema.parse(request.params);
    return reply.status(200).send({ automation: engine.automationStatus(tenantId) });
  });

  app.post('/v1/tenants/:tenantId/rules', async (request, reply) => {
    const { tenantId } = tenantParamsSchema.parse(request.params);
    return reply.status(201).send({ rule: registry.addRule(tenantId, request.body) });
  });

  app.patch('/v1/tenants/:tenantId/rules/:ruleId', async (request, reply) => {
    const { tenantId, ruleId } = ruleParamsSchema.parse(request.params);
    const { enabled } = toggleBodySchema.parse(request.body);
    return reply.status(200).send({ rule: registry.setRuleEnabled(tenantId, ruleId, enabled) });
  });

  app.post('/v1/tenants/:tenantId/schedules', async (request, reply) => {
    const { tenantId } = tenantParamsSchema.parse(request.params);
    return reply.status(201).send({ schedule: registry.addSchedule(tenantId, request.body) });
  });

  app.delete('/v1/tenants/:tenantId/schedules/:scheduleId', async (request, reply) => {
    const { tenantId, scheduleId } = scheduleParamsSchema.parse(request.params);
    registry.removeSchedule(tenantId, scheduleId);
    return reply.status(204).send();
  });

  app.post('/v1/tenants/:tenantId/metrics', async (request, reply) => {
    const { tenantId } = tenantParamsSchema.parse(request.params);
    const snapshot = metricSnapshotSchema.parse(request.body);
    const triggers = await engine.ingestSnapshot(tenantId, snapshot);

    return reply.status(202).send({
      accepted: true,
      triggers: triggers.map((trigger) => ({
        id: trigger.id,
        workflowId: trigger.workflowId,
        severity: trigger.severity,
      })),
    });
  });

  app.get('/v1/tenants/:tenantId/executions', async (request, reply) => {
    const { tenantId } = tenantParamsSchema.parse(request.params);
    registry.get(tenantId);
    const query = listExecutionsQuerySchema.parse(request.query);
    const filter =
      query.status === undefined ? undefined : executionStatusFilterSchema.parse(query.status.split(','));
    const statuses = filter?.filter((status): status is ExecutionStatus => status !== 'pending');
    const range = toTimeRange(query);

    const executions =
      statuses !== undefined && statuses.length === 0
        ? []
        : engine.listExecutions(tenantId, {
            ...(statuses === undefined ? {} : { statuses }),
            ...(range === undefined ? {} : { range }),
          });
    const pending = filter === undefined || filter.includes('pending') ? engine.pendingTriggers(tenantId) : [];

    return reply.status(200).send({ executions, pending });
  });

  app.post('/v1/tenants/:tenantId/executions/retrigger', async (request, reply) => {
    const { tenantId } = tenantParamsSchema.parse(request.params);
    const { workflowId, requestedBy } = retriggerBodySchema.parse(request.body);
    const trigger = engine.retrigger(tenantId, workflowId, requestedBy);

    return reply.status(202).send({ triggerId: trigger.id, dedupKey: trigger.dedupKey });
  });

  app.get('/v1/tenants/:tenantId/alerts', async (request, reply) => {
    const { tenantId } = tenantParamsSchema.parse(request.params);
    registry.get(tenantId);
    const { state } = listAlertsQuerySchema.parse(request.query);
    return reply.status(200).send({ alerts: engine.escalation.listAlerts(tenantId, state) });
  });

  app.post('/v1/tenants/:tenantId/alerts/:alertId/ack', async (request, reply) => {
    const { tenantId, alertId } = alertParamsSchema.parse(request.params);
    const { acknowledgedBy } = acknowledgeBodySchema.parse(request.body);
    return reply.status(200).send({ alert: engine.escalation.acknowledge(tenantId, alertId, acknowledgedBy) });
  });
}
