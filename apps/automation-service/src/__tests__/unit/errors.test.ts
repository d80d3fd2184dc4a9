import {
  AlertNotFoundError,
  ConfigurationError,
  IsolationViolationError,
  TenantNotFoundError,
} from '@wellness-automation/workflow-engine';
import { describe, expect, it } from 'vitest';
import { z } from 'zod';

import { EngineError, ERROR_CODES, toErrorResponse } from '../../server/errors.js';

describe('error envelope', () => {
  it('passes engine errors through with retry hints', () => {
    const mapped = toErrorResponse(
      new EngineError(ERROR_CODES.RATE_LIMIT_EXCEEDED, 429, 'Slow down', undefined, 30),
    );

    expect(mapped).toEqual({
      statusCode: 429,
      body: { error: { code: 'RATE_LIMIT_EXCEEDED', message: 'Slow down', retryAfter: 30 } },
    });
  });

  it('maps zod issues to field details', () => {
    const result = z.object({ workflowId: z.string() }).safeParse({ workflowId: 7 });
    if (result.success) {
      throw new Error('expected a validation failure');
    }

    const mapped = toErrorResponse(result.error);

    expect(mapped.statusCode).toBe(400);
    expect(mapped.body.error).toEqual({
      code: 'VALIDATION_ERROR',
      message: 'Invalid request parameters',
      details: { workflowId: 'Expected string, received number' },
    });
  });

  it('maps configuration errors with their details', () => {
    const mapped = toErrorResponse(
      new ConfigurationError('Invalid tenant configuration', { timeZone: 'Unknown IANA time zone' }),
    );

    expect(mapped.statusCode).toBe(400);
    expect(mapped.body.error).toEqual({
      code: 'CONFIGURATION_ERROR',
      message: 'Invalid tenant configuration',
      details: { timeZone: 'Unknown IANA time zone' },
    });
  });

  it('maps missing tenants and alerts to 404', () => {
    expect(toErrorResponse(new TenantNotFoundError('tenant-a')).body.error.code).toBe('TENANT_NOT_FOUND');
    expect(toErrorResponse(new AlertNotFoundError('alert-1')).statusCode).toBe(404);
  });

  it('hides tenant ids from isolation violations', () => {
    const mapped = toErrorResponse(new IsolationViolationError('tenant-a', 'tenant-b', 'metric snapshot'));

    expect(mapped).toEqual({
      statusCode: 403,
      body: { error: { code: 'ISOLATION_VIOLATION', message: 'Request crosses a tenant boundary' } },
    });
  });

  it('falls back to an internal error', () => {
    expect(toErrorResponse(new Error('database exploded'))).toEqual({
      statusCode: 500,
      body: { error: { code: 'INTERNAL_ERROR', message: 'Internal server error' } },
    });
  });
});
