import {
  AlertNotFoundError,
  ConfigurationError,
  IsolationViolationError,
  TenantNotFoundError,
} from '@wellness-automation/workflow-engine';
import { ZodError } from 'zod';

export const ERROR_CODES = {
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
  UNAUTHORIZED: 'UNAUTHORIZED',
  TENANT_MISMATCH: 'TENANT_MISMATCH',
  TENANT_NOT_FOUND: 'TENANT_NOT_FOUND',
  ALERT_NOT_FOUND: 'ALERT_NOT_FOUND',
  ISOLATION_VIOLATION: 'ISOLATION_VIOLATION',
  RATE_LIMIT_EXCEEDED: 'RATE_LIMIT_EXCEEDED',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
  EXTERNAL_API_ERROR: 'EXTERNAL_API_ERROR',
  ROUTE_NOT_FOUND: 'ROUTE_NOT_FOUND',
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

export interface ErrorEnvelope {
  error: {
    code: ErrorCode;
    message: string;
    details?: Record<string, unknown>;
    retryAfter?: number;
  };
}

export class EngineError extends Error {
  constructor(
    public readonly code: ErrorCode,
    public readonly statusCode: number,
    message: string,
    public readonly details?: Record<string, unknown>,
    public readonly retryAfter?: number,
  ) {
    super(message);
    this.name = 'EngineError';
  }
}

function fromEngineError(error: EngineError): { statusCode: number; body: ErrorEnvelope } {
  return {
    statusCode: error.statusCode,
    body: {
      error: {
        code: error.code,
        message: error.message,
        ...(error.details === undefined ? {} : { details: error.details }),
        ...(error.retryAfter === undefined ? {} : { retryAfter: error.retryAfter }),
      },
    },
  };
}

export function toErrorResponse(error: unknown): {
  statusCode: number;
  body: ErrorEnvelope;
} {
  if (error instanceof EngineError) {
    return fromEngineError(error);
  }

  if (error instanceof ZodError) {
    const details: Record<string, unknown> = {};
    for (const issue of error.issues) {
      const issueKey = issue.path.length > 0 ? issue.path.join('.') : 'request';
      details[issueKey] = issue.message;
    }

    return fromEngineError(
      new EngineError(ERROR_CODES.VALIDATION_ERROR, 400, 'Invalid request parameters', details),
    );
  }

  if (error instanceof ConfigurationError) {
    return fromEngineError(
      new EngineError(ERROR_CODES.CONFIGURATION_ERROR, 400, error.message, error.details),
    );
  }

  if (error instanceof TenantNotFoundError) {
    return fromEngineError(new EngineError(ERROR_CODES.TENANT_NOT_FOUND, 404, 'Tenant not found'));
  }

  if (error instanceof AlertNotFoundError) {
    return fromEngineError(new EngineError(ERROR_CODES.ALERT_NOT_FOUND, 404, 'Alert not found'));
  }

  // Tenant ids stay out of the message so one tenant never learns of another.
  if (error instanceof IsolationViolationError) {
    return fromEngineError(
      new EngineError(ERROR_CODES.ISOLATION_VIOLATION, 403, 'Request crosses a tenant boundary'),
    );
  }

  return {
    statusCode: 500,
    body: {
      error: {
        code: ERROR_CODES.INTERNAL_ERROR,
        message: 'Internal server error',
      },
    },
  };
}
