export class IsolationViolationError extends Error {
  readonly code = 'ISOLATION_VIOLATION';

  constructor(
    public readonly expectedTenantId: string,
    public readonly actualTenantId: string,
    public readonly subject: string,
  ) {
    super(`Tenant isolation violated by ${subject}: expected ${expectedTenantId}, got ${actualTenantId}`);
    this.name = 'IsolationViolationError';
  }
}

/** Throws when data owned by `actualTenantId` reaches work running for `expectedTenantId`. */
export function assertSameTenant(expectedTenantId: string, actualTenantId: string, subject: string): void {
  if (expectedTenantId !== actualTenantId) {
    throw new IsolationViolationError(expectedTenantId, actualTenantId, subject);
  }
}
