import type { CapabilityOutcome } from '@wellness-automation/shared';

export type { CapabilityOutcome } from '@wellness-automation/shared';

export interface CapabilityRequest {
  tenantId: string;
  capability: string;
  executionId: string;
  stepName: string;
  attempt: number;
  stepInput: Record<string, unknown>;
  signal: AbortSignal;
}

/**
 * An external agent behind a fixed call shape. Implementations may be slow or
 * fail; they should honour `signal` so a timed-out call stops doing work.
 */
export interface Capability {
  readonly name: string;
  invoke(request: CapabilityRequest): Promise<CapabilityOutcome>;
}

export class UnknownCapabilityError extends Error {
  readonly code = 'UNKNOWN_CAPABILITY';

  constructor(name: string) {
    super(`Capability not registered: ${name}`);
    this.name = 'UnknownCapabilityError';
  }
}

export class CapabilityRegistry {
  private readonly byName = new Map<string, Capability>();

  constructor(capabilities: Capability[] = []) {
    for (const capability of capabilities) {
      this.register(capability);
    }
  }

  register(capability: Capability): void {
    this.byName.set(capability.name, capability);
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  resolve(name: string): Capability {
    const capability = this.byName.get(name);
    if (capability === undefined) {
      throw new UnknownCapabilityError(name);
    }

    return capability;
  }

  list(): string[] {
    return Array.from(this.byName.keys()).sort();
  }
}
