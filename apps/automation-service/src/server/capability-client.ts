import {
  capabilityInvocationSchema,
  capabilityOutcomeSchema,
  errorMessage,
  type CapabilityOutcome,
} from '@wellness-automation/shared';
import {
  CORE_CAPABILITIES,
  PREMIUM_CAPABILITIES,
  type Capability,
  type CapabilityRequest,
} from '@wellness-automation/workflow-engine';

export interface AgentGatewayOptions {
  baseUrl: string;
  sharedToken: string;
}

export class CapabilityHttpError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly status?: number,
  ) {
    super(message);
    this.name = 'CapabilityHttpError';
  }
}

export const GATEWAY_RETRYABLE_CODES = ['429', '500', '502', '503', '504', 'NETWORK_ERROR'];

function codeForStatus(status: number): string {
  return status === 429 || status >= 500 ? String(status) : 'EXTERNAL_API_ERROR';
}

/** Calls one capability of the external agent gateway. */
export class HttpCapabilityClient implements Capability {
  constructor(
    readonly name: string,
    private readonly options: AgentGatewayOptions,
  ) {}

  async invoke(request: CapabilityRequest): Promise<CapabilityOutcome> {
    const invocation = capabilityInvocationSchema.parse({
      tenantId: request.tenantId,
      capability: this.name,
      executionId: request.executionId,
      stepName: request.stepName,
      attempt: request.attempt,
      stepInput: request.stepInput,
    });

    let response: Response;
    try {
      response = await fetch(`${this.options.baseUrl}/v1/capabilities/${encodeURIComponent(this.name)}`, {
        method: 'POST',
        headers: {
          'content-type': 'application/json',
          authorization: `Bearer ${this.options.sharedToken}`,
          'x-tenant-id': request.tenantId,
        },
        body: JSON.stringify(invocation),
        signal: request.signal,
      });
    } catch (error) {
      if (request.signal.aborted) {
        throw error;
      }
      throw new CapabilityHttpError('NETWORK_ERROR', `Capability ${this.name} unreachable: ${errorMessage(error)}`);
    }

    if (!response.ok) {
      const text = await response.text();
      throw new CapabilityHttpError(
        codeForStatus(response.status),
        `Capability ${this.name} failed (${response.status}): ${text}`,
        response.status,
      );
    }

    return capabilityOutcomeSchema.parse(await response.json());
  }
}

export function createCapabilityClients(
  options: AgentGatewayOptions,
  names: readonly string[] = [...CORE_CAPABILITIES, ...PREMIUM_CAPABILITIES],
): HttpCapabilityClient[] {
  return names.map((name) => new HttpCapabilityClient(name, options));
}
