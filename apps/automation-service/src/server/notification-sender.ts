import { notificationDeliveryResultSchema, type NotificationDeliveryResult } from '@wellness-automation/shared';
import type { NotificationRequest, NotificationSender } from '@wellness-automation/workflow-engine';

export interface NotificationGatewayOptions {
  baseUrl: string;
  sharedToken: string;
  timeoutMs?: number;
}

/**
 * Hands alerts to the notification gateway. Gateway rejections come back as a
 * failed delivery so the escalation manager can count the attempt.
 */
export class HttpNotificationSender implements NotificationSender {
  constructor(private readonly options: NotificationGatewayOptions) {}

  async send(request: NotificationRequest): Promise<NotificationDeliveryResult> {
    const response = await fetch(`${this.options.baseUrl}/v1/notifications`, {
      method: 'POST',
      headers: {
        'content-type': 'application/json',
        authorization: `Bearer ${this.options.sharedToken}`,
        'x-tenant-id': request.tenantId,
      },
      body: JSON.stringify({
        tenantId: request.tenantId,
        alertId: request.alert.id,
        severity: request.alert.severity,
        message: request.alert.message,
        contact: request.contact,
        channel: request.channel,
      }),
      signal: AbortSignal.timeout(this.options.timeoutMs ?? 10_000),
    });

    if (!response.ok) {
      return { status: 'failed', reason: `Notification gateway responded ${response.status}` };
    }

    return notificationDeliveryResultSchema.parse(await response.json());
  }
}
