/**
 * Webhook Delivery
 *
 * POSTs a workflow event to the caller's URL. Throwing makes BullMQ retry
 * with backoff; refusals that a retry cannot fix are marked unrecoverable.
 */

import { UnrecoverableError } from 'bullmq';
import type { FetchLike, WebhookDeliveryJob } from '@docintake/shared';

export interface DeliveryOptions {
  timeoutMs: number;
  fetchImpl?: FetchLike;
}

export interface WebhookEvent {
  event: WebhookDeliveryJob['event_type'];
  workflow_id: string;
  data: WebhookDeliveryJob['payload'];
  delivered_at: string;
}

export class WebhookDeliveryError extends Error {
  constructor(
    message: string,
    public readonly status?: number
  ) {
    super(message);
    this.name = 'WebhookDeliveryError';
  }
}

/** 4xx answers worth retrying */
const RETRYABLE_CLIENT_STATUSES = new Set([408, 409, 425, 429]);

export function buildWebhookEvent(job: WebhookDeliveryJob): WebhookEvent {
  return {
    event: job.event_type,
    workflow_id: job.workflow_id,
    data: job.payload,
    delivered_at: new Date().toISOString(),
  };
}

/**
 * @returns the receiver's HTTP status
 * @throws WebhookDeliveryError on network failure, timeout or a retryable status
 * @throws UnrecoverableError on any other non-2xx status
 */
export async function deliverWebhook(job: WebhookDeliveryJob, options: DeliveryOptions): Promise<number> {
  const fetchImpl = options.fetchImpl ?? fetch;

  let response: Response;
  try {
    response = await fetchImpl(job.webhook_url, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'X-Correlation-Id': job.correlation_id,
        'X-Webhook-Event': job.event_type,
      },
      body: JSON.stringify(buildWebhookEvent(job)),
      signal: AbortSignal.timeout(options.timeoutMs),
    });
  } catch (error) {
    const reason = error instanceof Error && error.name === 'TimeoutError'
      ? `no response within ${options.timeoutMs}ms`
      : error instanceof Error ? error.message : String(error);
    throw new WebhookDeliveryError(`Webhook delivery to ${job.webhook_url} failed: ${reason}`);
  }

  if (response.ok) {
    return response.status;
  }

  const message = `Webhook ${job.webhook_url} answered HTTP ${response.status}`;
  if (response.status >= 400 && response.status < 500 && !RETRYABLE_CLIENT_STATUSES.has(response.status)) {
    throw new UnrecoverableError(message);
  }
  throw new WebhookDeliveryError(message, response.status);
}
