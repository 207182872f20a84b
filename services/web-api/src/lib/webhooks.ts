/**
 * Webhook Dispatch
 *
 * Workflow results bound for a caller's webhook go through the
 * webhook_delivery queue; the worker does the HTTP delivery and retries.
 */

import type { Queue } from 'bullmq';
import {
  QUEUE_NAMES,
  createQueue,
  logger,
  reportQueueMetrics,
  type WebhookDeliveryJob,
} from '@docintake/shared';

export interface WebhookDispatcher {
  dispatch(job: WebhookDeliveryJob): Promise<void>;
  /** Refresh queue gauges before a metrics scrape */
  reportMetrics(): Promise<void>;
  close(): Promise<void>;
}

export class QueueWebhookDispatcher implements WebhookDispatcher {
  private readonly queue: Queue<WebhookDeliveryJob, void>;

  constructor(queue?: Queue<WebhookDeliveryJob, void>) {
    this.queue = queue ?? createQueue<WebhookDeliveryJob, void>(QUEUE_NAMES.WEBHOOK_DELIVERY);
  }

  async dispatch(job: WebhookDeliveryJob): Promise<void> {
    // One delivery per workflow; a repeated enqueue is a no-op
    await this.queue.add(job.event_type, job, { jobId: job.workflow_id });

    logger.info('Webhook delivery enqueued', {
      workflow_id: job.workflow_id,
      event_type: job.event_type,
    });
  }

  async reportMetrics(): Promise<void> {
    await reportQueueMetrics([{ name: QUEUE_NAMES.WEBHOOK_DELIVERY, queue: this.queue }]);
  }

  async close(): Promise<void> {
    await this.queue.close();
  }
}

/**
 * @returns the URL when it is an absolute http(s) URL, otherwise null
 */
export function parseWebhookUrl(value: string): string | null {
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:' ? url.href : null;
  } catch {
    return null;
  }
}
