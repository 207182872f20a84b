/**
 * Webhook Worker
 *
 * Consumes webhook_delivery and POSTs each workflow event to its webhook URL.
 * Failed deliveries are retried by BullMQ with exponential backoff.
 */

import 'dotenv/config';
import { Job, UnrecoverableError } from 'bullmq';
import {
  QUEUE_NAMES,
  config,
  createWorker,
  jobsProcessedCounter,
  logger,
  runWithContextAsync,
  serveMetrics,
  webhookDeliveriesCounter,
  type WebhookDeliveryJob,
} from '@docintake/shared';
import { deliverWebhook } from './lib/deliver';

/**
 * Process webhook_delivery job
 */
async function processWebhookDelivery(job: Job<WebhookDeliveryJob, void>): Promise<void> {
  const { correlation_id, workflow_id, event_type, webhook_url } = job.data;

  return runWithContextAsync({ correlationId: correlation_id }, async () => {
    logger.info('Delivering webhook', {
      jobId: job.id,
      workflow_id,
      event_type,
      webhook_url,
      attempt: job.attemptsMade + 1,
    });

    try {
      const status = await deliverWebhook(job.data, { timeoutMs: config.webhookTimeoutMs });

      webhookDeliveriesCounter.inc({ status: 'delivered' });
      jobsProcessedCounter.inc({ queue: QUEUE_NAMES.WEBHOOK_DELIVERY, status: 'success' });
      logger.info('Webhook delivered', { workflow_id, http_status: status });
    } catch (error) {
      const outcome = error instanceof UnrecoverableError ? 'rejected' : 'failed';
      webhookDeliveriesCounter.inc({ status: outcome });
      jobsProcessedCounter.inc({ queue: QUEUE_NAMES.WEBHOOK_DELIVERY, status: 'failed' });
      throw error;
    }
  });
}

// Expose /metrics for Prometheus
const metricsServer = serveMetrics(config.workerMetricsPort);

// Create and start the worker
const worker = createWorker<WebhookDeliveryJob, void>(
  QUEUE_NAMES.WEBHOOK_DELIVERY,
  processWebhookDelivery
);

logger.info('Webhook worker started', { concurrency: config.workerConcurrency });

// Graceful shutdown
async function shutdown(signal: string): Promise<void> {
  logger.info(`${signal} received, shutting down`);
  await worker.close();
  metricsServer.close();
  process.exit(0);
}

process.on('SIGTERM', () => {
  shutdown('SIGTERM').catch((error) => {
    logger.error('Shutdown failed', error);
    process.exit(1);
  });
});
process.on('SIGINT', () => {
  shutdown('SIGINT').catch((error) => {
    logger.error('Shutdown failed', error);
    process.exit(1);
  });
});
