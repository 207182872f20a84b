/**
 * Prometheus Metrics
 *
 * Metrics for monitoring backend attempts, extraction outcomes, webhook
 * delivery and HTTP traffic.
 */

import http from 'node:http';
import type { Queue } from 'bullmq';
import * as promClient from 'prom-client';
import { logger } from './logger';
import { getQueueMetrics } from './queues';

// Create a Registry for metrics
export const register = new promClient.Registry();

// Default metrics (CPU, memory, etc.) - wrap to avoid crashes on restricted environments
try {
  promClient.collectDefaultMetrics({ register });
} catch (err) {
  logger.warn('Default Prometheus metrics collection skipped', {
    error: err instanceof Error ? err.message : String(err),
  });
}

// ============================================================================
// Queue Metrics
// ============================================================================

export const queueDepthGauge = new promClient.Gauge({
  name: 'docintake_queue_depth',
  help: 'Current queue depth (waiting + active jobs)',
  labelNames: ['queue'],
  registers: [register],
});

export const jobsProcessedCounter = new promClient.Counter({
  name: 'docintake_jobs_processed_total',
  help: 'Total number of jobs processed',
  labelNames: ['queue', 'status'],
  registers: [register],
});

// ============================================================================
// Extraction Metrics
// ============================================================================

export const backendAttemptsCounter = new promClient.Counter({
  name: 'docintake_backend_attempts_total',
  help: 'Backend attempts by outcome (success or failure kind)',
  labelNames: ['backend', 'outcome'],
  registers: [register],
});

export const backendRequestDurationHistogram = new promClient.Histogram({
  name: 'docintake_backend_request_duration_seconds',
  help: 'Duration of backend completion requests',
  labelNames: ['backend'],
  buckets: [0.1, 0.5, 1, 2, 5, 10, 20, 30, 60],
  registers: [register],
});

export const extractionsCounter = new promClient.Counter({
  name: 'docintake_extractions_total',
  help: 'Extraction results by document type, method and confidence level',
  labelNames: ['document_type', 'extraction_method', 'confidence_level'],
  registers: [register],
});

export const extractionDurationHistogram = new promClient.Histogram({
  name: 'docintake_extraction_duration_seconds',
  help: 'End-to-end duration of document extraction',
  labelNames: ['extraction_method'],
  buckets: [0.5, 1, 2, 5, 10, 20, 30, 60, 120],
  registers: [register],
});

export const documentsProcessedCounter = new promClient.Counter({
  name: 'docintake_documents_processed_total',
  help: 'Total number of uploaded documents processed',
  labelNames: ['workflow', 'status'],
  registers: [register],
});

// ============================================================================
// Webhook Metrics
// ============================================================================

export const webhookDeliveriesCounter = new promClient.Counter({
  name: 'docintake_webhook_deliveries_total',
  help: 'Webhook delivery attempts by outcome',
  labelNames: ['status'],
  registers: [register],
});

// ============================================================================
// HTTP Request Metrics
// ============================================================================

export const httpRequestDurationHistogram = new promClient.Histogram({
  name: 'docintake_http_request_duration_seconds',
  help: 'Duration of HTTP requests',
  labelNames: ['method', 'path', 'status'],
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5, 30],
  registers: [register],
});

export const httpRequestsCounter = new promClient.Counter({
  name: 'docintake_http_requests_total',
  help: 'Total number of HTTP requests',
  labelNames: ['method', 'path', 'status'],
  registers: [register],
});

// ============================================================================
// Database Metrics
// ============================================================================

export const dbQueryDurationHistogram = new promClient.Histogram({
  name: 'docintake_db_query_duration_seconds',
  help: 'Duration of database queries',
  labelNames: ['operation'],
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 2],
  registers: [register],
});

/**
 * Report queue depths to Prometheus gauges.
 * Call before getMetrics() so scrapes include current queue state.
 */
export async function reportQueueMetrics(
  queues: Array<{ name: string; queue: Queue }>
): Promise<void> {
  for (const { name, queue } of queues) {
    try {
      const m = await getQueueMetrics(queue);
      queueDepthGauge.set({ queue: name }, m.waiting + m.active);
    } catch (err) {
      logger.warn('Queue metrics unavailable', {
        queue: name,
        error: err instanceof Error ? err.message : String(err),
      });
      queueDepthGauge.set({ queue: name }, -1);
    }
  }
}

/**
 * Get Prometheus metrics endpoint handler
 */
export async function getMetrics(): Promise<string> {
  return register.metrics();
}

/**
 * Get content type for Prometheus metrics
 */
export function getMetricsContentType(): string {
  return register.contentType;
}

/**
 * Start a minimal HTTP server for /metrics (for worker processes).
 * Uses Node built-in http - no express required.
 */
export function serveMetrics(port: number): http.Server {
  const server = http.createServer((req, res) => {
    if (req.url === '/metrics' && req.method === 'GET') {
      getMetrics()
        .then((body) => {
          res.setHeader('Content-Type', getMetricsContentType());
          res.end(body);
        })
        .catch((err: unknown) => {
          logger.error('Failed to render metrics', err);
          res.statusCode = 500;
          res.end();
        });
    } else {
      res.statusCode = 404;
      res.end();
    }
  });
  server.listen(port, () => {
    logger.info('Metrics server listening', { port });
  });
  return server;
}
