/**
 * Webhook delivery
 */

import { UnrecoverableError } from 'bullmq';
import type { FetchLike, WebhookDeliveryJob } from '@docintake/shared';
import {
  WebhookDeliveryError,
  buildWebhookEvent,
  deliverWebhook,
} from '../../services/worker-webhook/src/lib/deliver';

const job: WebhookDeliveryJob = {
  event_type: 'workflow.failed',
  correlation_id: 'corr-1',
  workflow_id: 'wf-1',
  webhook_url: 'http://hooks.test/receive',
  payload: { workflow_id: 'wf-1', error: 'No text could be extracted from blank.txt' },
};

function respondWith(status: number): jest.MockedFunction<FetchLike> {
  return jest.fn<Promise<Response>, Parameters<FetchLike>>(async () => new Response(null, { status }));
}

describe('buildWebhookEvent', () => {
  it('wraps the payload with the event name and workflow id', () => {
    const event = buildWebhookEvent(job);
    expect(event.event).toBe('workflow.failed');
    expect(event.workflow_id).toBe('wf-1');
    expect(event.data).toEqual(job.payload);
    expect(Number.isNaN(Date.parse(event.delivered_at))).toBe(false);
  });
});

describe('deliverWebhook', () => {
  it('POSTs the event as JSON with correlation headers', async () => {
    const fetchImpl = respondWith(204);

    await expect(deliverWebhook(job, { timeoutMs: 1000, fetchImpl })).resolves.toBe(204);

    expect(fetchImpl).toHaveBeenCalledTimes(1);
    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe('http://hooks.test/receive');
    expect(init.method).toBe('POST');
    expect(init.headers).toEqual({
      'Content-Type': 'application/json',
      'X-Correlation-Id': 'corr-1',
      'X-Webhook-Event': 'workflow.failed',
    });
    expect(typeof init.body).toBe('string');
    expect(JSON.parse(String(init.body))).toMatchObject({
      event: 'workflow.failed',
      workflow_id: 'wf-1',
      data: job.payload,
    });
  });

  it('gives up on client errors a retry cannot fix', async () => {
    const delivery = deliverWebhook(job, { timeoutMs: 1000, fetchImpl: respondWith(404) });
    await expect(delivery).rejects.toThrow(UnrecoverableError);
    await expect(delivery).rejects.toThrow('Webhook http://hooks.test/receive answered HTTP 404');
  });

  it.each([429, 503])('retries HTTP %i', async (status) => {
    const delivery = deliverWebhook(job, { timeoutMs: 1000, fetchImpl: respondWith(status) });
    await expect(delivery).rejects.toThrow(WebhookDeliveryError);
    await expect(delivery).rejects.toMatchObject({ status });
  });

  it('retries when the receiver does not answer in time', async () => {
    const timeout = new Error('The operation was aborted due to timeout');
    timeout.name = 'TimeoutError';
    const fetchImpl: FetchLike = async () => {
      throw timeout;
    };

    await expect(deliverWebhook(job, { timeoutMs: 250, fetchImpl })).rejects.toThrow(
      new WebhookDeliveryError(
        'Webhook delivery to http://hooks.test/receive failed: no response within 250ms'
      )
    );
  });

  it('retries on network errors', async () => {
    const fetchImpl: FetchLike = async () => {
      throw new TypeError('fetch failed');
    };

    await expect(deliverWebhook(job, { timeoutMs: 1000, fetchImpl })).rejects.toThrow(
      'Webhook delivery to http://hooks.test/receive failed: fetch failed'
    );
  });
});
