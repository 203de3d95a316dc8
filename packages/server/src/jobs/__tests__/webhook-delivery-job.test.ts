import { describe, it, expect, afterEach, vi } from 'vitest';
import { createWebhookDeliveryJobType } from '../webhook-delivery-job.js';
import { PermanentJobError, RetryableJobError } from '../job-errors.js';
import { JobQueue } from '../job-queue.js';
import type { JobRecord } from '../job-record.js';
import { AppReadiness } from '../../lib/app-readiness.js';
import { ReachabilityManager } from '../../lib/reachability.js';
import { createTestStorage, findRecord } from '../../__tests__/test-utils.js';

function createRecord(payload: unknown): JobRecord {
  return {
    id: 1,
    label: 'webhook:deliver',
    status: 'running',
    failureCount: 0,
    exclusiveProcessIdentifier: null,
    payload: JSON.stringify(payload),
    lastError: null,
    createdAt: 0,
    updatedAt: 0,
  };
}

function createDelegate() {
  return {
    durableOperationDidSucceed: vi.fn(async () => {}),
    durableOperationDidReportError: vi.fn(async () => {}),
    durableOperationDidFail: vi.fn(async (_operation: unknown, _error: unknown) => {}),
  };
}

async function deliver(
  payload: unknown,
  maxRetries = 10,
  reachability = new ReachabilityManager()
) {
  const delegate = createDelegate();
  const operation = createWebhookDeliveryJobType({ reachability }).buildOperation(createRecord(payload));
  operation.attach(delegate, { maxRetries, retryBackoff: { baseMs: 1, maxMs: 1 } });
  await operation.execute();
  return delegate;
}

describe('webhook:deliver', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should require the internet and allow ten retries', () => {
    const jobType = createWebhookDeliveryJobType({ reachability: new ReachabilityManager() });
    expect(jobType.label).toBe('webhook:deliver');
    expect(jobType.requiresInternet).toBe(true);
    expect(jobType.maxRetries).toBe(10);
  });

  it('should POST the JSON body with custom headers', async () => {
    const fetchMock = vi.fn(async () => new Response('ok', { status: 200 }));
    vi.stubGlobal('fetch', fetchMock);

    const delegate = await deliver({
      url: 'https://example.test/hook',
      body: { event: 'ping' },
      headers: { 'X-Signature': 'test-secret' },
    });

    expect(fetchMock).toHaveBeenCalledWith('https://example.test/hook', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', 'X-Signature': 'test-secret' },
      body: '{"event":"ping"}',
      signal: expect.any(AbortSignal),
    });
    expect(delegate.durableOperationDidSucceed).toHaveBeenCalledTimes(1);
  });

  it.each([500, 503, 408, 429])('should retry on HTTP %i', async (status) => {
    const fetchMock = vi
      .fn()
      .mockResolvedValueOnce(new Response('busy', { status }))
      .mockResolvedValueOnce(new Response('ok', { status: 200 }));
    vi.stubGlobal('fetch', fetchMock);

    const delegate = await deliver({ url: 'https://example.test/hook', body: {} });

    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(delegate.durableOperationDidReportError).toHaveBeenCalledTimes(1);
    expect(delegate.durableOperationDidSucceed).toHaveBeenCalledTimes(1);
  });

  it('should report a retryable error once retries run out', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('unavailable', { status: 503 })));

    const delegate = await deliver({ url: 'https://example.test/hook', body: {} }, 0);

    const error = delegate.durableOperationDidFail.mock.calls[0]?.[1];
    expect(error).toBeInstanceOf(RetryableJobError);
    expect(error).toHaveProperty('message', 'Webhook delivery failed: 503 - unavailable');
  });

  it.each([400, 404, 410])('should fail permanently on HTTP %i', async (status) => {
    const fetchMock = vi.fn(async () => new Response('nope', { status }));
    vi.stubGlobal('fetch', fetchMock);

    const delegate = await deliver({ url: 'https://example.test/hook', body: {} });

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const error = delegate.durableOperationDidFail.mock.calls[0]?.[1];
    expect(error).toBeInstanceOf(PermanentJobError);
    expect(error).toHaveProperty('message', `Webhook delivery failed: ${status} - nope`);
  });

  it('should retry network errors', async () => {
    const fetchMock = vi
      .fn()
      .mockRejectedValueOnce(new TypeError('fetch failed'))
      .mockResolvedValueOnce(new Response('ok', { status: 200 }));
    vi.stubGlobal('fetch', fetchMock);

    const delegate = await deliver({ url: 'https://example.test/hook', body: {} });

    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(delegate.durableOperationDidSucceed).toHaveBeenCalledTimes(1);
  });

  it('should refuse to build an operation for an invalid payload', () => {
    const jobType = createWebhookDeliveryJobType({ reachability: new ReachabilityManager() });
    expect(() => jobType.buildOperation(createRecord({ url: 'nope', body: {} }))).toThrow(
      PermanentJobError
    );
  });

  describe('reachability', () => {
    it('should mark the network unreachable when no response arrives', async () => {
      vi.stubGlobal('fetch', vi.fn().mockRejectedValue(new TypeError('fetch failed')));
      const reachability = new ReachabilityManager();

      await deliver({ url: 'https://example.test/hook', body: {} }, 0, reachability);

      expect(reachability.isReachable).toBe(false);
    });

    it('should mark the network reachable on any HTTP response', async () => {
      vi.stubGlobal('fetch', vi.fn(async () => new Response('nope', { status: 404 })));
      const reachability = new ReachabilityManager(false);

      await deliver({ url: 'https://example.test/hook', body: {} }, 0, reachability);

      expect(reachability.isReachable).toBe(true);
    });

    it('should leave reachability alone for other errors', async () => {
      vi.stubGlobal('fetch', vi.fn().mockRejectedValue(new Error('socket hang up')));
      const reachability = new ReachabilityManager();
      const listener = vi.fn();
      reachability.onChange(listener);

      await deliver({ url: 'https://example.test/hook', body: {} }, 0, reachability);

      expect(reachability.isReachable).toBe(true);
      expect(listener).not.toHaveBeenCalled();
    });

    it('should release a waiting retry once another delivery gets through', async () => {
      let offline = true;
      const fetchMock = vi.fn(async (url: string) => {
        if (offline && url === 'https://example.test/first') {
          offline = false;
          throw new TypeError('fetch failed');
        }
        return new Response('ok', { status: 200 });
      });
      vi.stubGlobal('fetch', fetchMock);

      const t = await createTestStorage();
      const readiness = new AppReadiness();
      readiness.setAppIsReady();
      const reachability = new ReachabilityManager();
      const queue = new JobQueue({
        // Long enough that only a reconnect can release the retry
        jobType: createWebhookDeliveryJobType({
          reachability,
          retryBackoff: { baseMs: 60_000, maxMs: 60_000 },
        }),
        storage: t.storage,
        store: t.store,
        readiness,
        reachability,
        processIdentifier: 'process-a',
      });

      try {
        await queue.setup();
        const first = await queue.enqueue({ url: 'https://example.test/first', body: {} });
        await vi.waitFor(() => {
          expect(queue.runningOperations.get(first.id)?.isWaitingForRetry).toBe(true);
        });
        expect(reachability.isReachable).toBe(false);

        const second = await queue.enqueue({ url: 'https://example.test/second', body: {} });

        await vi.waitFor(async () => {
          expect(await findRecord(t, first.id)).toBeNull();
          expect(await findRecord(t, second.id)).toBeNull();
        });
        expect(reachability.isReachable).toBe(true);
        expect(fetchMock.mock.calls.map(([url]) => url)).toEqual([
          'https://example.test/first',
          'https://example.test/second',
          'https://example.test/first',
        ]);
      } finally {
        await queue.stop();
        await t.db.destroy();
      }
    });
  });
});
