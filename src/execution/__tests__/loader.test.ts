/**
 * Tests for loadResponse and response envelopes
 */

import { describe, it, expect, vi } from 'vitest';
import { loadResponse } from '../loader.js';
import type { RequestLoader } from '../loader.js';
import { Metrics, Response } from '../response.js';
import { createMockLoader, dataResponse, MockRequestLoader } from '../../mocks/index.js';
import { RequestDescription } from '../../request/description.js';
import type { Requestable } from '../../request/requestable.js';
import type { DataResponse } from '../../types/responses.js';

describe('loadResponse', () => {
  it('should wrap the loader result with the request', async () => {
    const loader = createMockLoader('hello', { statusCode: 202 });
    const request = RequestDescription.get('https://example.com');

    const response = await loadResponse(loader, request);

    expect(response.request).toBe(request);
    expect(new TextDecoder().decode(response.result.data)).toBe('hello');
    expect(response.result.urlResponse.statusCode).toBe(202);
  });

  it('should call the loader once with the request', async () => {
    const data = vi.fn(async (_request: Requestable) => dataResponse('ok'));
    const loader: RequestLoader<DataResponse> = { data };
    const request = RequestDescription.get('https://example.com');

    await loadResponse(loader, request);

    expect(data).toHaveBeenCalledTimes(1);
    expect(data).toHaveBeenCalledWith(request);
  });

  it('should time the loader call', async () => {
    const loader = createMockLoader('slow', { delay: 50 });
    const before = Date.now();

    const response = await loadResponse(loader, RequestDescription.get('https://example.com'));
    const after = Date.now();

    // Timers may fire a millisecond early against the monotonic clock
    expect(response.metrics.duration).toBeGreaterThanOrEqual(0.045);
    expect(response.metrics.startDate.getTime()).toBeGreaterThanOrEqual(before);
    expect(response.metrics.startDate.getTime()).toBeLessThanOrEqual(after);
  });

  it('should propagate a loader failure unchanged', async () => {
    const failure = new Error('connection refused');
    const loader = new MockRequestLoader<DataResponse>({ error: failure });

    await expect(loadResponse(loader, RequestDescription.get('https://example.com'))).rejects.toBe(
      failure
    );
  });

  it('should propagate non-Error rejections unchanged', async () => {
    const loader = new MockRequestLoader<DataResponse>({ error: 'plain reason' });

    await expect(loadResponse(loader, RequestDescription.get('https://example.com'))).rejects.toBe(
      'plain reason'
    );
  });

  it('should run concurrent loads independently', async () => {
    const loader = new MockRequestLoader<DataResponse>({ result: dataResponse('default') })
      .enqueue({ result: dataResponse('slow'), delay: 30 })
      .enqueue({ result: dataResponse('fast') });
    const first = RequestDescription.get('https://example.com/slow');
    const second = RequestDescription.get('https://example.com/fast');

    const [slow, fast] = await Promise.all([loadResponse(loader, first), loadResponse(loader, second)]);

    expect(slow.request).toBe(first);
    expect(fast.request).toBe(second);
    expect(new TextDecoder().decode(slow.result.data)).toBe('slow');
    expect(new TextDecoder().decode(fast.result.data)).toBe('fast');
  });

  it('should let the loader honor cancellation', async () => {
    const controller = new AbortController();
    const loader: RequestLoader<string> = {
      data: () =>
        new Promise<string>((_resolve, reject) => {
          controller.signal.addEventListener('abort', () => reject(new Error('cancelled')));
        }),
    };

    const pending = loadResponse(loader, RequestDescription.get('https://example.com'));
    controller.abort();

    await expect(pending).rejects.toThrow('cancelled');
  });
});

describe('Metrics', () => {
  it('should derive milliseconds and the end date', () => {
    const metrics = new Metrics(new Date('2024-01-01T00:00:00.000Z'), 1.5);

    expect(metrics.durationMs).toBe(1500);
    expect(metrics.endDate.toISOString()).toBe('2024-01-01T00:00:01.500Z');
  });

  it('should be frozen', () => {
    expect(Object.isFrozen(new Metrics(new Date(), 0))).toBe(true);
  });
});

describe('Response', () => {
  it('should derive a copy with replaced fields', () => {
    const request = RequestDescription.get('https://example.com');
    const metrics = new Metrics(new Date(), 0.1);
    const response = new Response(request, 'first', metrics);

    const changed = response.with({ result: 'second' });

    expect(changed.result).toBe('second');
    expect(changed.request).toBe(request);
    expect(changed.metrics).toBe(metrics);
    expect(response.result).toBe('first');
    expect(Object.isFrozen(changed)).toBe(true);
  });
});
