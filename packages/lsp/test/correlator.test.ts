import { afterEach, describe, expect, it, vi } from 'vitest';

import { ConnectionClosedError, RequestTimeoutError } from '../src/errors.js';
import { ResponseCorrelator } from '../src/service/correlator.js';

afterEach(() => {
  vi.useRealTimers();
});

describe('ResponseCorrelator', () => {
  it('allocates increasing ids starting at 1', () => {
    const correlator = new ResponseCorrelator();
    const ids = [
      correlator.register('a').id,
      correlator.register('b').id,
      correlator.register('c').id,
    ];
    expect(ids).toEqual([1, 2, 3]);
    expect(correlator.size).toBe(3);
  });

  it('delivers responses to the matching waiter regardless of order', async () => {
    const correlator = new ResponseCorrelator();
    const first = correlator.register('first');
    const second = correlator.register('second');

    expect(correlator.resolve({ jsonrpc: '2.0', id: 2, result: 'two' })).toBe(
      true,
    );
    expect(correlator.resolve({ jsonrpc: '2.0', id: 1, result: 'one' })).toBe(
      true,
    );

    await expect(first.response).resolves.toEqual({
      jsonrpc: '2.0',
      id: 1,
      result: 'one',
    });
    await expect(second.response).resolves.toEqual({
      jsonrpc: '2.0',
      id: 2,
      result: 'two',
    });
    expect(correlator.size).toBe(0);
  });

  it('drops responses for unknown ids', () => {
    const correlator = new ResponseCorrelator();
    correlator.register('pending');

    expect(correlator.resolve({ jsonrpc: '2.0', id: 42, result: null })).toBe(
      false,
    );
    expect(correlator.resolve({ jsonrpc: '2.0', id: 'x', result: null })).toBe(
      false,
    );
    expect(correlator.resolve({ jsonrpc: '2.0', id: null, result: null })).toBe(
      false,
    );
    expect(correlator.size).toBe(1);
  });

  it('ignores a second response for an id already answered', () => {
    const correlator = new ResponseCorrelator();
    const { id } = correlator.register('once');

    expect(correlator.resolve({ jsonrpc: '2.0', id, result: 1 })).toBe(true);
    expect(correlator.resolve({ jsonrpc: '2.0', id, result: 2 })).toBe(false);
  });

  it('times out a waiter and removes its entry', async () => {
    vi.useFakeTimers();
    const correlator = new ResponseCorrelator();
    const { id, response } = correlator.register('textDocument/hover', 1_000);
    const outcome = expect(response).rejects.toThrow(
      new RequestTimeoutError('textDocument/hover', 1_000),
    );

    await vi.advanceTimersByTimeAsync(999);
    expect(correlator.has(id)).toBe(true);

    await vi.advanceTimersByTimeAsync(1);
    await outcome;
    expect(correlator.has(id)).toBe(false);
    expect(correlator.resolve({ jsonrpc: '2.0', id, result: null })).toBe(
      false,
    );
  });

  it('clears the timer once a response arrives', async () => {
    vi.useFakeTimers();
    const correlator = new ResponseCorrelator();
    const { id, response } = correlator.register('fast', 1_000);

    correlator.resolve({ jsonrpc: '2.0', id, result: 'done' });
    expect(vi.getTimerCount()).toBe(0);
    await expect(response).resolves.toMatchObject({ result: 'done' });
  });

  it('never times out without a window', () => {
    vi.useFakeTimers();
    const correlator = new ResponseCorrelator();
    correlator.register('slow');
    correlator.register('slow', 0);
    expect(vi.getTimerCount()).toBe(0);
  });

  it('abandons an entry without settling it', () => {
    vi.useFakeTimers();
    const correlator = new ResponseCorrelator();
    const { id } = correlator.register('send-failed', 500);

    expect(correlator.abandon(id)).toBe(true);
    expect(correlator.abandon(id)).toBe(false);
    expect(correlator.size).toBe(0);
    expect(vi.getTimerCount()).toBe(0);
  });

  it('drains every waiter with the given error', async () => {
    const correlator = new ResponseCorrelator();
    const waiters = [
      correlator.register('a').response,
      correlator.register('b', 10_000).response,
    ];
    const settled = Promise.allSettled(waiters);
    const closed = new ConnectionClosedError();

    expect(correlator.drainAll(closed)).toBe(2);
    expect(correlator.size).toBe(0);
    const reasons = (await settled).map((result) =>
      result.status === 'rejected' ? result.reason : undefined,
    );
    expect(reasons[0]).toBe(closed);
    expect(reasons[1]).toBe(closed);
    expect(correlator.drainAll(closed)).toBe(0);
  });

  it('keeps allocating fresh ids after entries are removed', () => {
    const correlator = new ResponseCorrelator();
    const { id } = correlator.register('a');
    correlator.abandon(id);
    expect(correlator.register('b').id).toBe(2);
  });
});
