import test from 'node:test';
import assert from 'node:assert/strict';

import { mapWithConcurrency, type MapSettled } from '../src/lib/mapWithConcurrency.js';
import { abortError } from './fixtures.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function fulfilledValues<R>(results: MapSettled<R>[]): R[] {
  return results.flatMap((result) => (result.status === 'fulfilled' ? [result.value] : []));
}

// ---------------------------------------------------------------------------
// Basic behavior
// ---------------------------------------------------------------------------

test('mapWithConcurrency processes all items in input order', async () => {
  const results = await mapWithConcurrency([1, 2, 3, 4, 5], 3, async (n) => n * 2);
  assert.deepEqual(fulfilledValues(results), [2, 4, 6, 8, 10]);
  assert.ok(results.every((result) => result.status === 'fulfilled'));
});

test('mapWithConcurrency returns empty array for empty input', async () => {
  const results = await mapWithConcurrency([], 4, async (x: number) => x);
  assert.deepEqual(results, []);
});

test('mapWithConcurrency preserves result order regardless of completion order', async () => {
  const results = await mapWithConcurrency([50, 30, 10, 40, 20], 5, async (ms, idx) => {
    await delay(ms);
    return idx;
  });
  assert.deepEqual(fulfilledValues(results), [0, 1, 2, 3, 4]);
});

// ---------------------------------------------------------------------------
// Concurrency limit
// ---------------------------------------------------------------------------

test('mapWithConcurrency does not exceed specified concurrency', async () => {
  let concurrent = 0;
  let maxConcurrent = 0;

  await mapWithConcurrency(
    Array.from({ length: 10 }, (_, i) => i),
    3,
    async () => {
      concurrent++;
      maxConcurrent = Math.max(maxConcurrent, concurrent);
      await delay(5);
      concurrent--;
    },
  );

  assert.ok(maxConcurrent <= 3, `maxConcurrent=${maxConcurrent} exceeded limit=3`);
});

test('mapWithConcurrency with concurrency=1 processes items serially', async () => {
  const order: number[] = [];

  await mapWithConcurrency([1, 2, 3], 1, async (n) => {
    order.push(n);
    await delay(1);
  });

  assert.deepEqual(order, [1, 2, 3]);
});

// ---------------------------------------------------------------------------
// onSettled callback
// ---------------------------------------------------------------------------

test('mapWithConcurrency onSettled receives result, index and item', async () => {
  const calls: Array<{ result: MapSettled<string>; index: number; item: string }> = [];

  await mapWithConcurrency(['a', 'b', 'c'], 2, async (s) => s.toUpperCase(), {
    onSettled: (result, index, item) => calls.push({ result, index, item }),
  });

  assert.equal(calls.length, 3);
  const sorted = calls.sort((a, b) => a.index - b.index);
  assert.deepEqual(sorted[0], { result: { status: 'fulfilled', value: 'A' }, index: 0, item: 'a' });
});

test('mapWithConcurrency error in onSettled does not abort processing', async () => {
  let settledCount = 0;

  const results = await mapWithConcurrency([1, 2, 3], 2, async (n) => n, {
    onSettled: () => {
      settledCount++;
      throw new Error('callback error');
    },
  });

  assert.equal(settledCount, 3);
  assert.deepEqual(fulfilledValues(results), [1, 2, 3]);
});

// ---------------------------------------------------------------------------
// Worker errors
// ---------------------------------------------------------------------------

test('mapWithConcurrency captures worker exceptions as rejected results', async () => {
  const boom = new Error('boom');
  const results = await mapWithConcurrency([1, 2, 3], 2, async (n) => {
    if (n === 2) throw boom;
    return n * 10;
  });

  assert.deepEqual(results, [
    { status: 'fulfilled', value: 10 },
    { status: 'rejected', reason: boom },
    { status: 'fulfilled', value: 30 },
  ]);
});

// ---------------------------------------------------------------------------
// shouldStop
// ---------------------------------------------------------------------------

test('mapWithConcurrency reports items never started as skipped', async () => {
  let processedCount = 0;

  const results = await mapWithConcurrency(
    [1, 2, 3, 4],
    1,
    async (n) => {
      processedCount++;
      return n;
    },
    { shouldStop: () => processedCount >= 2 },
  );

  assert.deepEqual(results, [
    { status: 'fulfilled', value: 1 },
    { status: 'fulfilled', value: 2 },
    { status: 'skipped' },
    { status: 'skipped' },
  ]);
});

test('mapWithConcurrency with shouldStop=always-true starts nothing', async () => {
  let processedCount = 0;

  const results = await mapWithConcurrency(
    Array.from({ length: 20 }, (_, i) => i),
    4,
    async () => {
      processedCount++;
    },
    { shouldStop: () => true },
  );

  assert.equal(processedCount, 0);
  assert.ok(results.every((result) => result.status === 'skipped'));
});

test('mapWithConcurrency shouldStop error does not abort processing', async () => {
  let processedCount = 0;

  await mapWithConcurrency(
    [1, 2, 3],
    2,
    async (n) => {
      processedCount++;
      return n;
    },
    {
      shouldStop: () => {
        throw new Error('shouldStop error');
      },
    },
  );

  assert.equal(processedCount, 3);
});

test('mapWithConcurrency stops after an AbortError once shouldStop agrees', async () => {
  const controller = new AbortController();
  let processedCount = 0;

  const results = await mapWithConcurrency(
    [1, 2, 3, 4, 5],
    1,
    async (n) => {
      processedCount++;
      if (n === 2) {
        controller.abort();
        throw abortError();
      }
      return n;
    },
    { shouldStop: () => controller.signal.aborted },
  );

  assert.equal(processedCount, 2);
  assert.equal(results[1].status, 'rejected');
  assert.deepEqual(results.slice(2), [{ status: 'skipped' }, { status: 'skipped' }, { status: 'skipped' }]);
});
