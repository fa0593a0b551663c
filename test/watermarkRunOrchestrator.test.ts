import test from 'node:test';
import assert from 'node:assert/strict';

import { FetchError, InvalidRunOptionsError, StoreUnavailableError } from '../src/lib/errors.js';
import type { RunMetrics, RunOutcome } from '../src/metrics.js';
import { resolveRunPolicy, runWatermarkBatch, type WatermarkRunDeps } from '../src/orchestrators/watermarkRunOrchestrator.js';
import { createHttpFetchAndLoad, type FetchAndLoad, type FetchLoadRequest } from '../src/services/fetchLoadClient.js';
import { InMemoryWatermarkStore } from '../src/services/memoryWatermarkStore.js';
import { exitCodeForStatus } from '../src/services/runSummary.js';
import type { ListEligibleOptions } from '../src/services/watermarkStore.js';
import type { ObservedDateRange, Watermark, WatermarkDecisionRow, WatermarkPolicy } from '../src/services/watermarkTypes.js';
import { parseRunOptions } from '../src/lib/schemas.js';
import { NOW, abortError, daysBefore, hoursBefore, watermark } from './fixtures.js';

const TARGET = 'INCOME_STATEMENT';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function padSymbol(i: number): string {
  return `S${String(i).padStart(3, '0')}`;
}

function createMetrics() {
  const decisions: Array<[string, string, number]> = [];
  const attempts: RunOutcome[] = [];
  const metrics: RunMetrics = {
    recordDecision: (target, decision, count = 1) => {
      decisions.push([target, decision, count]);
    },
    recordAttempt: (_target, outcome) => {
      attempts.push(outcome);
    },
  };
  return { metrics, decisions, attempts };
}

function deps(store: InMemoryWatermarkStore, fetchAndLoad: FetchAndLoad, extra: Partial<WatermarkRunDeps> = {}): WatermarkRunDeps {
  return {
    store,
    fetchAndLoad,
    now: () => NOW,
    metrics: createMetrics().metrics,
    log: () => {},
    error: () => {},
    ...extra,
  };
}

function recordingFetch(respond: (request: FetchLoadRequest) => ReturnType<FetchAndLoad> = async () => ({ ok: true })) {
  const requests: FetchLoadRequest[] = [];
  const fetchAndLoad: FetchAndLoad = async (request) => {
    requests.push(request);
    return respond(request);
  };
  return { fetchAndLoad, requests, symbols: () => requests.map((request) => request.symbol) };
}

function seed(store: InMemoryWatermarkStore, watermarks: Watermark[]): void {
  for (const row of watermarks) store.put(row);
}

// ---------------------------------------------------------------------------
// Selection and ordering
// ---------------------------------------------------------------------------

test('a capped run processes exactly maxSymbols, never-fetched then stalest first', async () => {
  const store = new InMemoryWatermarkStore();
  for (let i = 0; i < 90; i++) {
    store.put(watermark(padSymbol(i), { lastSuccessAt: daysBefore(140 + i), updatedAt: daysBefore(140 + i) }));
  }
  for (let i = 90; i < 100; i++) {
    store.put(watermark(padSymbol(i)));
  }
  const { fetchAndLoad, symbols } = recordingFetch();

  const summary = await runWatermarkBatch({ target: TARGET, batchSize: 50, maxSymbols: 30 }, deps(store, fetchAndLoad));

  const expected = [
    ...Array.from({ length: 10 }, (_, i) => padSymbol(90 + i)),
    ...Array.from({ length: 20 }, (_, i) => padSymbol(89 - i)),
  ];
  assert.deepEqual(symbols(), expected);
  assert.equal(summary.status, 'completed');
  assert.equal(summary.eligible, 30);
  assert.equal(summary.attempted, 30);
  assert.equal(summary.succeeded, 30);
  assert.equal(summary.notStarted, 0);
  assert.equal(summary.skipped.byDecision.SKIP_BATCH_CAP, 70);
  assert.equal(summary.skipped.total, 70);
  assert.equal((await store.get(TARGET, padSymbol(69)))?.lastSuccessAt?.toISOString(), daysBefore(209).toISOString());
  assert.equal((await store.get(TARGET, padSymbol(70)))?.lastSuccessAt?.toISOString(), NOW.toISOString());
});

test('slices larger batches and processes every eligible symbol', async () => {
  const store = new InMemoryWatermarkStore();
  seed(
    store,
    Array.from({ length: 7 }, (_, i) => watermark(padSymbol(i))),
  );
  const logs: string[] = [];
  const { fetchAndLoad, symbols } = recordingFetch();

  const summary = await runWatermarkBatch(
    { target: TARGET, batchSize: 3 },
    deps(store, fetchAndLoad, { log: (message) => logs.push(message) }),
  );

  assert.equal(symbols().length, 7);
  assert.equal(summary.attempted, 7);
  assert.equal(logs.filter((line) => / slice \d\/3 /.test(line)).length, 3);
});

test('passes the observed-date hint and exchange to the loader', async () => {
  const store = new InMemoryWatermarkStore();
  store.put(watermark('AAA', { lastSuccessAt: daysBefore(200), lastObservedDate: '2024-12-31', exchange: 'NYSE' }));
  const { fetchAndLoad, requests } = recordingFetch();

  await runWatermarkBatch({ target: TARGET }, deps(store, fetchAndLoad));

  assert.equal(requests.length, 1);
  assert.equal(requests[0].target, TARGET);
  assert.equal(requests[0].symbol, 'AAA');
  assert.equal(requests[0].exchange, 'NYSE');
  assert.equal(requests[0].sinceDate, '2024-12-31');
  assert.equal(requests[0].watermark.lastObservedDate, '2024-12-31');
});

test('counts every skip decision and reports them to metrics', async () => {
  const store = new InMemoryWatermarkStore();
  seed(store, [
    watermark('FRESH', { lastSuccessAt: daysBefore(10), updatedAt: daysBefore(10) }),
    watermark('HALTED', { consecutiveFailures: 5 }),
    watermark('GONE', { eligibility: 'DELISTED' }),
    watermark('FUND', { assetType: 'ETF' }),
    watermark('RECENT', { consecutiveFailures: 1, updatedAt: hoursBefore(1) }),
    watermark('NEWCO'),
  ]);
  const { fetchAndLoad, symbols } = recordingFetch();
  const { metrics, decisions } = createMetrics();

  const summary = await runWatermarkBatch({ target: TARGET, skipRecentHours: 6 }, deps(store, fetchAndLoad, { metrics }));

  assert.deepEqual(symbols(), ['NEWCO']);
  assert.equal(summary.eligible, 1);
  assert.deepEqual(summary.skipped, {
    total: 5,
    byDecision: {
      SKIP_FRESH: 1,
      SKIP_RECENT_ATTEMPT: 1,
      SKIP_DELISTED: 1,
      SKIP_SUSPENDED: 1,
      SKIP_INELIGIBLE: 1,
      SKIP_BATCH_CAP: 0,
    },
  });
  assert.equal(
    decisions.reduce((sum, [, , count]) => sum + count, 0),
    6,
  );
  assert.ok(decisions.some(([target, decision, count]) => target === TARGET && decision === 'SKIP_FRESH' && count === 1));
});

test('without skipRecentHours a recently failed symbol is retried', async () => {
  const store = new InMemoryWatermarkStore();
  store.put(watermark('RECENT', { consecutiveFailures: 1, updatedAt: hoursBefore(1) }));
  const { fetchAndLoad, symbols } = recordingFetch();

  await runWatermarkBatch({ target: TARGET }, deps(store, fetchAndLoad));

  assert.deepEqual(symbols(), ['RECENT']);
  assert.equal((await store.get(TARGET, 'RECENT'))?.consecutiveFailures, 0);
});

test('an empty target completes with nothing to do', async () => {
  const { fetchAndLoad, symbols } = recordingFetch();
  const summary = await runWatermarkBatch({ target: TARGET }, deps(new InMemoryWatermarkStore(), fetchAndLoad));
  assert.deepEqual(symbols(), []);
  assert.equal(summary.status, 'completed');
  assert.equal(summary.eligible, 0);
  assert.equal(summary.throughputPerMinute, 0);
  assert.match(summary.runId, /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
});

// ---------------------------------------------------------------------------
// Outcomes
// ---------------------------------------------------------------------------

test('records successes and classifies failures', async () => {
  const store = new InMemoryWatermarkStore();
  seed(
    store,
    ['AAA', 'BBB', 'CCC', 'DDD', 'EEE', 'FFF'].map((symbol) => watermark(symbol)),
  );
  const range: ObservedDateRange = { firstDate: '2024-03-31', lastDate: '2025-03-31' };
  const { fetchAndLoad } = recordingFetch(async ({ symbol }) => {
    switch (symbol) {
      case 'AAA':
        return { ok: true, range };
      case 'BBB':
        return { ok: false, kind: 'transient', message: 'rate limited' };
      case 'CCC':
        return { ok: false, kind: 'permanent', message: 'unknown symbol' };
      case 'DDD':
        throw new Error('socket hang up');
      case 'EEE':
        throw new FetchError('not found', 'permanent', { httpStatus: 404 });
      default:
        return { ok: true, range: { firstDate: '2025-02-01', lastDate: '2025-01-01' } };
    }
  });
  const { metrics, attempts } = createMetrics();

  const summary = await runWatermarkBatch({ target: TARGET }, deps(store, fetchAndLoad, { metrics }));

  assert.equal(summary.status, 'completed-with-errors');
  assert.equal(summary.attempted, 6);
  assert.equal(summary.succeeded, 1);
  assert.equal(summary.failed, 5);
  assert.equal(summary.failedTransient, 2);
  assert.equal(summary.failedPermanent, 3);
  assert.equal(exitCodeForStatus(summary.status), 0);
  assert.deepEqual(summary.failedSymbols.slice(0, 4), [
    { symbol: 'BBB', kind: 'transient', message: 'rate limited' },
    { symbol: 'CCC', kind: 'permanent', message: 'unknown symbol' },
    { symbol: 'DDD', kind: 'transient', message: 'socket hang up' },
    { symbol: 'EEE', kind: 'permanent', message: 'not found' },
  ]);
  assert.equal(summary.failedSymbols[4].symbol, 'FFF');
  assert.match(summary.failedSymbols[4].message, /^invalid fetch result: /);
  assert.deepEqual(attempts, [
    'success',
    'failure_transient',
    'failure_permanent',
    'failure_transient',
    'failure_permanent',
    'failure_permanent',
  ]);

  const aaa = await store.get(TARGET, 'AAA');
  assert.equal(aaa?.firstObservedDate, '2024-03-31');
  assert.equal(aaa?.lastObservedDate, '2025-03-31');
  assert.equal(aaa?.lastSuccessAt?.toISOString(), NOW.toISOString());
  const bbb = await store.get(TARGET, 'BBB');
  assert.equal(bbb?.consecutiveFailures, 1);
  assert.equal(bbb?.lastError, 'rate limited');
  assert.equal(bbb?.lastSuccessAt, null);
});

test('a symbol reaching the failure limit is suspended on the next run', async () => {
  const store = new InMemoryWatermarkStore();
  store.put(watermark('AAA', { consecutiveFailures: 4 }));
  const { fetchAndLoad, symbols } = recordingFetch(async () => ({ ok: false, kind: 'transient', message: 'HTTP 500' }));

  await runWatermarkBatch({ target: TARGET }, deps(store, fetchAndLoad));
  const second = await runWatermarkBatch({ target: TARGET }, deps(store, fetchAndLoad));

  assert.deepEqual(symbols(), ['AAA']);
  assert.equal(second.skipped.byDecision.SKIP_SUSPENDED, 1);
  assert.equal(second.eligible, 0);
});

test('runs symbols concurrently within the configured bound', async () => {
  const store = new InMemoryWatermarkStore();
  seed(
    store,
    Array.from({ length: 12 }, (_, i) => watermark(padSymbol(i))),
  );
  let inFlight = 0;
  let maxInFlight = 0;
  const { fetchAndLoad } = recordingFetch(async () => {
    inFlight++;
    maxInFlight = Math.max(maxInFlight, inFlight);
    await delay(2);
    inFlight--;
    return { ok: true };
  });

  const summary = await runWatermarkBatch({ target: TARGET, concurrency: 4 }, deps(store, fetchAndLoad));

  assert.equal(summary.succeeded, 12);
  assert.ok(maxInFlight <= 4, `maxInFlight=${maxInFlight}`);
  assert.ok(maxInFlight > 1, `maxInFlight=${maxInFlight}`);
});

// ---------------------------------------------------------------------------
// Stopping early
// ---------------------------------------------------------------------------

test('error-rate breaker stops the run and keeps processed watermarks', async () => {
  const store = new InMemoryWatermarkStore();
  seed(
    store,
    Array.from({ length: 20 }, (_, i) => watermark(padSymbol(i))),
  );
  const { fetchAndLoad, symbols } = recordingFetch(async () => ({ ok: false, kind: 'transient', message: 'HTTP 500' }));

  const summary = await runWatermarkBatch(
    { target: TARGET, minAttempts: 10, maxErrorRate: 0.5 },
    deps(store, fetchAndLoad),
  );

  assert.equal(summary.status, 'aborted-error-rate');
  assert.equal(summary.error, 'error rate 100.0% exceeded 50.0% after 10 attempts');
  assert.equal(symbols().length, 10);
  assert.equal(summary.attempted, 10);
  assert.equal(summary.failed, 10);
  assert.equal(summary.notStarted, 10);
  assert.equal(exitCodeForStatus(summary.status), 1);
  assert.equal((await store.get(TARGET, padSymbol(9)))?.consecutiveFailures, 1);
  const untouched = await store.get(TARGET, padSymbol(10));
  assert.equal(untouched?.consecutiveFailures, 0);
  assert.equal(untouched?.updatedAt.toISOString(), daysBefore(400).toISOString());
});

test('cancellation lets the in-flight fetch finish and starts nothing else', async () => {
  const store = new InMemoryWatermarkStore();
  seed(
    store,
    ['AAA', 'BBB', 'CCC', 'DDD', 'EEE'].map((symbol) => watermark(symbol)),
  );
  const controller = new AbortController();
  const { fetchAndLoad, symbols } = recordingFetch(async ({ symbol }) => {
    if (symbol === 'CCC') controller.abort();
    return { ok: true, range: null };
  });

  const summary = await runWatermarkBatch({ target: TARGET }, deps(store, fetchAndLoad), controller.signal);

  assert.deepEqual(symbols(), ['AAA', 'BBB', 'CCC']);
  assert.equal(summary.status, 'stopped');
  assert.equal(summary.attempted, 3);
  assert.equal(summary.notStarted, 2);
  assert.equal(exitCodeForStatus(summary.status), 0);
  assert.equal((await store.get(TARGET, 'CCC'))?.lastSuccessAt?.toISOString(), NOW.toISOString());
  const ddd = await store.get(TARGET, 'DDD');
  assert.equal(ddd?.lastSuccessAt, null);
  assert.equal(ddd?.updatedAt.toISOString(), daysBefore(400).toISOString());
});

test('an aborted in-flight fetch is not recorded', async () => {
  const store = new InMemoryWatermarkStore();
  seed(
    store,
    ['AAA', 'BBB', 'CCC', 'DDD'].map((symbol) => watermark(symbol)),
  );
  const controller = new AbortController();
  const { fetchAndLoad } = recordingFetch(async ({ symbol }) => {
    if (symbol === 'CCC') {
      controller.abort();
      throw abortError();
    }
    return { ok: true };
  });

  const summary = await runWatermarkBatch({ target: TARGET }, deps(store, fetchAndLoad), controller.signal);

  assert.equal(summary.status, 'stopped');
  assert.equal(summary.attempted, 2);
  assert.equal(summary.failed, 0);
  assert.equal(summary.notStarted, 2);
  const ccc = await store.get(TARGET, 'CCC');
  assert.equal(ccc?.consecutiveFailures, 0);
  assert.equal(ccc?.lastSuccessAt, null);
});

test('loader errors that mention "aborted" are failures when the run was not cancelled', async () => {
  const store = new InMemoryWatermarkStore();
  seed(store, [watermark('AAA'), watermark('BBB')]);
  const httpLoader = createHttpFetchAndLoad({
    baseUrl: 'http://loader.local',
    timeoutMs: 5000,
    fetchImpl: async () => new Response('request aborted by upstream API', { status: 500 }),
  });
  const { fetchAndLoad } = recordingFetch(async (request) => {
    if (request.symbol === 'AAA') throw new FetchError('upstream transaction aborted: deadlock detected');
    return httpLoader(request);
  });

  const summary = await runWatermarkBatch({ target: TARGET, concurrency: 1, minAttempts: 10 }, deps(store, fetchAndLoad));

  assert.equal(summary.status, 'completed-with-errors');
  assert.equal(summary.attempted, 2);
  assert.equal(summary.failed, 2);
  assert.equal(summary.failedTransient, 2);
  assert.equal(summary.notStarted, 0);
  assert.deepEqual(summary.failedSymbols, [
    { symbol: 'AAA', kind: 'transient', message: 'upstream transaction aborted: deadlock detected' },
    {
      symbol: 'BBB',
      kind: 'transient',
      message: 'INCOME_STATEMENT BBB request failed (500): request aborted by upstream API',
    },
  ]);
  const aaa = await store.get(TARGET, 'AAA');
  assert.equal(aaa?.consecutiveFailures, 1);
  assert.equal(aaa?.lastError, 'upstream transaction aborted: deadlock detected');
  assert.equal((await store.get(TARGET, 'BBB'))?.consecutiveFailures, 1);
});

test('a signal aborted before the run starts nothing', async () => {
  const store = new InMemoryWatermarkStore();
  store.put(watermark('AAA'));
  const controller = new AbortController();
  controller.abort();
  const { fetchAndLoad, symbols } = recordingFetch();

  const summary = await runWatermarkBatch({ target: TARGET }, deps(store, fetchAndLoad), controller.signal);

  assert.deepEqual(symbols(), []);
  assert.equal(summary.status, 'stopped');
  assert.equal(summary.notStarted, 1);
});

// ---------------------------------------------------------------------------
// Store failures
// ---------------------------------------------------------------------------

class UnreachableStore extends InMemoryWatermarkStore {
  async listDecisions(_target: string, _policy: WatermarkPolicy, _options?: ListEligibleOptions): Promise<WatermarkDecisionRow[]> {
    throw new StoreUnavailableError('listDecisions', new Error('connection refused'));
  }
}

class FlakyWriteStore extends InMemoryWatermarkStore {
  private writes = 0;

  async recordSuccess(target: string, symbol: string, range: ObservedDateRange | null, now?: Date): Promise<Watermark> {
    this.writes += 1;
    if (this.writes > 1) throw new StoreUnavailableError('recordSuccess', new Error('connection reset'));
    return super.recordSuccess(target, symbol, range, now);
  }
}

test('a store error while listing fails the run', async () => {
  const { fetchAndLoad, symbols } = recordingFetch();
  const summary = await runWatermarkBatch({ target: TARGET }, deps(new UnreachableStore(), fetchAndLoad));

  assert.equal(summary.status, 'failed');
  assert.equal(summary.error, 'Watermark store unavailable during listDecisions: connection refused');
  assert.equal(summary.eligible, 0);
  assert.deepEqual(symbols(), []);
  assert.equal(exitCodeForStatus(summary.status), 1);
});

test('a store error while recording stops the remaining symbols', async () => {
  const store = new FlakyWriteStore();
  seed(
    store,
    ['AAA', 'BBB', 'CCC'].map((symbol) => watermark(symbol)),
  );
  const { fetchAndLoad, symbols } = recordingFetch();

  const summary = await runWatermarkBatch({ target: TARGET }, deps(store, fetchAndLoad));

  assert.deepEqual(symbols(), ['AAA', 'BBB']);
  assert.equal(summary.status, 'failed');
  assert.equal(summary.error, 'Watermark store unavailable during recordSuccess: connection reset');
  assert.equal(summary.notStarted, 1);
  assert.equal((await store.get(TARGET, 'AAA'))?.lastSuccessAt?.toISOString(), NOW.toISOString());
  assert.equal((await store.get(TARGET, 'BBB'))?.lastSuccessAt, null);
});

// ---------------------------------------------------------------------------
// Options and policy
// ---------------------------------------------------------------------------

test('invalid options are rejected before the store is read', async () => {
  let listed = false;
  class WatchedStore extends InMemoryWatermarkStore {
    async listDecisions(target: string, policy: WatermarkPolicy, options?: ListEligibleOptions) {
      listed = true;
      return super.listDecisions(target, policy, options);
    }
  }
  const { fetchAndLoad } = recordingFetch();

  await assert.rejects(
    () => runWatermarkBatch({ target: TARGET, concurrency: 0 }, deps(new WatchedStore(), fetchAndLoad)),
    InvalidRunOptionsError,
  );
  await assert.rejects(() => runWatermarkBatch({ target: 'CUSTOM_FEED' }, deps(new WatchedStore(), fetchAndLoad)), {
    name: 'InvalidRunOptionsError',
  });
  assert.equal(listed, false);
});

test('unknown targets run with an explicit policy', async () => {
  const store = new InMemoryWatermarkStore();
  store.put(watermark('AAA', { target: 'CUSTOM_FEED', assetType: 'ETF', lastSuccessAt: daysBefore(8) }));
  const { fetchAndLoad, symbols } = recordingFetch();

  const summary = await runWatermarkBatch(
    { target: 'custom_feed', policy: { stalenessThresholdDays: 7, maxConsecutiveFailures: 2 } },
    deps(store, fetchAndLoad),
  );

  assert.equal(summary.target, 'CUSTOM_FEED');
  assert.deepEqual(symbols(), ['AAA']);
});

test('resolveRunPolicy lets skipRecentHours from options override the policy', () => {
  const policy = resolveRunPolicy(
    parseRunOptions({ target: TARGET, skipRecentHours: 12, policy: { skipRecentHours: 2, stalenessThresholdDays: 90 } }),
  );
  assert.equal(policy.skipRecentHours, 12);
  assert.equal(policy.stalenessThresholdDays, 90);
  assert.deepEqual(policy.assetTypes, ['Stock']);
});
