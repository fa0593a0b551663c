import { v4 as uuidv4 } from 'uuid';
import { RUN_FAILED_SYMBOLS_REPORT_LIMIT } from '../config.js';
import { ErrorRateBreaker } from '../lib/circuitBreaker.js';
import {
  InvalidRunOptionsError,
  StoreUnavailableError,
  classifyFetchError,
  describeError,
  isAbortError,
  type FetchFailureKind,
} from '../lib/errors.js';
import { mapWithConcurrency } from '../lib/mapWithConcurrency.js';
import { FetchResultSchema, describeSchemaError, parseRunOptions, type RunOptions } from '../lib/schemas.js';
import { promRunMetrics, type RunMetrics } from '../metrics.js';
import type { FetchAndLoad } from '../services/fetchLoadClient.js';
import {
  emptySkipCounts,
  type FailedSymbol,
  type RunStatus,
  type RunSummary,
} from '../services/runSummary.js';
import { resolveTargetPolicy } from '../services/targetCatalog.js';
import { selectEligible, type WatermarkStore } from '../services/watermarkStore.js';
import type { EligibleSymbol, ObservedDateRange, WatermarkDecisionRow, WatermarkPolicy } from '../services/watermarkTypes.js';

export interface WatermarkRunDeps {
  store: WatermarkStore;
  fetchAndLoad: FetchAndLoad;
  now?: () => Date;
  metrics?: RunMetrics;
  log?: (message: string) => void;
  error?: (message: string) => void;
}

type FetchOutcome = { ok: true; range: ObservedDateRange | null } | { ok: false; kind: FetchFailureKind; message: string };

/**
 * Policy for a run: the catalogue default for known targets, overridden by
 * `options.policy`; unknown targets need a complete policy in the options.
 */
export function resolveRunPolicy(options: RunOptions): WatermarkPolicy {
  const overrides = options.policy ?? {};
  const base =
    resolveTargetPolicy(options.target, overrides) ??
    (overrides.stalenessThresholdDays !== undefined && overrides.maxConsecutiveFailures !== undefined
      ? {
          stalenessThresholdDays: overrides.stalenessThresholdDays,
          maxConsecutiveFailures: overrides.maxConsecutiveFailures,
          skipRecentHours: overrides.skipRecentHours ?? null,
          assetTypes: overrides.assetTypes ?? null,
        }
      : null);
  if (!base) {
    throw new InvalidRunOptionsError([
      `target: unknown target "${options.target}" (pass policy.stalenessThresholdDays and policy.maxConsecutiveFailures)`,
    ]);
  }
  return { ...base, skipRecentHours: options.skipRecentHours ?? base.skipRecentHours ?? null };
}

/**
 * Run one extraction batch for a target.
 *
 * Options are validated before anything is read; an invalid invocation throws
 * InvalidRunOptionsError. Every other failure is reported through the
 * returned summary: per-symbol fetch errors are recorded on their watermark,
 * a store error ends the run as `failed`, a tripped error-rate breaker as
 * `aborted-error-rate` and an aborted `signal` as `stopped`.
 */
export async function runWatermarkBatch(
  input: unknown,
  deps: WatermarkRunDeps,
  signal?: AbortSignal,
): Promise<RunSummary> {
  const options = parseRunOptions(input);
  const policy = resolveRunPolicy(options);
  const {
    store,
    fetchAndLoad,
    now = () => new Date(),
    metrics = promRunMetrics,
    log = (message: string) => console.log(message),
    error = (message: string) => console.error(message),
  } = deps;
  const { target } = options;
  const runSignal = signal ?? new AbortController().signal;

  const runId = uuidv4();
  const startedAt = now();
  const skippedByDecision = emptySkipCounts();
  const failedSymbols: FailedSymbol[] = [];
  let eligible: EligibleSymbol[] = [];
  let attempted = 0;
  let succeeded = 0;
  let failedTransient = 0;
  let failedPermanent = 0;
  let fatalError: unknown = null;

  const breaker = new ErrorRateBreaker({
    maxErrorRate: options.maxErrorRate,
    minAttempts: options.minAttempts,
    onTrip: (info) => {
      error(
        `[run] ${runId} error-rate breaker open: ${info.failures}/${info.attempts} failed (${(info.errorRate * 100).toFixed(1)}% > ${(options.maxErrorRate * 100).toFixed(1)}%)`,
      );
    },
  });

  const shouldStop = () => runSignal.aborted || breaker.isOpen || fatalError !== null;

  const finish = (status: RunStatus, message?: string): RunSummary => {
    const finishedAt = now();
    const durationSeconds = Math.max(0, (finishedAt.getTime() - startedAt.getTime()) / 1000);
    const failed = failedTransient + failedPermanent;
    const summary: RunSummary = {
      runId,
      target,
      status,
      startedAt: startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
      durationSeconds,
      eligible: eligible.length,
      attempted,
      succeeded,
      failed,
      failedTransient,
      failedPermanent,
      notStarted: Math.max(0, eligible.length - attempted),
      skipped: {
        total: Object.values(skippedByDecision).reduce((sum, count) => sum + count, 0),
        byDecision: skippedByDecision,
      },
      throughputPerMinute: durationSeconds > 0 ? Math.round((attempted / (durationSeconds / 60)) * 100) / 100 : 0,
      failedSymbols,
    };
    if (message) summary.error = message;
    return summary;
  };

  log(
    `[run] ${runId} starting target=${target} exchange=${options.exchangeFilter ?? 'ALL'} maxSymbols=${options.maxSymbols ?? 'none'} batchSize=${options.batchSize} concurrency=${options.concurrency}`,
  );

  let rows: WatermarkDecisionRow[];
  try {
    rows = await store.listDecisions(target, policy, { exchangeFilter: options.exchangeFilter, now: startedAt });
  } catch (err: unknown) {
    error(`[run] ${runId} could not list watermarks: ${describeError(err)}`);
    return finish('failed', describeError(err));
  }

  eligible = selectEligible(rows, options.maxSymbols);
  const decisionCounts = new Map<string, number>();
  for (const row of rows) {
    decisionCounts.set(row.decision, (decisionCounts.get(row.decision) ?? 0) + 1);
    if (row.decision !== 'FETCH') skippedByDecision[row.decision] += 1;
  }
  skippedByDecision.SKIP_BATCH_CAP = (decisionCounts.get('FETCH') ?? 0) - eligible.length;
  for (const [decision, count] of decisionCounts) {
    metrics.recordDecision(target, decision, count);
  }
  log(`[run] ${runId} tracked=${rows.length} eligible=${eligible.length}`);

  const runFetch = async (item: EligibleSymbol): Promise<FetchOutcome | null> => {
    try {
      const raw = await fetchAndLoad({
        target,
        symbol: item.symbol.symbol,
        exchange: item.symbol.exchange,
        sinceDate: item.watermark.lastObservedDate,
        watermark: item.watermark,
        signal: runSignal,
      });
      const parsed = FetchResultSchema.safeParse(raw);
      if (!parsed.success) {
        return { ok: false, kind: 'permanent', message: `invalid fetch result: ${describeSchemaError(parsed.error)}` };
      }
      return parsed.data.ok
        ? { ok: true, range: parsed.data.range }
        : { ok: false, kind: parsed.data.kind, message: parsed.data.message };
    } catch (err: unknown) {
      if (runSignal.aborted && isAbortError(err)) return null;
      return { ok: false, kind: classifyFetchError(err), message: describeError(err) };
    }
  };

  const processSymbol = async (item: EligibleSymbol): Promise<void> => {
    const symbol = item.symbol.symbol;
    const attemptStartedMs = now().getTime();
    const outcome = await runFetch(item);
    if (!outcome) {
      log(`[run] ${runId} ${symbol} fetch aborted; watermark left unchanged`);
      return;
    }

    attempted += 1;
    const durationMs = now().getTime() - attemptStartedMs;
    if (outcome.ok) {
      succeeded += 1;
      breaker.recordSuccess();
      metrics.recordAttempt(target, 'success', durationMs);
    } else {
      if (outcome.kind === 'permanent') failedPermanent += 1;
      else failedTransient += 1;
      if (failedSymbols.length < RUN_FAILED_SYMBOLS_REPORT_LIMIT) {
        failedSymbols.push({ symbol, kind: outcome.kind, message: outcome.message });
      }
      breaker.recordFailure();
      metrics.recordAttempt(target, outcome.kind === 'permanent' ? 'failure_permanent' : 'failure_transient', durationMs);
      log(`[run] ${runId} ${symbol} failed (${outcome.kind}): ${outcome.message}`);
    }

    try {
      if (outcome.ok) {
        await store.recordSuccess(target, symbol, outcome.range, now());
      } else {
        await store.recordFailure(target, symbol, outcome.message, now());
      }
    } catch (err: unknown) {
      fatalError = err instanceof StoreUnavailableError ? err : new StoreUnavailableError('record', err);
      error(`[run] ${runId} ${symbol} watermark write failed: ${describeError(err)}`);
    }
  };

  const batchSize = options.batchSize;
  const sliceCount = Math.ceil(eligible.length / batchSize);
  for (let offset = 0; offset < eligible.length; offset += batchSize) {
    if (shouldStop()) break;
    const slice = eligible.slice(offset, offset + batchSize);
    const sliceNumber = offset / batchSize + 1;
    log(`[run] ${runId} slice ${sliceNumber}/${sliceCount} symbols=${slice.length}`);
    const settled = await mapWithConcurrency(slice, options.concurrency, processSymbol, { shouldStop });
    settled.forEach((result, index) => {
      if (result.status === 'rejected' && fatalError === null) {
        fatalError = result.reason;
        error(`[run] ${runId} ${slice[index].symbol.symbol} worker crashed: ${describeError(result.reason)}`);
      }
    });
  }

  let summary: RunSummary;
  if (fatalError !== null) {
    summary = finish('failed', describeError(fatalError));
  } else if (breaker.isOpen) {
    const info = breaker.getInfo();
    summary = finish(
      'aborted-error-rate',
      `error rate ${(info.errorRate * 100).toFixed(1)}% exceeded ${(options.maxErrorRate * 100).toFixed(1)}% after ${info.attempts} attempts`,
    );
  } else if (runSignal.aborted) {
    summary = finish('stopped', 'run cancelled');
  } else {
    summary = finish(failedTransient + failedPermanent > 0 ? 'completed-with-errors' : 'completed');
  }
  log(`[run] ${runId} finished status=${summary.status}`);
  return summary;
}
