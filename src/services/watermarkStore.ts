/**
 * Watermark Store contract plus the pure helpers shared by its
 * implementations (PostgreSQL and in-memory).
 *
 * Every mutating operation touches one (target, symbol) row atomically; no
 * operation spans rows in a transaction.
 */

import { LAST_ERROR_MAX_LENGTH } from '../config.js';
import { maxDateKey, minDateKey, toDateKey } from '../lib/dateUtils.js';
import { deriveEligibility, evaluate } from './eligibility.js';
import type {
  Decision,
  Eligibility,
  EligibleSymbol,
  ObservedDateRange,
  SymbolRecord,
  Watermark,
  WatermarkDecisionRow,
  WatermarkPolicy,
} from './watermarkTypes.js';

export interface ListEligibleOptions {
  /** Cap on returned symbols (the stalest come first). */
  limit?: number | null;
  /** Exchange code, compared case-insensitively. */
  exchangeFilter?: string | null;
  now?: Date;
}

export interface WatermarkStatusSummary {
  target: string;
  total: number;
  byEligibility: Record<Eligibility, number>;
  byDecision: Record<Decision, number>;
  neverFetched: number;
  suspended: number;
  oldestSuccessAt: string | null;
  newestSuccessAt: string | null;
}

export interface WatermarkStore {
  get(target: string, symbol: string): Promise<Watermark | null>;
  /** Every tracked symbol for the target with its decision, in fetch-priority order. */
  listDecisions(target: string, policy: WatermarkPolicy, options?: ListEligibleOptions): Promise<WatermarkDecisionRow[]>;
  /** Symbols whose decision is FETCH, stalest / never-fetched first, capped at `limit`. */
  listEligible(target: string, policy: WatermarkPolicy, options?: ListEligibleOptions): Promise<EligibleSymbol[]>;
  recordSuccess(target: string, symbol: string, range: ObservedDateRange | null, now?: Date): Promise<Watermark>;
  recordFailure(target: string, symbol: string, error: unknown, now?: Date): Promise<Watermark>;
  /** Insert-if-absent. Returns how many watermarks were created. */
  registerSymbols(target: string, symbols: readonly SymbolRecord[], policy: WatermarkPolicy, now?: Date): Promise<number>;
  /** Refresh the symbol snapshot of existing watermarks. Returns how many rows changed. */
  refreshSymbols(target: string, symbols: readonly SymbolRecord[], policy: WatermarkPolicy, now?: Date): Promise<number>;
  /** Clear the per-symbol suspension. Without `symbols`, resets the whole target. */
  resetFailures(target: string, symbols?: readonly string[] | null): Promise<number>;
  summarize(target: string, policy: WatermarkPolicy, now?: Date): Promise<WatermarkStatusSummary>;
}

// ---------------------------------------------------------------------------
// Shared helpers
// ---------------------------------------------------------------------------

export function normalizeSymbol(symbol: string): string {
  return String(symbol || '').trim().toUpperCase();
}

export function normalizeExchangeFilter(exchange: string | null | undefined): string | null {
  const value = String(exchange || '').trim().toUpperCase();
  return value || null;
}

export function truncateErrorMessage(error: unknown, maxLength = LAST_ERROR_MAX_LENGTH): string {
  const message = error instanceof Error ? error.message || error.name : String(error ?? '');
  const trimmed = message.trim() || 'unknown error';
  return trimmed.length > maxLength ? trimmed.slice(0, maxLength) : trimmed;
}

/** Union of the stored and newly observed ranges; never narrows. */
export function widenObservedRange(
  existing: { firstObservedDate: string | null; lastObservedDate: string | null },
  incoming: ObservedDateRange | null,
): { firstObservedDate: string | null; lastObservedDate: string | null } {
  if (!incoming) return { firstObservedDate: existing.firstObservedDate, lastObservedDate: existing.lastObservedDate };
  return {
    firstObservedDate: minDateKey(existing.firstObservedDate, incoming.firstDate),
    lastObservedDate: maxDateKey(existing.lastObservedDate, incoming.lastDate),
  };
}

/** Never-fetched first, then oldest success, then symbol. */
export function compareFetchPriority(
  a: Pick<Watermark, 'lastSuccessAt' | 'symbol'>,
  b: Pick<Watermark, 'lastSuccessAt' | 'symbol'>,
): number {
  const aTime = a.lastSuccessAt ? a.lastSuccessAt.getTime() : Number.NEGATIVE_INFINITY;
  const bTime = b.lastSuccessAt ? b.lastSuccessAt.getTime() : Number.NEGATIVE_INFINITY;
  if (aTime !== bTime) return aTime < bTime ? -1 : 1;
  if (a.symbol === b.symbol) return 0;
  return a.symbol < b.symbol ? -1 : 1;
}

export function symbolFromWatermark(watermark: Watermark): SymbolRecord {
  return {
    symbol: watermark.symbol,
    exchange: watermark.exchange,
    assetType: watermark.assetType,
    status: watermark.status,
    delistingDate: watermark.delistingDate,
  };
}

/**
 * Eligibility the watermark should carry now, or null when the stored value
 * is already right. DELISTED is never left.
 */
export function reconcileEligibility(watermark: Watermark, policy: WatermarkPolicy, now: Date): Eligibility | null {
  const derived = deriveEligibility(symbolFromWatermark(watermark), policy, toDateKey(now), watermark.eligibility);
  return derived === watermark.eligibility ? null : derived;
}

/** Evaluate and sort watermarks; the caller persists eligibility changes first. */
export function decideWatermarks(
  watermarks: readonly Watermark[],
  policy: WatermarkPolicy,
  now: Date,
): WatermarkDecisionRow[] {
  return [...watermarks].sort(compareFetchPriority).map((watermark) => {
    const symbol = symbolFromWatermark(watermark);
    return { symbol, watermark, decision: evaluate(symbol, watermark, policy, now) };
  });
}

export function selectEligible(rows: readonly WatermarkDecisionRow[], limit?: number | null): EligibleSymbol[] {
  const cap = limit && limit > 0 ? Math.floor(limit) : Number.POSITIVE_INFINITY;
  const eligible: EligibleSymbol[] = [];
  for (const row of rows) {
    if (eligible.length >= cap) break;
    if (row.decision !== 'FETCH') continue;
    eligible.push({ symbol: row.symbol, watermark: row.watermark });
  }
  return eligible;
}

export function emptyDecisionCounts(): Record<Decision, number> {
  return {
    FETCH: 0,
    SKIP_FRESH: 0,
    SKIP_RECENT_ATTEMPT: 0,
    SKIP_DELISTED: 0,
    SKIP_SUSPENDED: 0,
    SKIP_INELIGIBLE: 0,
  };
}

function emptyEligibilityCounts(): Record<Eligibility, number> {
  return { ELIGIBLE: 0, INELIGIBLE: 0, DELISTED: 0 };
}

export function buildStatusSummary(
  target: string,
  rows: readonly WatermarkDecisionRow[],
  policy: WatermarkPolicy,
): WatermarkStatusSummary {
  const byEligibility = emptyEligibilityCounts();
  const byDecision = emptyDecisionCounts();
  let neverFetched = 0;
  let suspended = 0;
  let oldest: Date | null = null;
  let newest: Date | null = null;
  for (const { watermark, decision } of rows) {
    byDecision[decision] += 1;
    byEligibility[watermark.eligibility] += 1;
    if (!watermark.lastSuccessAt) {
      neverFetched += 1;
    } else {
      if (!oldest || watermark.lastSuccessAt < oldest) oldest = watermark.lastSuccessAt;
      if (!newest || watermark.lastSuccessAt > newest) newest = watermark.lastSuccessAt;
    }
    if (watermark.consecutiveFailures >= policy.maxConsecutiveFailures) suspended += 1;
  }
  return {
    target,
    total: rows.length,
    byEligibility,
    byDecision,
    neverFetched,
    suspended,
    oldestSuccessAt: oldest ? oldest.toISOString() : null,
    newestSuccessAt: newest ? newest.toISOString() : null,
  };
}
