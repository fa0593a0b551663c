/**
 * In-process WatermarkStore for tests; mirrors the PostgreSQL store's
 * semantics row for row.
 *
 * Each mutation completes synchronously between awaits, so per-row updates
 * are atomic with respect to concurrent workers in the same process.
 * `updatedAt` moves only on extraction attempts; the recent-attempt rule reads it.
 */

import { toDateKey } from '../lib/dateUtils.js';
import { deriveEligibility } from './eligibility.js';
import {
  buildStatusSummary,
  decideWatermarks,
  normalizeExchangeFilter,
  normalizeSymbol,
  reconcileEligibility,
  selectEligible,
  truncateErrorMessage,
  widenObservedRange,
  type ListEligibleOptions,
  type WatermarkStatusSummary,
  type WatermarkStore,
} from './watermarkStore.js';
import type {
  EligibleSymbol,
  ObservedDateRange,
  SymbolRecord,
  Watermark,
  WatermarkDecisionRow,
  WatermarkPolicy,
} from './watermarkTypes.js';

function cloneWatermark(watermark: Watermark): Watermark {
  return {
    ...watermark,
    lastSuccessAt: watermark.lastSuccessAt ? new Date(watermark.lastSuccessAt) : null,
    createdAt: new Date(watermark.createdAt),
    updatedAt: new Date(watermark.updatedAt),
  };
}

function rowKey(target: string, symbol: string): string {
  return `${target}\u0000${normalizeSymbol(symbol)}`;
}

export class InMemoryWatermarkStore implements WatermarkStore {
  private readonly rows = new Map<string, Watermark>();

  /** Replace or insert a watermark as-is. Used to seed fixtures. */
  put(watermark: Watermark): void {
    this.rows.set(rowKey(watermark.target, watermark.symbol), cloneWatermark(watermark));
  }

  async get(target: string, symbol: string): Promise<Watermark | null> {
    const row = this.rows.get(rowKey(target, symbol));
    return row ? cloneWatermark(row) : null;
  }

  async listDecisions(
    target: string,
    policy: WatermarkPolicy,
    options: ListEligibleOptions = {},
  ): Promise<WatermarkDecisionRow[]> {
    const now = options.now ?? new Date();
    const exchange = normalizeExchangeFilter(options.exchangeFilter);
    const tracked: Watermark[] = [];
    for (const row of this.rows.values()) {
      if (row.target !== target) continue;
      if (exchange && String(row.exchange || '').toUpperCase() !== exchange) continue;
      const nextEligibility = reconcileEligibility(row, policy, now);
      if (nextEligibility) row.eligibility = nextEligibility;
      tracked.push(cloneWatermark(row));
    }
    return decideWatermarks(tracked, policy, now);
  }

  async listEligible(
    target: string,
    policy: WatermarkPolicy,
    options: ListEligibleOptions = {},
  ): Promise<EligibleSymbol[]> {
    return selectEligible(await this.listDecisions(target, policy, options), options.limit);
  }

  async recordSuccess(
    target: string,
    symbol: string,
    range: ObservedDateRange | null,
    now: Date = new Date(),
  ): Promise<Watermark> {
    const row = this.ensureRow(target, symbol, now);
    const widened = widenObservedRange(row, range);
    row.firstObservedDate = widened.firstObservedDate;
    row.lastObservedDate = widened.lastObservedDate;
    row.lastSuccessAt = new Date(now);
    row.consecutiveFailures = 0;
    row.lastError = null;
    row.updatedAt = new Date(now);
    return cloneWatermark(row);
  }

  async recordFailure(target: string, symbol: string, error: unknown, now: Date = new Date()): Promise<Watermark> {
    const row = this.ensureRow(target, symbol, now);
    row.consecutiveFailures += 1;
    row.lastError = truncateErrorMessage(error);
    row.updatedAt = new Date(now);
    return cloneWatermark(row);
  }

  async registerSymbols(
    target: string,
    symbols: readonly SymbolRecord[],
    policy: WatermarkPolicy,
    now: Date = new Date(),
  ): Promise<number> {
    const today = toDateKey(now);
    let inserted = 0;
    for (const symbol of symbols) {
      const key = rowKey(target, symbol.symbol);
      if (this.rows.has(key)) continue;
      this.rows.set(key, {
        target,
        symbol: normalizeSymbol(symbol.symbol),
        exchange: symbol.exchange,
        assetType: symbol.assetType,
        status: symbol.status,
        delistingDate: symbol.delistingDate,
        eligibility: deriveEligibility(symbol, policy, today),
        firstObservedDate: null,
        lastObservedDate: null,
        lastSuccessAt: null,
        consecutiveFailures: 0,
        lastError: null,
        createdAt: new Date(now),
        updatedAt: new Date(now),
      });
      inserted += 1;
    }
    return inserted;
  }

  async refreshSymbols(
    target: string,
    symbols: readonly SymbolRecord[],
    policy: WatermarkPolicy,
    now: Date = new Date(),
  ): Promise<number> {
    const today = toDateKey(now);
    let changed = 0;
    for (const symbol of symbols) {
      const row = this.rows.get(rowKey(target, symbol.symbol));
      if (!row) continue;
      const eligibility = deriveEligibility(symbol, policy, today, row.eligibility);
      if (
        row.exchange === symbol.exchange &&
        row.assetType === symbol.assetType &&
        row.status === symbol.status &&
        row.delistingDate === symbol.delistingDate &&
        row.eligibility === eligibility
      ) {
        continue;
      }
      row.exchange = symbol.exchange;
      row.assetType = symbol.assetType;
      row.status = symbol.status;
      row.delistingDate = symbol.delistingDate;
      row.eligibility = eligibility;
      changed += 1;
    }
    return changed;
  }

  async resetFailures(target: string, symbols: readonly string[] | null = null): Promise<number> {
    const wanted = symbols ? new Set(symbols.map(normalizeSymbol)) : null;
    let reset = 0;
    for (const row of this.rows.values()) {
      if (row.target !== target) continue;
      if (wanted && !wanted.has(row.symbol)) continue;
      if (row.consecutiveFailures === 0 && row.lastError === null) continue;
      row.consecutiveFailures = 0;
      row.lastError = null;
      reset += 1;
    }
    return reset;
  }

  async summarize(target: string, policy: WatermarkPolicy, now: Date = new Date()): Promise<WatermarkStatusSummary> {
    return buildStatusSummary(target, await this.listDecisions(target, policy, { now }), policy);
  }

  private ensureRow(target: string, symbol: string, now: Date): Watermark {
    const key = rowKey(target, symbol);
    const existing = this.rows.get(key);
    if (existing) return existing;
    const created: Watermark = {
      target,
      symbol: normalizeSymbol(symbol),
      exchange: null,
      assetType: null,
      status: 'active',
      delistingDate: null,
      eligibility: 'ELIGIBLE',
      firstObservedDate: null,
      lastObservedDate: null,
      lastSuccessAt: null,
      consecutiveFailures: 0,
      lastError: null,
      createdAt: new Date(now),
      updatedAt: new Date(now),
    };
    this.rows.set(key, created);
    return created;
  }
}
