/**
 * PostgreSQL-backed WatermarkStore over the `etl_watermarks` table.
 *
 * Every mutation is a single statement against one (target, symbol) row, so
 * concurrent workers never lose a failure increment or narrow a range.
 */

import { StoreUnavailableError } from '../lib/errors.js';
import { WatermarkRowSchema } from '../lib/schemas.js';
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
  type ListEligibleOptions,
  type WatermarkStatusSummary,
  type WatermarkStore,
} from './watermarkStore.js';
import type {
  Eligibility,
  EligibleSymbol,
  ObservedDateRange,
  SymbolRecord,
  Watermark,
  WatermarkDecisionRow,
  WatermarkPolicy,
} from './watermarkTypes.js';

export interface WatermarkQueryPool {
  query: (sql: string, values?: unknown[]) => Promise<{ rows: Record<string, unknown>[]; rowCount?: number | null }>;
}

const WATERMARK_COLUMNS = `
  target, symbol, exchange, asset_type, status,
  delisting_date::text AS delisting_date,
  eligibility,
  first_observed_date::text AS first_observed_date,
  last_observed_date::text AS last_observed_date,
  last_success_at, consecutive_failures, last_error, created_at, updated_at`;

const UPSERT_CHUNK_SIZE = 1000;

function chunk<T>(items: readonly T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

export function watermarkFromRow(row: unknown): Watermark {
  const parsed = WatermarkRowSchema.parse(row);
  return {
    target: parsed.target,
    symbol: parsed.symbol,
    exchange: parsed.exchange,
    assetType: parsed.asset_type,
    status: parsed.status,
    delistingDate: parsed.delisting_date,
    eligibility: parsed.eligibility,
    firstObservedDate: parsed.first_observed_date,
    lastObservedDate: parsed.last_observed_date,
    lastSuccessAt: parsed.last_success_at,
    consecutiveFailures: parsed.consecutive_failures,
    lastError: parsed.last_error,
    createdAt: parsed.created_at,
    updatedAt: parsed.updated_at,
  };
}

export class PgWatermarkStore implements WatermarkStore {
  constructor(private readonly pool: WatermarkQueryPool) {}

  async get(target: string, symbol: string): Promise<Watermark | null> {
    const result = await this.query('get', `SELECT ${WATERMARK_COLUMNS} FROM etl_watermarks WHERE target = $1 AND symbol = $2`, [
      target,
      normalizeSymbol(symbol),
    ]);
    return result.rows.length > 0 ? this.toWatermark('get', result.rows[0]) : null;
  }

  async listDecisions(
    target: string,
    policy: WatermarkPolicy,
    options: ListEligibleOptions = {},
  ): Promise<WatermarkDecisionRow[]> {
    const now = options.now ?? new Date();
    const exchange = normalizeExchangeFilter(options.exchangeFilter);
    const values: unknown[] = [target];
    let where = 'target = $1';
    if (exchange) {
      values.push(exchange);
      where += ' AND UPPER(exchange) = $2';
    }
    const result = await this.query(
      'listDecisions',
      `SELECT ${WATERMARK_COLUMNS}
       FROM etl_watermarks
       WHERE ${where}
       ORDER BY last_success_at ASC NULLS FIRST, symbol ASC`,
      values,
    );
    const watermarks = result.rows.map((row) => this.toWatermark('listDecisions', row));

    const changes = new Map<Eligibility, string[]>();
    for (const watermark of watermarks) {
      const next = reconcileEligibility(watermark, policy, now);
      if (!next) continue;
      watermark.eligibility = next;
      const symbols = changes.get(next) ?? [];
      symbols.push(watermark.symbol);
      changes.set(next, symbols);
    }
    for (const [eligibility, symbols] of changes) {
      await this.query(
        'listDecisions',
        `UPDATE etl_watermarks
         SET eligibility = $3
         WHERE target = $1 AND symbol = ANY($2::text[]) AND eligibility <> 'DELISTED'`,
        [target, symbols, eligibility],
      );
    }

    return decideWatermarks(watermarks, policy, now);
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
    // LEAST/GREATEST ignore NULLs, so a missing side keeps the stored bound.
    const result = await this.query(
      'recordSuccess',
      `INSERT INTO etl_watermarks (
         target, symbol, first_observed_date, last_observed_date,
         last_success_at, consecutive_failures, last_error, created_at, updated_at
       ) VALUES ($1, $2, $3::date, $4::date, $5, 0, NULL, $5, $5)
       ON CONFLICT (target, symbol) DO UPDATE SET
         first_observed_date = LEAST(etl_watermarks.first_observed_date, EXCLUDED.first_observed_date),
         last_observed_date = GREATEST(etl_watermarks.last_observed_date, EXCLUDED.last_observed_date),
         last_success_at = EXCLUDED.last_success_at,
         consecutive_failures = 0,
         last_error = NULL,
         updated_at = EXCLUDED.updated_at
       RETURNING ${WATERMARK_COLUMNS}`,
      [target, normalizeSymbol(symbol), range?.firstDate ?? null, range?.lastDate ?? null, now],
    );
    return this.toWatermark('recordSuccess', result.rows[0]);
  }

  async recordFailure(target: string, symbol: string, error: unknown, now: Date = new Date()): Promise<Watermark> {
    const result = await this.query(
      'recordFailure',
      `INSERT INTO etl_watermarks (target, symbol, consecutive_failures, last_error, created_at, updated_at)
       VALUES ($1, $2, 1, $3, $4, $4)
       ON CONFLICT (target, symbol) DO UPDATE SET
         consecutive_failures = etl_watermarks.consecutive_failures + 1,
         last_error = EXCLUDED.last_error,
         updated_at = EXCLUDED.updated_at
       RETURNING ${WATERMARK_COLUMNS}`,
      [target, normalizeSymbol(symbol), truncateErrorMessage(error), now],
    );
    return this.toWatermark('recordFailure', result.rows[0]);
  }

  async registerSymbols(
    target: string,
    symbols: readonly SymbolRecord[],
    policy: WatermarkPolicy,
    now: Date = new Date(),
  ): Promise<number> {
    const today = toDateKey(now);
    let inserted = 0;
    for (const slice of chunk(symbols, UPSERT_CHUNK_SIZE)) {
      const result = await this.query(
        'registerSymbols',
        `INSERT INTO etl_watermarks (
           target, symbol, exchange, asset_type, status, delisting_date, eligibility, created_at, updated_at
         )
         SELECT $1, s.symbol, s.exchange, s.asset_type, s.status, s.delisting_date::date, s.eligibility, $2, $2
         FROM UNNEST($3::text[], $4::text[], $5::text[], $6::text[], $7::text[], $8::text[])
           AS s(symbol, exchange, asset_type, status, delisting_date, eligibility)
         ON CONFLICT (target, symbol) DO NOTHING`,
        [
          target,
          now,
          slice.map((s) => normalizeSymbol(s.symbol)),
          slice.map((s) => s.exchange),
          slice.map((s) => s.assetType),
          slice.map((s) => s.status),
          slice.map((s) => s.delistingDate),
          slice.map((s) => deriveEligibility(s, policy, today)),
        ],
      );
      inserted += result.rowCount ?? 0;
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
    for (const slice of chunk(symbols, UPSERT_CHUNK_SIZE)) {
      const result = await this.query(
        'refreshSymbols',
        `UPDATE etl_watermarks AS w SET
           exchange = s.exchange,
           asset_type = s.asset_type,
           status = s.status,
           delisting_date = s.delisting_date::date,
           eligibility = CASE WHEN w.eligibility = 'DELISTED' THEN 'DELISTED' ELSE s.eligibility END
         FROM UNNEST($2::text[], $3::text[], $4::text[], $5::text[], $6::text[], $7::text[])
           AS s(symbol, exchange, asset_type, status, delisting_date, eligibility)
         WHERE w.target = $1
           AND w.symbol = s.symbol
           AND (
             w.exchange IS DISTINCT FROM s.exchange
             OR w.asset_type IS DISTINCT FROM s.asset_type
             OR w.status IS DISTINCT FROM s.status
             OR w.delisting_date IS DISTINCT FROM s.delisting_date::date
             OR (w.eligibility <> 'DELISTED' AND w.eligibility IS DISTINCT FROM s.eligibility)
           )`,
        [
          target,
          slice.map((s) => normalizeSymbol(s.symbol)),
          slice.map((s) => s.exchange),
          slice.map((s) => s.assetType),
          slice.map((s) => s.status),
          slice.map((s) => s.delistingDate),
          slice.map((s) => deriveEligibility(s, policy, today)),
        ],
      );
      changed += result.rowCount ?? 0;
    }
    return changed;
  }

  async resetFailures(target: string, symbols: readonly string[] | null = null): Promise<number> {
    const values: unknown[] = [target];
    let where = 'target = $1';
    if (symbols) {
      values.push(symbols.map(normalizeSymbol));
      where += ' AND symbol = ANY($2::text[])';
    }
    const result = await this.query(
      'resetFailures',
      `UPDATE etl_watermarks
       SET consecutive_failures = 0, last_error = NULL
       WHERE ${where} AND (consecutive_failures <> 0 OR last_error IS NOT NULL)`,
      values,
    );
    return result.rowCount ?? 0;
  }

  async summarize(target: string, policy: WatermarkPolicy, now: Date = new Date()): Promise<WatermarkStatusSummary> {
    return buildStatusSummary(target, await this.listDecisions(target, policy, { now }), policy);
  }

  private async query(operation: string, sql: string, values: unknown[]) {
    try {
      return await this.pool.query(sql, values);
    } catch (err: unknown) {
      throw new StoreUnavailableError(operation, err);
    }
  }

  private toWatermark(operation: string, row: unknown): Watermark {
    try {
      return watermarkFromRow(row);
    } catch (err: unknown) {
      throw new StoreUnavailableError(operation, err);
    }
  }
}
