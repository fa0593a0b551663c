import { StoreUnavailableError } from '../lib/errors.js';
import { SymbolRowSchema } from '../lib/schemas.js';
import { normalizeExchangeFilter, normalizeSymbol } from './watermarkStore.js';
import type { SymbolRecord } from './watermarkTypes.js';

export interface ListSymbolsOptions {
  exchange?: string | null;
}

/** Read-only source of tradable instruments. */
export interface SymbolRegistry {
  listSymbols(options?: ListSymbolsOptions): Promise<SymbolRecord[]>;
}

interface SymbolQueryPool {
  query: (sql: string, values?: unknown[]) => Promise<{ rows: Record<string, unknown>[] }>;
}

/** Reads the `listing_status` table populated by the listing extract. */
export class PgSymbolRegistry implements SymbolRegistry {
  constructor(
    private readonly pool: SymbolQueryPool,
    private readonly warn: (message: string) => void = (message) => console.warn(message),
  ) {}

  async listSymbols(options: ListSymbolsOptions = {}): Promise<SymbolRecord[]> {
    const exchange = normalizeExchangeFilter(options.exchange);
    const values: unknown[] = [];
    let where = '';
    if (exchange) {
      values.push(exchange);
      where = 'WHERE UPPER(exchange) = $1';
    }
    let rows: Record<string, unknown>[];
    try {
      const result = await this.pool.query(
        `SELECT symbol, exchange, asset_type, status, delisting_date::text AS delisting_date
         FROM listing_status
         ${where}
         ORDER BY symbol ASC`,
        values,
      );
      rows = result.rows;
    } catch (err: unknown) {
      throw new StoreUnavailableError('listSymbols', err);
    }

    const symbols: SymbolRecord[] = [];
    let skipped = 0;
    for (const row of rows) {
      const parsed = SymbolRowSchema.safeParse(row);
      if (parsed.success) {
        symbols.push(parsed.data);
      } else {
        skipped += 1;
      }
    }
    if (skipped > 0) {
      this.warn(`[symbol-registry] skipped ${skipped} malformed listing_status row(s)`);
    }
    return symbols;
  }
}

/** Fixed symbol list. Later duplicates win. */
export class StaticSymbolRegistry implements SymbolRegistry {
  private readonly symbols: SymbolRecord[];

  constructor(symbols: readonly SymbolRecord[]) {
    const bySymbol = new Map<string, SymbolRecord>();
    for (const record of symbols) {
      const symbol = normalizeSymbol(record.symbol);
      if (symbol) bySymbol.set(symbol, { ...record, symbol });
    }
    this.symbols = [...bySymbol.values()].sort((a, b) => (a.symbol < b.symbol ? -1 : a.symbol > b.symbol ? 1 : 0));
  }

  async listSymbols(options: ListSymbolsOptions = {}): Promise<SymbolRecord[]> {
    const exchange = normalizeExchangeFilter(options.exchange);
    return this.symbols
      .filter((record) => !exchange || String(record.exchange || '').toUpperCase() === exchange)
      .map((record) => ({ ...record }));
  }
}
