import { DAY_MS, HOUR_MS } from '../src/lib/dateUtils.js';
import type { SymbolRecord, Watermark, WatermarkPolicy } from '../src/services/watermarkTypes.js';

export const NOW = new Date('2025-06-15T12:00:00.000Z');
export const TODAY = '2025-06-15';

export function daysBefore(days: number, from: Date = NOW): Date {
  return new Date(from.getTime() - days * DAY_MS);
}

export function hoursBefore(hours: number, from: Date = NOW): Date {
  return new Date(from.getTime() - hours * HOUR_MS);
}

export const STOCK_POLICY: WatermarkPolicy = {
  stalenessThresholdDays: 135,
  maxConsecutiveFailures: 5,
  skipRecentHours: null,
  assetTypes: ['Stock'],
};

export function symbolRecord(symbol: string, overrides: Partial<SymbolRecord> = {}): SymbolRecord {
  return {
    symbol,
    exchange: 'NASDAQ',
    assetType: 'Stock',
    status: 'active',
    delistingDate: null,
    ...overrides,
  };
}

export function watermark(symbol: string, overrides: Partial<Watermark> = {}): Watermark {
  return {
    target: 'INCOME_STATEMENT',
    symbol,
    exchange: 'NASDAQ',
    assetType: 'Stock',
    status: 'active',
    delistingDate: null,
    eligibility: 'ELIGIBLE',
    firstObservedDate: null,
    lastObservedDate: null,
    lastSuccessAt: null,
    consecutiveFailures: 0,
    lastError: null,
    createdAt: daysBefore(400),
    updatedAt: daysBefore(400),
    ...overrides,
  };
}

export function abortError(message = 'The operation was aborted'): Error {
  const error = new Error(message);
  error.name = 'AbortError';
  return error;
}
