/**
 * Shared types for watermark tracking.
 */

export type SymbolStatus = 'active' | 'delisted';

/** A tradable instrument as published by the symbol registry (listing status). */
export interface SymbolRecord {
  symbol: string;
  exchange: string | null;
  assetType: string | null;
  status: SymbolStatus;
  /** `YYYY-MM-DD`; null while the symbol is listed. */
  delistingDate: string | null;
}

export const ELIGIBILITIES = ['ELIGIBLE', 'INELIGIBLE', 'DELISTED'] as const;
export type Eligibility = (typeof ELIGIBILITIES)[number];

export const DECISIONS = [
  'FETCH',
  'SKIP_FRESH',
  'SKIP_RECENT_ATTEMPT',
  'SKIP_DELISTED',
  'SKIP_SUSPENDED',
  'SKIP_INELIGIBLE',
] as const;
export type Decision = (typeof DECISIONS)[number];
export type SkipDecision = Exclude<Decision, 'FETCH'>;

/** Per-target fetch policy. */
export interface WatermarkPolicy {
  /** Maximum age of the last successful extraction before a re-fetch is due. */
  stalenessThresholdDays: number;
  /** Consecutive failures that suspend a symbol until it is reset by hand. */
  maxConsecutiveFailures: number;
  /** Skip symbols attempted within this many hours; null/0 disables the check. */
  skipRecentHours?: number | null;
  /** Asset types the target applies to; null/empty means all. Compared case-insensitively. */
  assetTypes?: readonly string[] | null;
}

/** Extraction progress and health for one (target, symbol) pair. */
export interface Watermark {
  target: string;
  symbol: string;
  exchange: string | null;
  assetType: string | null;
  status: SymbolStatus;
  delistingDate: string | null;
  eligibility: Eligibility;
  firstObservedDate: string | null;
  lastObservedDate: string | null;
  lastSuccessAt: Date | null;
  consecutiveFailures: number;
  lastError: string | null;
  createdAt: Date;
  updatedAt: Date;
}

/** Earliest and latest fiscal/transaction date seen in one extraction. */
export interface ObservedDateRange {
  firstDate: string;
  lastDate: string;
}

export interface EligibleSymbol {
  symbol: SymbolRecord;
  watermark: Watermark;
}

export interface WatermarkDecisionRow extends EligibleSymbol {
  decision: Decision;
}
