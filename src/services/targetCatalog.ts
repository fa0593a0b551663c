import { MAX_CONSECUTIVE_FAILURES } from '../config.js';
import type { WatermarkPolicy } from './watermarkTypes.js';

export interface TargetDefinition {
  name: string;
  description: string;
  stalenessThresholdDays: number;
  /** Asset types the upstream endpoint serves; null means every type. */
  assetTypes: readonly string[] | null;
}

/**
 * Fundamentals use 135 days: one quarter plus a 45-day grace period for
 * filing delays, so no call is made before a new report can exist.
 */
const TARGETS: readonly TargetDefinition[] = [
  {
    name: 'TIME_SERIES_DAILY_ADJUSTED',
    description: 'Daily adjusted prices and volume',
    stalenessThresholdDays: 5,
    assetTypes: null,
  },
  {
    name: 'INCOME_STATEMENT',
    description: 'Annual and quarterly income statements',
    stalenessThresholdDays: 135,
    assetTypes: ['Stock'],
  },
  {
    name: 'BALANCE_SHEET',
    description: 'Annual and quarterly balance sheets',
    stalenessThresholdDays: 135,
    assetTypes: ['Stock'],
  },
  {
    name: 'CASH_FLOW',
    description: 'Annual and quarterly cash flow statements',
    stalenessThresholdDays: 135,
    assetTypes: ['Stock'],
  },
  {
    name: 'EARNINGS_CALL_TRANSCRIPTS',
    description: 'Quarterly earnings call transcripts',
    stalenessThresholdDays: 135,
    assetTypes: ['Stock'],
  },
  {
    name: 'INSIDER_TRANSACTIONS',
    description: 'Insider buy/sell filings',
    stalenessThresholdDays: 30,
    assetTypes: ['Stock'],
  },
  {
    name: 'COMPANY_OVERVIEW',
    description: 'Company profile and fundamentals snapshot',
    stalenessThresholdDays: 365,
    assetTypes: ['Stock'],
  },
  {
    name: 'ETF_PROFILE',
    description: 'ETF holdings and sector profile',
    stalenessThresholdDays: 365,
    assetTypes: ['ETF'],
  },
];

const TARGETS_BY_NAME = new Map(TARGETS.map((target) => [target.name, target]));

export function normalizeTargetName(name: string): string {
  return String(name || '').trim().toUpperCase();
}

export function listTargets(): readonly TargetDefinition[] {
  return TARGETS;
}

export function getTargetDefinition(name: string): TargetDefinition | null {
  return TARGETS_BY_NAME.get(normalizeTargetName(name)) ?? null;
}

/** Default policy for a catalogued target, or null when the target is unknown. */
export function resolveTargetPolicy(
  name: string,
  overrides: Partial<WatermarkPolicy> = {},
): WatermarkPolicy | null {
  const definition = getTargetDefinition(name);
  if (!definition) return null;
  return {
    stalenessThresholdDays: overrides.stalenessThresholdDays ?? definition.stalenessThresholdDays,
    maxConsecutiveFailures: overrides.maxConsecutiveFailures ?? MAX_CONSECUTIVE_FAILURES,
    skipRecentHours: overrides.skipRecentHours ?? null,
    assetTypes: overrides.assetTypes !== undefined ? overrides.assetTypes : definition.assetTypes,
  };
}
