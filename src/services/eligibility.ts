/**
 * Fetch decision for one (target, symbol) pair. First match wins:
 *
 *   1. delisted as of today, or already DELISTED: SKIP_DELISTED
 *   2. symbol not extractable for the target: SKIP_INELIGIBLE
 *   3. consecutive failures at the limit: SKIP_SUSPENDED
 *   4. attempted within skipRecentHours: SKIP_RECENT_ATTEMPT
 *   5. never fetched successfully: FETCH
 *   6. last success older than the threshold: FETCH
 *   7. otherwise: SKIP_FRESH
 */

import { DAY_MS, HOUR_MS, elapsedMs, toDateKey } from '../lib/dateUtils.js';
import type { Decision, Eligibility, SymbolRecord, Watermark, WatermarkPolicy } from './watermarkTypes.js';

type EvaluatedWatermark = Pick<Watermark, 'eligibility' | 'lastSuccessAt' | 'consecutiveFailures' | 'updatedAt'>;

export function isDelistedAsOf(symbol: Pick<SymbolRecord, 'delistingDate'>, today: string): boolean {
  return Boolean(symbol.delistingDate) && String(symbol.delistingDate) <= today;
}

function isAssetTypeAllowed(assetType: string | null, allowed: readonly string[] | null | undefined): boolean {
  if (!allowed || allowed.length === 0) return true;
  const normalized = String(assetType || '').trim().toUpperCase();
  return allowed.some((candidate) => candidate.trim().toUpperCase() === normalized);
}

/**
 * Eligibility of a symbol for a target. Never moves away from DELISTED once
 * `previous` says so.
 */
export function deriveEligibility(
  symbol: SymbolRecord,
  policy: Pick<WatermarkPolicy, 'assetTypes'>,
  today: string,
  previous: Eligibility | null = null,
): Eligibility {
  if (isDelistedAsOf(symbol, today) || previous === 'DELISTED') return 'DELISTED';
  if (symbol.status === 'delisted') return 'INELIGIBLE';
  if (!isAssetTypeAllowed(symbol.assetType, policy.assetTypes)) return 'INELIGIBLE';
  return 'ELIGIBLE';
}

function hasRecordedAttempt(watermark: EvaluatedWatermark): boolean {
  return watermark.lastSuccessAt !== null || watermark.consecutiveFailures > 0;
}

export function evaluate(
  symbol: SymbolRecord,
  watermark: EvaluatedWatermark | null,
  policy: WatermarkPolicy,
  now: Date = new Date(),
): Decision {
  const eligibility = deriveEligibility(symbol, policy, toDateKey(now), watermark?.eligibility ?? null);
  if (eligibility === 'DELISTED') return 'SKIP_DELISTED';
  if (eligibility === 'INELIGIBLE') return 'SKIP_INELIGIBLE';
  if (!watermark) return 'FETCH';

  if (watermark.consecutiveFailures >= policy.maxConsecutiveFailures) return 'SKIP_SUSPENDED';

  const skipRecentHours = Number(policy.skipRecentHours) || 0;
  if (skipRecentHours > 0 && hasRecordedAttempt(watermark)) {
    if (elapsedMs(watermark.updatedAt, now) < skipRecentHours * HOUR_MS) return 'SKIP_RECENT_ATTEMPT';
  }

  if (!watermark.lastSuccessAt) return 'FETCH';
  if (elapsedMs(watermark.lastSuccessAt, now) > policy.stalenessThresholdDays * DAY_MS) return 'FETCH';
  return 'SKIP_FRESH';
}
