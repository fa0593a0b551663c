/**
 * Run summary: the record every batch returns, its log lines, and the
 * optional artifacts (JSON file, `etl_run_history` row).
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import type { Kysely } from 'kysely';
import type { Database } from '../db/types.js';
import type { FetchFailureKind } from '../lib/errors.js';
import type { SkipDecision } from './watermarkTypes.js';

export type RunStatus = 'completed' | 'completed-with-errors' | 'stopped' | 'aborted-error-rate' | 'failed';

/** FETCH rows left out because the run was capped at `maxSymbols`. */
export type SkipReason = SkipDecision | 'SKIP_BATCH_CAP';

export interface FailedSymbol {
  symbol: string;
  kind: FetchFailureKind;
  message: string;
}

export interface RunSummary {
  runId: string;
  target: string;
  status: RunStatus;
  startedAt: string;
  finishedAt: string;
  durationSeconds: number;
  eligible: number;
  attempted: number;
  succeeded: number;
  failed: number;
  failedTransient: number;
  failedPermanent: number;
  notStarted: number;
  skipped: { total: number; byDecision: Record<SkipReason, number> };
  throughputPerMinute: number;
  failedSymbols: FailedSymbol[];
  error?: string;
}

export function emptySkipCounts(): Record<SkipReason, number> {
  return {
    SKIP_FRESH: 0,
    SKIP_RECENT_ATTEMPT: 0,
    SKIP_DELISTED: 0,
    SKIP_SUSPENDED: 0,
    SKIP_INELIGIBLE: 0,
    SKIP_BATCH_CAP: 0,
  };
}

export function exitCodeForStatus(status: RunStatus): number {
  return status === 'completed' || status === 'completed-with-errors' || status === 'stopped' ? 0 : 1;
}

export function formatRunSummaryLines(summary: RunSummary): string[] {
  const skippedParts = Object.entries(summary.skipped.byDecision)
    .filter(([, count]) => count > 0)
    .map(([decision, count]) => `${decision}=${count}`);
  const lines = [
    `[run] ${summary.runId} target=${summary.target} status=${summary.status}`,
    `[run] eligible=${summary.eligible} attempted=${summary.attempted} succeeded=${summary.succeeded} failed=${summary.failed} (transient=${summary.failedTransient} permanent=${summary.failedPermanent}) notStarted=${summary.notStarted}`,
    `[run] skipped=${summary.skipped.total}${skippedParts.length > 0 ? ` ${skippedParts.join(' ')}` : ''}`,
    `[run] duration=${summary.durationSeconds.toFixed(1)}s throughput=${summary.throughputPerMinute.toFixed(1)}/min`,
  ];
  if (summary.failedSymbols.length > 0) {
    lines.push(`[run] failed symbols: ${summary.failedSymbols.map((f) => `${f.symbol}(${f.kind})`).join(', ')}`);
  }
  if (summary.error) {
    lines.push(`[run] error: ${summary.error}`);
  }
  return lines;
}

export async function writeRunSummaryFile(filePath: string, summary: RunSummary): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, `${JSON.stringify(summary, null, 2)}\n`, 'utf8');
}

export function buildRunHistoryInsert(db: Kysely<Database>, summary: RunSummary) {
  return db
    .insertInto('etl_run_history')
    .values({
      run_id: summary.runId,
      target: summary.target,
      status: summary.status,
      summary: JSON.stringify(summary),
      started_at: summary.startedAt,
      finished_at: summary.finishedAt,
    })
    .onConflict((oc) =>
      oc.column('run_id').doUpdateSet((eb) => ({
        status: eb.ref('excluded.status'),
        summary: eb.ref('excluded.summary'),
        finished_at: eb.ref('excluded.finished_at'),
      })),
    );
}

export async function persistRunSummary(db: Kysely<Database>, summary: RunSummary): Promise<void> {
  await buildRunHistoryInsert(db, summary).execute();
}

export function buildRecentRunsQuery(db: Kysely<Database>, target: string, limit = 5) {
  return db
    .selectFrom('etl_run_history')
    .select(['run_id', 'status', 'started_at', 'finished_at'])
    .where('target', '=', target)
    .orderBy('created_at', 'desc')
    .limit(Math.max(1, Math.floor(limit)));
}

export interface RecentRun {
  runId: string;
  status: string;
  startedAt: string | null;
  finishedAt: string | null;
}

export async function listRecentRuns(db: Kysely<Database>, target: string, limit = 5): Promise<RecentRun[]> {
  const rows = await buildRecentRunsQuery(db, target, limit).execute();
  return rows.map((row) => ({
    runId: row.run_id,
    status: row.status,
    startedAt: row.started_at ? new Date(row.started_at).toISOString() : null,
    finishedAt: row.finished_at ? new Date(row.finished_at).toISOString() : null,
  }));
}
