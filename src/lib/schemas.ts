/**
 * Zod schemas for values crossing the system boundary: batch invocation
 * options (env / CLI), fetch-and-load results, and warehouse rows.
 */

import { z } from 'zod';
import {
  DEFAULT_BATCH_SIZE,
  DEFAULT_FETCH_CONCURRENCY,
  DEFAULT_RUN_MAX_ERROR_RATE,
  DEFAULT_RUN_MIN_ATTEMPTS,
  MAX_FETCH_CONCURRENCY,
} from '../config.js';
import { InvalidRunOptionsError } from './errors.js';
import { isDateKey, toDateKey } from './dateUtils.js';

const emptyToUndefined = (value: unknown) => (value === '' || value === null ? undefined : value);

// ---------------------------------------------------------------------------
// Shared primitives
// ---------------------------------------------------------------------------

export const DateKeySchema = z.string().trim().refine(isDateKey, { message: 'expected a YYYY-MM-DD date' });

/** `date` columns arrive as text (`::text` casts) or, from other drivers, as Date. */
const NullableDateKeyColumn = z
  .union([z.string(), z.date(), z.null()])
  .transform((value) => {
    if (value === null) return null;
    if (value instanceof Date) return Number.isNaN(value.getTime()) ? null : toDateKey(value);
    const trimmed = value.trim().slice(0, 10);
    return isDateKey(trimmed) ? trimmed : null;
  });

export const SymbolStatusSchema = z
  .string()
  .nullable()
  .transform((value): 'active' | 'delisted' => (/delist/i.test(String(value || '')) ? 'delisted' : 'active'));

// ---------------------------------------------------------------------------
// Policy + batch invocation options
// ---------------------------------------------------------------------------

export const WatermarkPolicySchema = z.object({
  stalenessThresholdDays: z.coerce.number().positive(),
  maxConsecutiveFailures: z.coerce.number().int().positive(),
  skipRecentHours: z.preprocess(emptyToUndefined, z.coerce.number().nonnegative().nullable().optional()),
  assetTypes: z.array(z.string().trim().min(1)).nullable().optional(),
});

export const RunOptionsSchema = z.object({
  target: z
    .string({ required_error: 'target is required' })
    .trim()
    .min(1, 'target is required')
    .transform((value) => value.toUpperCase()),
  exchangeFilter: z
    .preprocess(emptyToUndefined, z.string().optional())
    .transform((value) => String(value ?? '').trim().toUpperCase() || null),
  maxSymbols: z
    .preprocess(emptyToUndefined, z.coerce.number().int().positive().optional())
    .transform((value) => value ?? null),
  batchSize: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().max(10_000).default(DEFAULT_BATCH_SIZE)),
  skipRecentHours: z
    .preprocess(emptyToUndefined, z.coerce.number().nonnegative().optional())
    .transform((value) => value ?? null),
  concurrency: z.preprocess(
    emptyToUndefined,
    z.coerce.number().int().min(1).max(MAX_FETCH_CONCURRENCY).default(DEFAULT_FETCH_CONCURRENCY),
  ),
  maxErrorRate: z.preprocess(emptyToUndefined, z.coerce.number().min(0).max(1).default(DEFAULT_RUN_MAX_ERROR_RATE)),
  minAttempts: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(DEFAULT_RUN_MIN_ATTEMPTS)),
  policy: WatermarkPolicySchema.partial().optional(),
});

export type RunOptions = z.output<typeof RunOptionsSchema>;

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

export function parseRunOptions(input: unknown): RunOptions {
  const parsed = RunOptionsSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidRunOptionsError(formatIssues(parsed.error));
  }
  return parsed.data;
}

// ---------------------------------------------------------------------------
// Fetch-and-load results
// ---------------------------------------------------------------------------

export const ObservedDateRangeSchema = z
  .object({ firstDate: DateKeySchema, lastDate: DateKeySchema })
  .refine((range) => range.firstDate <= range.lastDate, { message: 'firstDate must not be after lastDate' });

export const FetchResultSchema = z.discriminatedUnion('ok', [
  z.object({
    ok: z.literal(true),
    range: ObservedDateRangeSchema.nullable().default(null),
    rowsLoaded: z.number().int().nonnegative().optional(),
  }),
  z.object({
    ok: z.literal(false),
    kind: z.enum(['transient', 'permanent']).default('transient'),
    message: z.string().default('fetch failed'),
  }),
]);

/** What a fetch-and-load collaborator returns. */
export type FetchLoadResult = z.input<typeof FetchResultSchema>;

export function describeSchemaError(error: z.ZodError): string {
  return formatIssues(error).join('; ');
}

// ---------------------------------------------------------------------------
// Warehouse rows
// ---------------------------------------------------------------------------

export const SymbolRowSchema = z
  .object({
    symbol: z.string().trim().min(1),
    exchange: z.string().nullable().optional(),
    asset_type: z.string().nullable().optional(),
    status: SymbolStatusSchema.optional(),
    delisting_date: NullableDateKeyColumn.optional(),
  })
  .transform((row) => ({
    symbol: row.symbol.toUpperCase(),
    exchange: row.exchange ? row.exchange.trim().toUpperCase() : null,
    assetType: row.asset_type ? row.asset_type.trim() : null,
    status: row.status ?? 'active',
    delistingDate: row.delisting_date ?? null,
  }));

export const WatermarkRowSchema = z.object({
  target: z.string(),
  symbol: z.string(),
  exchange: z.string().nullable(),
  asset_type: z.string().nullable(),
  status: SymbolStatusSchema,
  delisting_date: NullableDateKeyColumn,
  eligibility: z.enum(['ELIGIBLE', 'INELIGIBLE', 'DELISTED']),
  first_observed_date: NullableDateKeyColumn,
  last_observed_date: NullableDateKeyColumn,
  last_success_at: z.coerce.date().nullable(),
  consecutive_failures: z.coerce.number().int().nonnegative(),
  last_error: z.string().nullable(),
  created_at: z.coerce.date(),
  updated_at: z.coerce.date(),
});
