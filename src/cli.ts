/**
 * Command dispatch for the `watermark-etl` entry point. Everything the
 * commands touch is passed in, so tests drive them with in-memory stores.
 *
 *   run       run one extraction batch (default)
 *   register  create/refresh watermarks from the symbol registry
 *   status    per-target watermark counts and recent runs
 *   reset     clear per-symbol suspensions
 *   migrate   apply database migrations
 *   targets   list catalogued targets
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { readRunOptionsFromEnv } from './config.js';
import { InvalidRunOptionsError, describeError } from './lib/errors.js';
import { parseRunOptions } from './lib/schemas.js';
import { resolveRunPolicy, runWatermarkBatch } from './orchestrators/watermarkRunOrchestrator.js';
import type { FetchAndLoad } from './services/fetchLoadClient.js';
import {
  exitCodeForStatus,
  formatRunSummaryLines,
  writeRunSummaryFile,
  type RecentRun,
  type RunSummary,
} from './services/runSummary.js';
import type { SymbolRegistry } from './services/symbolRegistry.js';
import { listTargets } from './services/targetCatalog.js';
import type { WatermarkStatusSummary, WatermarkStore } from './services/watermarkStore.js';

export const CLI_COMMANDS = ['run', 'register', 'status', 'reset', 'migrate', 'targets'] as const;
export type CliCommand = (typeof CLI_COMMANDS)[number];

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

export interface ParsedCliArgs {
  command: CliCommand;
  flags: Record<string, string>;
}

function isCliCommand(value: string): value is CliCommand {
  return CLI_COMMANDS.some((command) => command === value);
}

function toCamelCase(flag: string): string {
  return flag.replace(/-([a-z])/g, (_, letter: string) => letter.toUpperCase());
}

/** `[command] --flag=value --switch`; flag names are kebab-case. */
export function parseCliArgs(argv: readonly string[]): ParsedCliArgs {
  let command: CliCommand = 'run';
  const flags: Record<string, string> = {};
  argv.forEach((arg, index) => {
    if (arg.startsWith('--')) {
      const body = arg.slice(2);
      const eq = body.indexOf('=');
      const name = eq >= 0 ? body.slice(0, eq) : body;
      if (!name) throw new CliUsageError(`Invalid flag: ${arg}`);
      flags[toCamelCase(name)] = eq >= 0 ? body.slice(eq + 1) : 'true';
      return;
    }
    if (index === 0 && isCliCommand(arg)) {
      command = arg;
      return;
    }
    throw new CliUsageError(`Unexpected argument: ${arg}`);
  });
  return { command, flags };
}

const RUN_OPTION_FLAGS = [
  'target',
  'exchangeFilter',
  'maxSymbols',
  'batchSize',
  'skipRecentHours',
  'concurrency',
  'maxErrorRate',
  'minAttempts',
] as const;

/** Env values first, CLI flags on top. `--exchange` is accepted for `--exchange-filter`. */
export function buildRunInput(flags: Record<string, string>, env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const input: Record<string, unknown> = { ...readRunOptionsFromEnv(env) };
  if (flags.exchange !== undefined) input.exchangeFilter = flags.exchange;
  for (const key of RUN_OPTION_FLAGS) {
    if (flags[key] !== undefined) input[key] = flags[key];
  }
  const policy: Record<string, unknown> = {};
  if (flags.stalenessDays !== undefined) policy.stalenessThresholdDays = flags.stalenessDays;
  if (flags.maxFailures !== undefined) policy.maxConsecutiveFailures = flags.maxFailures;
  if (Object.keys(policy).length > 0) input.policy = policy;
  return input;
}

export interface CliContext {
  /** Absent when no database is configured; only `targets` runs without it. */
  store?: WatermarkStore;
  registry?: SymbolRegistry;
  fetchAndLoad?: FetchAndLoad | null;
  migrate?: () => Promise<number>;
  persistSummary?: (summary: RunSummary) => Promise<void>;
  recentRuns?: (target: string) => Promise<RecentRun[]>;
  renderMetrics?: () => Promise<string>;
  summaryPath?: string | null;
  metricsPath?: string | null;
  signal?: AbortSignal;
  now?: () => Date;
  env?: NodeJS.ProcessEnv;
  /** Human-readable command output. */
  out: (line: string) => void;
  log?: (message: string) => void;
  error?: (message: string) => void;
}

export function formatStatusLines(summary: WatermarkStatusSummary, recentRuns: readonly RecentRun[] = []): string[] {
  const counts = (record: Record<string, number>) =>
    Object.entries(record)
      .map(([key, count]) => `${key}=${count}`)
      .join(' ');
  const lines = [
    `${summary.target}: ${summary.total} watermark(s), ${summary.neverFetched} never fetched, ${summary.suspended} suspended`,
    `  eligibility: ${counts(summary.byEligibility)}`,
    `  decisions:   ${counts(summary.byDecision)}`,
    `  last success: oldest=${summary.oldestSuccessAt ?? '-'} newest=${summary.newestSuccessAt ?? '-'}`,
  ];
  for (const run of recentRuns) {
    lines.push(`  run ${run.runId} ${run.status} started=${run.startedAt ?? '-'} finished=${run.finishedAt ?? '-'}`);
  }
  return lines;
}

async function writeArtifacts(ctx: CliContext, summary: RunSummary, error: (message: string) => void): Promise<void> {
  if (ctx.summaryPath) {
    try {
      await writeRunSummaryFile(ctx.summaryPath, summary);
    } catch (err: unknown) {
      error(`[run] could not write summary to ${ctx.summaryPath}: ${describeError(err)}`);
    }
  }
  if (ctx.metricsPath && ctx.renderMetrics) {
    try {
      await fs.mkdir(path.dirname(ctx.metricsPath), { recursive: true });
      await fs.writeFile(ctx.metricsPath, await ctx.renderMetrics(), 'utf8');
    } catch (err: unknown) {
      error(`[run] could not write metrics to ${ctx.metricsPath}: ${describeError(err)}`);
    }
  }
  if (ctx.persistSummary) {
    try {
      await ctx.persistSummary(summary);
    } catch (err: unknown) {
      error(`[run] could not record run history: ${describeError(err)}`);
    }
  }
}

/** Runs one command and resolves to the process exit code. */
export async function runCli(argv: readonly string[], ctx: CliContext): Promise<number> {
  const log = ctx.log ?? ((message: string) => console.log(message));
  const error = ctx.error ?? ((message: string) => console.error(message));
  const env = ctx.env ?? process.env;
  const now = ctx.now ?? (() => new Date());

  try {
    const { command, flags } = parseCliArgs(argv);

    if (command === 'targets') {
      for (const target of listTargets()) {
        const assetTypes = target.assetTypes && target.assetTypes.length > 0 ? target.assetTypes.join(',') : 'any';
        ctx.out(`${target.name}  staleness=${target.stalenessThresholdDays}d assetTypes=${assetTypes}  ${target.description}`);
      }
      return 0;
    }

    if (command === 'migrate') {
      if (!ctx.migrate) throw new CliUsageError('Migrations are not available in this context');
      const applied = await ctx.migrate();
      ctx.out(`Applied ${applied} migration(s)`);
      return 0;
    }

    const store = ctx.store;
    if (!store) throw new CliUsageError(`The ${command} command needs a database`);
    const input = buildRunInput(flags, env);

    if (command === 'run') {
      if (!ctx.fetchAndLoad) throw new CliUsageError('FETCH_LOAD_URL is not configured');
      const summary = await runWatermarkBatch(
        input,
        { store, fetchAndLoad: ctx.fetchAndLoad, now, log, error },
        ctx.signal,
      );
      for (const line of formatRunSummaryLines(summary)) {
        if (summary.status === 'failed' || summary.status === 'aborted-error-rate') error(line);
        else log(line);
      }
      await writeArtifacts(ctx, summary, error);
      return exitCodeForStatus(summary.status);
    }

    const options = parseRunOptions(input);
    const policy = resolveRunPolicy(options);

    if (command === 'register') {
      if (!ctx.registry) throw new CliUsageError('The register command needs a symbol registry');
      const symbols = await ctx.registry.listSymbols({ exchange: options.exchangeFilter });
      const at = now();
      const inserted = await store.registerSymbols(options.target, symbols, policy, at);
      const refreshed = await store.refreshSymbols(options.target, symbols, policy, at);
      ctx.out(`${options.target}: registered ${inserted} new, refreshed ${refreshed} of ${symbols.length} symbol(s)`);
      return 0;
    }

    if (command === 'status') {
      const summary = await store.summarize(options.target, policy, now());
      const recent = ctx.recentRuns ? await ctx.recentRuns(options.target) : [];
      for (const line of formatStatusLines(summary, recent)) ctx.out(line);
      return 0;
    }

    const symbols = flags.symbols
      ? flags.symbols
          .split(',')
          .map((symbol) => symbol.trim())
          .filter(Boolean)
      : null;
    const reset = await store.resetFailures(options.target, symbols);
    ctx.out(`${options.target}: reset ${reset} watermark(s)`);
    return 0;
  } catch (err: unknown) {
    if (err instanceof CliUsageError || err instanceof InvalidRunOptionsError) {
      error(err.message);
      return 1;
    }
    error(`Command failed: ${describeError(err)}`);
    return 1;
  }
}
