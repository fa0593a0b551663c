import client from 'prom-client';

// Dedicated registry: a batch run writes its own metrics file and must not
// pick up collectors registered by other modules in the same process.
export const metricsRegistry = new client.Registry();

export const watermarkDecisionsTotal = new client.Counter({
  name: 'watermark_decisions_total',
  help: 'Watermark evaluator decisions per target',
  labelNames: ['target', 'decision'],
  registers: [metricsRegistry],
});

export const watermarkAttemptsTotal = new client.Counter({
  name: 'watermark_attempts_total',
  help: 'Fetch-and-load attempts per target by outcome',
  labelNames: ['target', 'outcome'],
  registers: [metricsRegistry],
});

export const watermarkFetchDurationSeconds = new client.Histogram({
  name: 'watermark_fetch_duration_seconds',
  help: 'Duration of one fetch-and-load attempt in seconds',
  labelNames: ['target'],
  buckets: [0.1, 0.5, 1, 2, 5, 10, 30, 60, 120],
  registers: [metricsRegistry],
});

export type RunOutcome = 'success' | 'failure_transient' | 'failure_permanent';

/** The slice of metrics the run orchestrator reports into. */
export interface RunMetrics {
  recordDecision(target: string, decision: string, count?: number): void;
  recordAttempt(target: string, outcome: RunOutcome, durationMs: number): void;
}

export const promRunMetrics: RunMetrics = {
  recordDecision(target, decision, count = 1) {
    if (count > 0) watermarkDecisionsTotal.inc({ target, decision }, count);
  },
  recordAttempt(target, outcome, durationMs) {
    watermarkAttemptsTotal.inc({ target, outcome });
    watermarkFetchDurationSeconds.observe({ target }, Math.max(0, durationMs) / 1000);
  },
};

/** Prometheus text exposition of every metric in the run registry. */
export function renderMetrics(): Promise<string> {
  return metricsRegistry.metrics();
}
