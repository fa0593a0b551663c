#!/usr/bin/env node
import logger, { redirectConsoleToLogger } from './src/logger.js';
import {
  FETCH_LOAD_TIMEOUT_MS,
  FETCH_LOAD_URL,
  RUN_METRICS_PATH,
  RUN_SUMMARY_PATH,
  validateStartupEnvironment,
} from './src/config.js';
import { createWarehouseConnection } from './src/db.js';
import { runMigrations } from './src/db/migrate.js';
import { parseCliArgs, runCli } from './src/cli.js';
import { renderMetrics } from './src/metrics.js';
import { createHttpFetchAndLoad } from './src/services/fetchLoadClient.js';
import { PgWatermarkStore } from './src/services/pgWatermarkStore.js';
import { listRecentRuns, persistRunSummary } from './src/services/runSummary.js';
import { PgSymbolRegistry } from './src/services/symbolRegistry.js';

redirectConsoleToLogger();
const log = logger.child({ module: 'cli' });

async function main(): Promise<number> {
  const argv = process.argv.slice(2);
  const { command } = parseCliArgs(argv);
  if (command === 'targets') {
    return runCli(argv, {
      out: (line) => process.stdout.write(`${line}\n`),
    });
  }

  validateStartupEnvironment({ requireFetchLoader: command === 'run' });
  const connection = createWarehouseConnection();
  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals) => {
    log.warn({ signal }, 'Stop requested; in-flight fetches are cancelled and left unrecorded, no new symbols start');
    controller.abort();
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  try {
    return await runCli(argv, {
      store: new PgWatermarkStore(connection.pool),
      registry: new PgSymbolRegistry(connection.pool),
      fetchAndLoad: FETCH_LOAD_URL ? createHttpFetchAndLoad({ baseUrl: FETCH_LOAD_URL, timeoutMs: FETCH_LOAD_TIMEOUT_MS }) : null,
      migrate: () => runMigrations(connection.db),
      persistSummary: (summary) => persistRunSummary(connection.db, summary),
      recentRuns: (target) => listRecentRuns(connection.db, target),
      renderMetrics,
      summaryPath: RUN_SUMMARY_PATH || null,
      metricsPath: RUN_METRICS_PATH || null,
      signal: controller.signal,
      out: (line) => process.stdout.write(`${line}\n`),
      log: (message) => log.info(message),
      error: (message) => log.error(message),
    });
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
    await connection.close();
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    log.error({ err }, 'watermark-etl failed');
    process.exitCode = 1;
  });
