import pino from 'pino';

const logger: pino.Logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  base: { app: 'watermark-etl' },
  formatters: {
    level(label: string) {
      return { level: label };
    },
  },
  timestamp: pino.stdTimeFunctions.isoTime,
});

// Route console output through pino so services that log via console.*
// (stores, the run orchestrator, dbMonitor) emit one structured JSON line each.
export function formatArgs(args: unknown[]): string {
  return args
    .map((a) => {
      if (a instanceof Error) return a.stack || a.message;
      if (typeof a === 'object' && a !== null) {
        try {
          return JSON.stringify(a);
        } catch {
          return String(a);
        }
      }
      return String(a);
    })
    .join(' ');
}

/** Installed by the CLI entry point; tests keep the plain console. */
export function redirectConsoleToLogger(target: pino.Logger = logger): void {
  console.log = (...args: unknown[]) => target.info(formatArgs(args));
  console.error = (...args: unknown[]) => target.error(formatArgs(args));
  console.warn = (...args: unknown[]) => target.warn(formatArgs(args));
  console.info = (...args: unknown[]) => target.info(formatArgs(args));
  console.debug = (...args: unknown[]) => target.debug(formatArgs(args));
}

export default logger;
