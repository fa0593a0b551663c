/**
 * Error types and pure error-classification predicates.
 *
 * Kept in lib/ so stores, the fetch client and the run orchestrator can share
 * them without depending on each other.
 */

export type FetchFailureKind = 'transient' | 'permanent';

/** A fetch-and-load failure reported for one symbol. */
export class FetchError extends Error {
  readonly kind: FetchFailureKind;
  readonly httpStatus: number | null;

  constructor(message: string, kind: FetchFailureKind = 'transient', options: { httpStatus?: number; cause?: unknown } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'FetchError';
    this.kind = kind;
    this.httpStatus = options.httpStatus ?? null;
  }
}

/** The watermark store could not be read or written. Fatal to a run. */
export class StoreUnavailableError extends Error {
  readonly operation: string;

  constructor(operation: string, cause: unknown) {
    super(`Watermark store unavailable during ${operation}: ${describeError(cause)}`, { cause });
    this.name = 'StoreUnavailableError';
    this.operation = operation;
  }
}

/** Batch invocation options failed validation. */
export class InvalidRunOptionsError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid run options: ${issues.join('; ')}`);
    this.name = 'InvalidRunOptionsError';
    this.issues = issues;
  }
}

/**
 * Returns true if `err` represents a request-abort signal: an AbortError by
 * name, an HTTP 499 status, or an error message containing "aborted" /
 * "aborterror" (case-insensitive).
 */
export function isAbortError(err: unknown): boolean {
  if (!err || typeof err !== 'object') return false;
  const name = String(readField(err, 'name') || '');
  const message = String(readField(err, 'message') || err || '');
  return name === 'AbortError' || Number(readField(err, 'httpStatus')) === 499 || /aborted|aborterror/i.test(message);
}

function readField(err: object, key: string): unknown {
  return Reflect.get(err, key);
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message || err.name;
  if (typeof err === 'string') return err;
  try {
    return JSON.stringify(err) ?? String(err);
  } catch {
    return String(err);
  }
}

/**
 * Classify an error thrown by a fetch-and-load collaborator.
 *
 * Client errors (4xx other than 408/429) and malformed payloads are permanent;
 * everything else (timeouts, 5xx, network resets) is retried on a later run.
 */
export function classifyFetchError(err: unknown): FetchFailureKind {
  if (err instanceof FetchError) return err.kind;
  if (err instanceof SyntaxError) return 'permanent';
  if (err && typeof err === 'object') {
    const status = Number(readField(err, 'httpStatus'));
    if (Number.isFinite(status) && status >= 400 && status < 500 && status !== 408 && status !== 429) {
      return 'permanent';
    }
  }
  return 'transient';
}
