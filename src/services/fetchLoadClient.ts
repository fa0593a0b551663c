/**
 * Fetch-and-load collaborator contract plus an HTTP implementation that
 * delegates one (target, symbol) extraction to a loader service.
 */

import { FetchError, classifyFetchError } from '../lib/errors.js';
import { FetchResultSchema, describeSchemaError, type FetchLoadResult } from '../lib/schemas.js';
import type { Watermark } from './watermarkTypes.js';

export interface FetchLoadRequest {
  target: string;
  symbol: string;
  exchange: string | null;
  /** Last observed date already loaded; the loader may fetch from here onward. */
  sinceDate: string | null;
  watermark: Watermark;
  signal: AbortSignal;
}

export type FetchAndLoad = (request: FetchLoadRequest) => Promise<FetchLoadResult>;

export interface HttpFetchAndLoadOptions {
  baseUrl: string;
  timeoutMs: number;
  fetchImpl?: typeof fetch;
}

function buildRequestAbortError(message: string): Error {
  const error = new Error(message);
  error.name = 'AbortError';
  return error;
}

function parseJsonSafe(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

export function createHttpFetchAndLoad(options: HttpFetchAndLoadOptions): FetchAndLoad {
  const fetchImpl = options.fetchImpl ?? fetch;
  const url = `${options.baseUrl.replace(/\/+$/, '')}/extract`;
  const timeoutMs = Math.max(1, Math.floor(options.timeoutMs));

  return async (request) => {
    const label = `${request.target} ${request.symbol}`;
    if (request.signal.aborted) {
      throw buildRequestAbortError(`${label} aborted`);
    }

    const controller = new AbortController();
    let timedOut = false;
    const timeout = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);
    const forwardAbort = () => controller.abort();
    request.signal.addEventListener('abort', forwardAbort, { once: true });

    try {
      const resp = await fetchImpl(url, {
        method: 'POST',
        headers: { 'content-type': 'application/json' },
        body: JSON.stringify({
          target: request.target,
          symbol: request.symbol,
          exchange: request.exchange,
          sinceDate: request.sinceDate,
        }),
        signal: controller.signal,
      });
      const text = await resp.text();

      if (!resp.ok) {
        const details = text.trim().slice(0, 180) || `HTTP ${resp.status}`;
        const statusOnly = { httpStatus: resp.status };
        throw new FetchError(`${label} request failed (${resp.status}): ${details}`, classifyFetchError(statusOnly), {
          httpStatus: resp.status,
        });
      }

      const payload = parseJsonSafe(text);
      if (payload === null) {
        throw new FetchError(`${label} returned a non-JSON body`, 'permanent', { httpStatus: resp.status });
      }
      const parsed = FetchResultSchema.safeParse(payload);
      if (!parsed.success) {
        throw new FetchError(`${label} returned an invalid result: ${describeSchemaError(parsed.error)}`, 'permanent', {
          httpStatus: resp.status,
        });
      }
      return parsed.data;
    } catch (err: unknown) {
      if (timedOut) {
        throw new FetchError(`${label} timed out after ${timeoutMs}ms`, 'transient', { cause: err });
      }
      if (request.signal.aborted) {
        throw buildRequestAbortError(`${label} aborted`);
      }
      throw err;
    } finally {
      clearTimeout(timeout);
      request.signal.removeEventListener('abort', forwardAbort);
    }
  };
}
