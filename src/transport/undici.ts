import { request as undiciRequest, errors as undiciErrors, type Dispatcher } from 'undici';
import { STATUS_CODES } from 'node:http';
import { performance } from 'node:perf_hooks';
import { ProbeRequest, ProbeResponse, Transport } from '../types/index.js';
import { HttpResponse } from '../core/response.js';
import { NetworkError, TimeoutError } from '../core/errors.js';

export interface UndiciTransportOptions {
  /**
   * Custom undici dispatcher (Agent, ProxyAgent, MockAgent)
   */
  dispatcher?: Dispatcher;

  /**
   * Time to wait for response headers (ms). Falls back to the request timeout.
   */
  headersTimeout?: number;

  /**
   * Max idle time between body chunks (ms). Falls back to the request timeout.
   */
  bodyTimeout?: number;
}

// Statuses the Fetch Response constructor refuses a body for
const NULL_BODY_STATUSES = new Set([101, 103, 204, 205, 304]);

function errorCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  if ('code' in error && typeof error.code === 'string') return error.code;
  if ('cause' in error) return errorCode(error.cause);
  return undefined;
}

function toHeaderRecord(headers: Headers): Record<string, string> {
  const record: Record<string, string> = {};
  headers.forEach((value, key) => {
    record[key] = value;
  });
  return record;
}

function toWebHeaders(headers: Record<string, string | string[] | undefined>): Headers {
  const result = new Headers();
  for (const [key, value] of Object.entries(headers)) {
    if (value === undefined) continue;
    if (Array.isArray(value)) {
      value.forEach((v) => result.append(key, v));
    } else {
      result.set(key, value);
    }
  }
  return result;
}

/**
 * Sends requests with undici and buffers the whole response body, so the
 * result can be read more than once (logging, probing and parsing).
 */
export class UndiciTransport implements Transport {
  private options: UndiciTransportOptions;

  constructor(options: UndiciTransportOptions = {}) {
    this.options = options;
  }

  async dispatch(req: ProbeRequest): Promise<ProbeResponse> {
    const startTime = performance.now();
    const controller = new AbortController();
    let timedOut = false;
    let timeoutId: NodeJS.Timeout | undefined;

    const abortFromCaller = () => controller.abort(req.signal?.reason);
    if (req.signal?.aborted) {
      abortFromCaller();
    } else {
      req.signal?.addEventListener('abort', abortFromCaller, { once: true });
    }

    if (req.timeout) {
      timeoutId = setTimeout(() => {
        timedOut = true;
        controller.abort(new Error('Request timed out'));
      }, req.timeout);
    }

    const headersTimeout = this.options.headersTimeout ?? req.timeout;
    const bodyTimeout = this.options.bodyTimeout ?? req.timeout;

    try {
      const undiciResponse = await undiciRequest(req.url, {
        method: req.method,
        headers: toHeaderRecord(req.headers),
        body: req.body ?? undefined,
        signal: controller.signal,
        dispatcher: this.options.dispatcher,
        headersTimeout,
        bodyTimeout,
      });

      const firstByte = performance.now() - startTime;
      const buffer = await undiciResponse.body.arrayBuffer();
      const status = undiciResponse.statusCode;

      const raw = new Response(NULL_BODY_STATUSES.has(status) ? null : buffer, {
        status,
        statusText: STATUS_CODES[status] ?? '',
        headers: toWebHeaders(undiciResponse.headers),
      });

      return new HttpResponse(raw, {
        url: req.url,
        timings: { firstByte, total: performance.now() - startTime },
      });
    } catch (error) {
      if (error instanceof undiciErrors.ConnectTimeoutError) {
        throw new TimeoutError(req, { phase: 'connect', timeout: req.timeout });
      }

      if (error instanceof undiciErrors.HeadersTimeoutError) {
        throw new TimeoutError(req, { phase: 'response', timeout: headersTimeout });
      }

      if (error instanceof undiciErrors.BodyTimeoutError) {
        throw new TimeoutError(req, { phase: 'body', timeout: bodyTimeout });
      }

      if (timedOut) {
        throw new TimeoutError(req, { phase: 'request', timeout: req.timeout });
      }

      if (controller.signal.aborted) {
        throw new NetworkError('Request aborted', 'ABORT_ERR', req);
      }

      const message = error instanceof Error ? error.message : String(error);
      throw new NetworkError(message, errorCode(error), req);
    } finally {
      if (timeoutId) {
        clearTimeout(timeoutId);
      }
      req.signal?.removeEventListener('abort', abortFromCaller);
    }
  }
}
