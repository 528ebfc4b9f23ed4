import { Middleware, Plugin, ProbeRequest } from '../types/index.js';
import { Logger, consoleLogger } from '../types/logger.js';

export interface LoggerPluginOptions {
  /**
   * Any object with debug/info/warn/error taking `(obj, msg)`, e.g. a pino instance
   * @default console
   */
  logger?: Logger;

  /**
   * Log level for requests/responses
   * @default 'info'
   */
  level?: 'debug' | 'info';

  /**
   * Show request/response headers (credentials redacted)
   * @default false
   */
  showHeaders?: boolean;

  /**
   * Show request body
   * @default false
   */
  showBody?: boolean;

  /**
   * Include timing information
   * @default true
   */
  showTimings?: boolean;
}

/**
 * Headers whose values are credentials. Matched case-insensitively.
 */
export const REDACTED_HEADERS: ReadonlySet<string> = new Set([
  'authorization',
  'proxy-authorization',
  'x-amz-security-token',
  'x-api-key',
]);

export const REDACTED = '[REDACTED]';

export function redactHeaders(headers: Headers): Record<string, string> {
  const result: Record<string, string> = {};
  headers.forEach((value, key) => {
    result[key] = REDACTED_HEADERS.has(key.toLowerCase()) ? REDACTED : value;
  });
  return result;
}

function bodyForLog(body: ProbeRequest['body']): unknown {
  if (body === null) return undefined;
  if (typeof body !== 'string') return '[Binary]';
  try {
    return JSON.parse(body);
  } catch {
    return body;
  }
}

/**
 * Logging middleware. Install it after auth plugins so it sees the headers
 * that actually go on the wire.
 */
export function loggerMiddleware(options: LoggerPluginOptions = {}): Middleware {
  const log = options.logger || consoleLogger;
  const showHeaders = options.showHeaders || false;
  const showBody = options.showBody || false;
  const showTimings = options.showTimings !== false;

  const logFn = (data: Record<string, unknown>, message: string) =>
    options.level === 'debug' ? log.debug(data, message) : log.info(data, message);

  return async (req, next) => {
    const start = performance.now();

    // Pino-style structured logging: object first, message second
    const requestData: Record<string, unknown> = {
      type: 'request',
      method: req.method,
      url: req.url,
    };
    if (showHeaders) {
      requestData.headers = redactHeaders(req.headers);
    }
    if (showBody && req.body !== null) {
      requestData.body = bodyForLog(req.body);
    }
    logFn(requestData, `→ ${req.method} ${req.url}`);

    try {
      const res = await next(req);
      const duration = Math.round(performance.now() - start);

      const responseData: Record<string, unknown> = {
        type: 'response',
        method: req.method,
        url: req.url,
        status: res.status,
        statusText: res.statusText,
        ok: res.ok,
        duration,
      };
      if (showHeaders) {
        responseData.headers = redactHeaders(res.headers);
      }
      if (showTimings && res.timings) {
        responseData.timings = res.timings;
      }
      const contentLength = res.headers.get('content-length');
      if (contentLength) {
        responseData.size = parseInt(contentLength, 10);
      }

      logFn(responseData, `← ${res.status} ${req.method} ${req.url} (${duration}ms)`);
      return res;
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      log.error(
        {
          type: 'error',
          method: req.method,
          url: req.url,
          error: err.message,
          errorName: err.name,
          duration: Math.round(performance.now() - start),
        },
        `✖ ${req.method} ${req.url} - ${err.message}`
      );
      throw error;
    }
  };
}

/**
 * Logger plugin - logs HTTP requests and responses
 *
 * @example
 * ```typescript
 * const client = createClient({
 *   baseUrl: 'https://abc123.execute-api.us-east-1.amazonaws.com/prod',
 *   plugins: [authPlugin('aws-iam'), loggerPlugin({ level: 'debug', showHeaders: true })],
 * });
 * ```
 */
export function loggerPlugin(options: LoggerPluginOptions = {}): Plugin {
  return (client) => {
    client.use(loggerMiddleware(options));
  };
}

function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/**
 * Convert a request to a cURL command string, credentials redacted
 *
 * @example
 * ```typescript
 * client.beforeRequest((req) => {
 *   console.log(toCurl(req));
 * });
 * ```
 */
export function toCurl(req: ProbeRequest): string {
  const parts = ['curl'];

  if (req.method !== 'GET') {
    parts.push(`-X ${req.method}`);
  }

  parts.push(shellQuote(req.url));

  for (const [key, value] of Object.entries(redactHeaders(req.headers))) {
    parts.push(`-H ${shellQuote(`${key}: ${value}`)}`);
  }

  if (req.body !== null) {
    parts.push(typeof req.body === 'string' ? `-d ${shellQuote(req.body)}` : `-d '[Binary]'`);
  }

  return parts.join(' \\\n  ');
}
