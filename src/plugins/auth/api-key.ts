/**
 * API Key Authentication via request header
 */

import { Middleware, Plugin } from '../../types/index.js';
import { silentLogger, type Logger } from '../../types/logger.js';

export interface ApiKeyAuthOptions {
  /**
   * API key value. An empty key sends the request without the header.
   */
  key: string | (() => string | Promise<string>);

  /**
   * Header name. API Gateway reads `x-api-key`; some proxies expect `X-API-Key`.
   * @default 'x-api-key'
   */
  name?: string;

  logger?: Logger;
}

/**
 * @example
 * ```typescript
 * client.use(apiKeyAuth({ key: process.env.API_KEY ?? '' }));
 * client.use(apiKeyAuth({ key: 'test-key', name: 'X-API-Key' }));
 * ```
 */
export function apiKeyAuth(options: ApiKeyAuthOptions): Middleware {
  const name = options.name ?? 'x-api-key';
  const logger = options.logger ?? silentLogger;

  return async (req, next) => {
    const key = typeof options.key === 'function'
      ? await options.key()
      : options.key;

    if (!key) {
      logger.warn({ header: name }, 'No API key configured; sending request without it');
      return next(req);
    }

    return next(req.withHeader(name, key));
  };
}

export function apiKeyAuthPlugin(options: ApiKeyAuthOptions): Plugin {
  return (client) => {
    client.use(apiKeyAuth(options));
  };
}
