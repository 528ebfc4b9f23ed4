/**
 * Bearer Token Authentication
 * RFC 6750 - The OAuth 2.0 Authorization Framework: Bearer Token Usage
 */

import { Middleware, Plugin } from '../../types/index.js';
import { silentLogger, type Logger } from '../../types/logger.js';

export interface BearerAuthOptions {
  /**
   * Bearer token (static or dynamic). An empty token sends no header.
   */
  token: string | (() => string | Promise<string>);

  /**
   * Token type (default: 'Bearer'). API keys are often sent as `ApiKey <key>`.
   */
  type?: string;

  /**
   * Header name (default: 'Authorization')
   */
  headerName?: string;

  logger?: Logger;
}

/**
 * Bearer Token Authentication Middleware
 *
 * @example
 * ```typescript
 * client.use(bearerAuth({ token: 'test-key' }));
 *
 * // Authorization: ApiKey test-key
 * client.use(bearerAuth({ token: 'test-key', type: 'ApiKey' }));
 * ```
 */
export function bearerAuth(options: BearerAuthOptions): Middleware {
  const type = options.type ?? 'Bearer';
  const headerName = options.headerName ?? 'Authorization';
  const logger = options.logger ?? silentLogger;

  return async (req, next) => {
    const token = typeof options.token === 'function'
      ? await options.token()
      : options.token;

    if (!token) {
      logger.warn({ scheme: type }, 'No token configured; sending request without Authorization');
      return next(req);
    }

    return next(req.withHeader(headerName, `${type} ${token}`));
  };
}

export function bearerAuthPlugin(options: BearerAuthOptions): Plugin {
  return (client) => {
    client.use(bearerAuth(options));
  };
}
