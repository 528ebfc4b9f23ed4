/**
 * Basic Authentication
 * RFC 7617 - The 'Basic' HTTP Authentication Scheme
 */

import { Middleware, Plugin } from '../../types/index.js';

export interface BasicAuthOptions {
  /**
   * Empty when an API key is sent as the password
   */
  username: string;
  password: string;
}

/**
 * Basic Authentication Middleware
 * Adds Authorization header with Base64 encoded credentials
 *
 * @example
 * ```typescript
 * // Authorization: Basic OnRlc3Qta2V5  (":test-key")
 * client.use(basicAuth({ username: '', password: 'test-key' }));
 * ```
 */
export function basicAuth(options: BasicAuthOptions): Middleware {
  const credentials = Buffer.from(`${options.username}:${options.password}`).toString('base64');
  const authHeader = `Basic ${credentials}`;

  return async (req, next) => {
    return next(req.withHeader('Authorization', authHeader));
  };
}

export function basicAuthPlugin(options: BasicAuthOptions): Plugin {
  return (client) => {
    client.use(basicAuth(options));
  };
}
