/**
 * Authentication Plugins
 *
 * - AWS Signature V4 (IAM)
 * - API Key header (`x-api-key` / `X-API-Key`)
 * - Bearer Token (RFC 6750), also `ApiKey <key>`
 * - Basic Auth (RFC 7617)
 */

import { Plugin } from '../../types/index.js';
import { silentLogger, type Logger } from '../../types/logger.js';
import { ValidationError } from '../../core/errors.js';
import type { AwsCredentialIdentity, CredentialProvider } from '../../credentials/types.js';
import { awsSignatureV4 } from './aws-sigv4.js';
import { apiKeyAuth } from './api-key.js';
import { bearerAuth } from './bearer.js';
import { basicAuth } from './basic.js';

export * from './aws-sigv4.js';
export * from './api-key.js';
export * from './bearer.js';
export * from './basic.js';

/**
 * Auth method names accepted by the CLI, in the order `testall` runs them
 */
export const AUTH_METHODS = ['aws-iam', 'x-api-key', 'X-API-Key', 'bearer', 'apikey', 'basic'] as const;

export type AuthMethod = (typeof AUTH_METHODS)[number];

export function isAuthMethod(value: string): value is AuthMethod {
  return AUTH_METHODS.some((method) => method === value);
}

export interface AuthConfig {
  apiKey?: string;
  region?: string;
  service?: string;
  credentials?: AwsCredentialIdentity | CredentialProvider;
  onMissingCredentials?: 'throw' | 'skip';
  logger?: Logger;
  now?: () => Date;
}

/**
 * Install the middleware for one auth method.
 *
 * API-key methods with no key configured send the request without
 * credentials and log a warning.
 *
 * @example
 * ```typescript
 * const client = createClient({
 *   baseUrl: config.apiUrl,
 *   plugins: [authPlugin('aws-iam', { region: 'us-east-1', service: 'execute-api' })],
 * });
 * ```
 */
export function authPlugin(method: AuthMethod, config: AuthConfig = {}): Plugin {
  const apiKey = config.apiKey ?? '';
  const logger = config.logger ?? silentLogger;

  return (client) => {
    switch (method) {
      case 'aws-iam':
        client.use(awsSignatureV4({
          region: config.region,
          service: config.service,
          credentials: config.credentials,
          onMissingCredentials: config.onMissingCredentials,
          logger,
          now: config.now,
        }));
        return;
      case 'x-api-key':
      case 'X-API-Key':
        client.use(apiKeyAuth({ key: apiKey, name: method, logger }));
        return;
      case 'bearer':
        client.use(bearerAuth({ token: apiKey, logger }));
        return;
      case 'apikey':
        client.use(bearerAuth({ token: apiKey, type: 'ApiKey', logger }));
        return;
      case 'basic':
        if (!apiKey) {
          logger.warn({ scheme: 'basic' }, 'No API key configured; sending request without Authorization');
          return;
        }
        client.use(basicAuth({ username: '', password: apiKey }));
        return;
      default: {
        const unknown: never = method;
        throw new ValidationError(`Unknown auth method: ${String(unknown)}`, { field: 'authMethod', value: unknown });
      }
    }
  };
}
