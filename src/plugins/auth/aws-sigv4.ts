/**
 * AWS Signature Version 4 Authentication
 * https://docs.aws.amazon.com/IAM/latest/UserGuide/reference_sigv-create-signed-request.html
 */

import { Middleware, Plugin } from '../../types/index.js';
import { AuthenticationUnavailableError } from '../../core/errors.js';
import { sign } from '../../signing/sigv4.js';
import type { HeaderMap } from '../../signing/types.js';
import { defaultCredentialProvider, fromStatic, resolveSigningCredential } from '../../credentials/providers.js';
import type { AwsCredentialIdentity, CredentialProvider } from '../../credentials/types.js';
import { silentLogger, type Logger } from '../../types/logger.js';

export interface AwsSignatureV4Options {
  /**
   * AWS Service name (e.g., 'execute-api', 'sagemaker')
   * @default 'execute-api'
   */
  service?: string;

  /**
   * AWS Region (e.g., 'us-east-1'). Falls back to the region found with the
   * credentials.
   */
  region?: string;

  /**
   * Fixed keys or a provider invoked on every request.
   * @default environment, then ~/.aws shared files
   */
  credentials?: AwsCredentialIdentity | CredentialProvider;

  /**
   * `throw` aborts the request with {@link AuthenticationUnavailableError};
   * `skip` sends it unsigned and logs a warning.
   * @default 'throw'
   */
  onMissingCredentials?: 'throw' | 'skip';

  logger?: Logger;

  /**
   * Clock used for X-Amz-Date
   */
  now?: () => Date;
}

/**
 * AWS Signature V4 Authentication Middleware
 *
 * The outgoing headers are exactly the map that was signed: nothing may be
 * added after this middleware runs.
 *
 * @example
 * ```typescript
 * client.use(awsSignatureV4({
 *   region: 'us-east-1',
 *   service: 'execute-api',
 *   credentials: fromEnv(),
 * }));
 * ```
 */
export function awsSignatureV4(options: AwsSignatureV4Options = {}): Middleware {
  const logger = options.logger ?? silentLogger;
  const service = options.service ?? 'execute-api';
  const onMissing = options.onMissingCredentials ?? 'throw';
  const provider: CredentialProvider = typeof options.credentials === 'function'
    ? options.credentials
    : options.credentials
      ? fromStatic(options.credentials)
      : defaultCredentialProvider({ logger });

  return async (req, next) => {
    const headers: HeaderMap = {};
    req.headers.forEach((value, key) => {
      headers[key] = value;
    });

    try {
      const credential = resolveSigningCredential(provider, { region: options.region, service });
      sign(req.method, req.url, req.body, headers, credential, { now: options.now, logger });
    } catch (error) {
      if (error instanceof AuthenticationUnavailableError && onMissing === 'skip') {
        logger.warn({ url: req.url, reason: error.message }, 'Sending request without AWS signature');
        return next(req);
      }
      throw error;
    }

    return next(req.withHeaders(headers));
  };
}

/**
 * AWS Signature V4 Authentication Plugin
 */
export function awsSignatureV4Plugin(options: AwsSignatureV4Options = {}): Plugin {
  return (client) => {
    client.use(awsSignatureV4(options));
  };
}
