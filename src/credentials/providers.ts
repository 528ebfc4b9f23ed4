import { AuthenticationUnavailableError } from '../core/errors.js';
import type { SigningCredential } from '../signing/types.js';
import { silentLogger, type Logger } from '../types/logger.js';
import { fromSharedFiles } from './shared-files.js';
import type { AwsCredentialIdentity, CredentialProvider } from './types.js';

/**
 * Fixed keys, e.g. from CLI flags or a secrets manager lookup done elsewhere
 */
export function fromStatic(identity: AwsCredentialIdentity): CredentialProvider {
  return () => ({ ...identity });
}

/**
 * Standard AWS environment variables.
 *
 * Region comes from AWS_REGION, then AWS_DEFAULT_REGION.
 */
export function fromEnv(env: NodeJS.ProcessEnv = process.env): CredentialProvider {
  return () => {
    const accessKeyId = env['AWS_ACCESS_KEY_ID'];
    const secretAccessKey = env['AWS_SECRET_ACCESS_KEY'];
    if (!accessKeyId || !secretAccessKey) {
      return undefined;
    }

    return {
      accessKeyId,
      secretAccessKey,
      sessionToken: env['AWS_SESSION_TOKEN'] || undefined,
      region: env['AWS_REGION'] || env['AWS_DEFAULT_REGION'] || undefined,
    };
  };
}

/**
 * First provider that yields both keys wins.
 * A provider that throws counts as empty; the error is logged at debug level.
 *
 * @example
 * ```typescript
 * const provider = chain(fromEnv(), fromSharedFiles({ profile: 'inference' }));
 * ```
 */
export function chain(...providers: CredentialProvider[]): CredentialProvider;
export function chain(options: { logger?: Logger }, ...providers: CredentialProvider[]): CredentialProvider;
export function chain(
  first?: CredentialProvider | { logger?: Logger },
  ...rest: CredentialProvider[]
): CredentialProvider {
  let logger: Logger = silentLogger;
  const providers: CredentialProvider[] = [];

  if (typeof first === 'function') {
    providers.push(first);
  } else if (first?.logger) {
    logger = first.logger;
  }
  providers.push(...rest);

  return () => {
    for (const [index, provider] of providers.entries()) {
      let identity: AwsCredentialIdentity | undefined;
      try {
        identity = provider();
      } catch (error) {
        logger.debug(
          { provider: index, error: error instanceof Error ? error.message : String(error) },
          'Credential provider failed; trying next'
        );
        continue;
      }
      if (identity?.accessKeyId && identity.secretAccessKey) {
        return identity;
      }
    }
    return undefined;
  };
}

/**
 * Environment first, then ~/.aws/credentials and ~/.aws/config
 */
export function defaultCredentialProvider(options: { env?: NodeJS.ProcessEnv; logger?: Logger } = {}): CredentialProvider {
  const env = options.env ?? process.env;
  return chain({ logger: options.logger }, fromEnv(env), fromSharedFiles({ env }));
}

/**
 * Invoke `provider` once and combine the result with the signing scope.
 * The scope's region wins; the identity's region fills in when the scope has none.
 *
 * @throws {AuthenticationUnavailableError} the provider found nothing
 */
export function resolveSigningCredential(
  provider: CredentialProvider,
  scope: { region?: string; service: string }
): SigningCredential {
  const identity = provider();
  if (!identity) {
    throw new AuthenticationUnavailableError('No AWS credentials found in the environment or shared credentials files');
  }

  const region = scope.region || identity.region;
  if (!region) {
    throw new AuthenticationUnavailableError('AWS credentials found but no region is configured');
  }

  return {
    accessKeyId: identity.accessKeyId,
    secretAccessKey: identity.secretAccessKey,
    sessionToken: identity.sessionToken,
    region,
    service: scope.service,
  };
}

/**
 * Printable form of a credential: first 8 characters of the access key.
 * The secret and session token never appear.
 */
export function describeCredential(identity: Pick<AwsCredentialIdentity, 'accessKeyId'> | undefined): string {
  if (!identity?.accessKeyId) {
    return '(none)';
  }
  return `${identity.accessKeyId.slice(0, 8)}...`;
}
