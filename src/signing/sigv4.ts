/**
 * AWS Signature Version 4
 * https://docs.aws.amazon.com/IAM/latest/UserGuide/reference_sigv-create-signed-request.html
 *
 * Header values are trimmed but internal whitespace runs are not collapsed.
 * That covers the headers this client signs (Content-Type, Host, X-Amz-Date,
 * X-Amz-Security-Token); arbitrary caller headers with repeated spaces would
 * need the full collapsing rule.
 */

import { createHash, createHmac } from 'node:crypto';
import { AuthenticationUnavailableError, InvalidRequestTargetError, ValidationError } from '../core/errors.js';
import type { RequestBody } from '../types/index.js';
import type {
  CanonicalHeaders,
  HeaderMap,
  SigningContext,
  SigningCredential,
  SigningOptions,
  SigningTimestamp,
} from './types.js';

export const SIGV4_ALGORITHM = 'AWS4-HMAC-SHA256';
export const SCOPE_TERMINATOR = 'aws4_request';

/**
 * Compute SHA-256 hash
 */
function sha256(data: string | Uint8Array): string {
  return createHash('sha256').update(data).digest('hex');
}

function hmac(key: string | Uint8Array, data: string): Buffer {
  return createHmac('sha256', key).update(data, 'utf8').digest();
}

/**
 * Hex SHA-256 of the request payload; a missing body hashes as empty
 */
export function hashPayload(body: RequestBody | null | undefined): string {
  return sha256(body ?? '');
}

/**
 * Split one instant into the long and short forms SigV4 uses
 */
export function formatAmzDate(date: Date): SigningTimestamp {
  const amzDate = date.toISOString().replace(/[:-]|\.\d{3}/g, '');
  return { amzDate, dateStamp: amzDate.slice(0, 8) };
}

/**
 * kDate -> kRegion -> kService -> kSigning
 *
 * @example
 * ```typescript
 * const key = deriveSigningKey(secret, '20240101', 'us-east-1', 'execute-api');
 * const signature = createHmac('sha256', key).update(stringToSign).digest('hex');
 * ```
 */
export function deriveSigningKey(
  secretAccessKey: string,
  dateStamp: string,
  region: string,
  service: string
): Buffer {
  const kDate = hmac(`AWS4${secretAccessKey}`, dateStamp);
  const kRegion = hmac(kDate, region);
  const kService = hmac(kRegion, service);
  return hmac(kService, SCOPE_TERMINATOR);
}

export function buildCredentialScope(dateStamp: string, region: string, service: string): string {
  return `${dateStamp}/${region}/${service}/${SCOPE_TERMINATOR}`;
}

/**
 * Canonical header block and signed-header list.
 * Independent of the order the headers were inserted in.
 */
export function canonicalizeHeaders(headers: HeaderMap): CanonicalHeaders {
  assertDistinctNames(headers);

  const entries = new Map<string, string>();
  for (const [key, value] of Object.entries(headers)) {
    entries.set(key.toLowerCase(), String(value).trim());
  }

  const names = [...entries.keys()].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));

  return {
    canonicalHeaders: names.map((name) => `${name}:${entries.get(name)}\n`).join(''),
    signedHeaders: names.join(';'),
  };
}

function assertDistinctNames(headers: HeaderMap): void {
  const seen = new Set<string>();
  for (const key of Object.keys(headers)) {
    const name = key.toLowerCase();
    if (seen.has(name)) {
      throw new ValidationError(`Header "${key}" is set more than once with different casing`, {
        field: 'headers',
        value: key,
      });
    }
    seen.add(name);
  }
}

export function buildCanonicalRequest(
  method: string,
  target: URL,
  canonical: CanonicalHeaders,
  payloadHash: string
): string {
  return [
    method,
    target.pathname || '/',
    target.search.slice(1),
    canonical.canonicalHeaders,
    canonical.signedHeaders,
    payloadHash,
  ].join('\n');
}

export function buildStringToSign(amzDate: string, credentialScope: string, canonicalRequest: string): string {
  return [SIGV4_ALGORITHM, amzDate, credentialScope, sha256(canonicalRequest)].join('\n');
}

/**
 * Throws unless both keys are present; never echoes the secret.
 */
function assertCredential(credential: SigningCredential, options: SigningOptions): asserts credential is SigningCredential & {
  accessKeyId: string;
  secretAccessKey: string;
} {
  const missing: Array<'accessKeyId' | 'secretAccessKey'> = [];
  if (!credential.accessKeyId) missing.push('accessKeyId');
  if (!credential.secretAccessKey) missing.push('secretAccessKey');

  if (missing.length > 0) {
    options.logger?.warn({ missing, region: credential.region, service: credential.service }, 'AWS credentials not found; request not signed');
    throw new AuthenticationUnavailableError(`Cannot sign request: missing ${missing.join(' and ')}`, { missing });
  }
}

function parseTarget(url: string): URL {
  let target: URL;
  try {
    target = new URL(url);
  } catch (error) {
    throw new InvalidRequestTargetError(url, { cause: error });
  }
  if (!target.host) {
    throw new InvalidRequestTargetError(url);
  }
  return target;
}

function removeHeader(headers: HeaderMap, name: string): void {
  const lower = name.toLowerCase();
  for (const key of Object.keys(headers)) {
    if (key.toLowerCase() === lower) {
      delete headers[key];
    }
  }
}

/**
 * Set a header, dropping any entry whose name differs only in case
 */
function setHeader(headers: HeaderMap, name: string, value: string): void {
  removeHeader(headers, name);
  headers[name] = value;
}

/**
 * Adds Host, X-Amz-Date (and X-Amz-Security-Token) to `headers`, signs that
 * exact map and adds Authorization. Validation happens before any mutation.
 */
function signInPlace(
  method: string,
  url: string,
  body: RequestBody | null | undefined,
  headers: HeaderMap,
  credential: SigningCredential,
  options: SigningOptions
): SigningContext {
  assertCredential(credential, options);
  const target = parseTarget(url);
  assertDistinctNames(headers);

  // One clock read feeds the header, the scope and the string to sign
  const { amzDate, dateStamp } = formatAmzDate((options.now ?? (() => new Date()))());

  setHeader(headers, 'Host', target.host);
  setHeader(headers, 'X-Amz-Date', amzDate);
  if (credential.sessionToken) {
    setHeader(headers, 'X-Amz-Security-Token', credential.sessionToken);
  }
  // A stale signature from an earlier call must not be canonicalized
  removeHeader(headers, 'Authorization');

  const canonical = canonicalizeHeaders(headers);
  const payloadHash = hashPayload(body);
  const canonicalRequest = buildCanonicalRequest(method, target, canonical, payloadHash);
  const credentialScope = buildCredentialScope(dateStamp, credential.region, credential.service);
  const stringToSign = buildStringToSign(amzDate, credentialScope, canonicalRequest);

  const signingKey = deriveSigningKey(credential.secretAccessKey, dateStamp, credential.region, credential.service);
  const signature = createHmac('sha256', signingKey).update(stringToSign, 'utf8').digest('hex');

  const authorization = `${SIGV4_ALGORITHM} Credential=${credential.accessKeyId}/${credentialScope}, SignedHeaders=${canonical.signedHeaders}, Signature=${signature}`;
  headers['Authorization'] = authorization;

  return {
    amzDate,
    dateStamp,
    ...canonical,
    credentialScope,
    payloadHash,
    canonicalRequest,
    stringToSign,
    signature,
    authorization,
    headers,
  };
}

/**
 * Sign a request with AWS Signature Version 4.
 *
 * `headers` is extended in place with Host, X-Amz-Date and Authorization and
 * returned; send it unmodified. Concurrent callers must not share a map.
 *
 * @throws {AuthenticationUnavailableError} access key or secret key missing; `headers` untouched
 * @throws {InvalidRequestTargetError} `url` is not an absolute URL; `headers` untouched
 * @throws {ValidationError} two header names differ only in case; `headers` untouched
 *
 * @example
 * ```typescript
 * const headers = sign('POST', 'https://abc123.execute-api.us-east-1.amazonaws.com/prod', body,
 *   { 'Content-Type': 'application/json' },
 *   { accessKeyId, secretAccessKey, region: 'us-east-1', service: 'execute-api' });
 * ```
 */
export function sign(
  method: string,
  url: string,
  body: RequestBody | null | undefined,
  headers: HeaderMap,
  credential: SigningCredential,
  options: SigningOptions = {}
): HeaderMap {
  return signInPlace(method, url, body, headers, credential, options).headers;
}

/**
 * Same computation as {@link sign} on a copy of `headers`, returning every
 * intermediate value. Useful for debugging a signature the server rejects.
 */
export function createSigningContext(
  method: string,
  url: string,
  body: RequestBody | null | undefined,
  headers: HeaderMap,
  credential: SigningCredential,
  options: SigningOptions = {}
): SigningContext {
  return signInPlace(method, url, body, { ...headers }, credential, options);
}
