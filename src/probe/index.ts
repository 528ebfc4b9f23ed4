/**
 * Probes an inference endpoint: one request per auth scheme, endpoint
 * discovery over common paths, and single questions for the shell.
 */

import { performance } from 'node:perf_hooks';
import { z } from 'zod';
import { createClient } from '../core/client.js';
import { AuthenticationUnavailableError } from '../core/errors.js';
import { authPlugin, AUTH_METHODS, type AuthMethod } from '../plugins/auth/index.js';
import type { AwsCredentialIdentity, CredentialProvider } from '../credentials/types.js';
import type { ProbeConfig } from '../config.js';
import type { Plugin, Transport } from '../types/index.js';
import { silentLogger, type Logger } from '../types/logger.js';
import { ASK_MAX_TOKENS, DEFAULT_PROBE_PAYLOAD, DISCOVERY_PATHS } from '../constants.js';

export type ProbeOutcome =
  | 'success'
  | 'unauthorized'
  | 'forbidden'
  | 'not-found'
  | 'method-not-allowed'
  | 'error'
  | 'failed'
  | 'unauthenticated';

export interface ProbeResult {
  authMethod: AuthMethod;
  url: string;
  /**
   * 0 when no response was received
   */
  status: number;
  ok: boolean;
  body: string;
  json?: unknown;
  durationMs: number;
  outcome: ProbeOutcome;
  /**
   * Failure message for `failed` and `unauthenticated`
   */
  error?: string;
}

export interface ProbeOptions {
  transport?: Transport;
  logger?: Logger;
  credentials?: AwsCredentialIdentity | CredentialProvider;
  /**
   * @default 'throw'
   */
  onMissingCredentials?: 'throw' | 'skip';
  /**
   * Installed after the auth plugin, e.g. a logger plugin
   */
  plugins?: Plugin[];
  payload?: Record<string, unknown>;
  now?: () => Date;
}

export interface DiscoveryResult {
  results: ProbeResult[];
  /**
   * First path that answered 200
   */
  workingPath?: string;
}

export function classifyStatus(status: number): ProbeOutcome {
  switch (status) {
    case 200:
      return 'success';
    case 401:
      return 'unauthorized';
    case 403:
      return 'forbidden';
    case 404:
      return 'not-found';
    case 405:
      return 'method-not-allowed';
    default:
      return 'error';
  }
}

function parseJson(body: string): unknown {
  try {
    return JSON.parse(body);
  } catch {
    return undefined;
  }
}

function buildClient(config: ProbeConfig, authMethod: AuthMethod, options: ProbeOptions, throwHttpErrors: boolean) {
  return createClient({
    transport: options.transport,
    timeout: config.timeoutMs,
    throwHttpErrors,
    plugins: [
      authPlugin(authMethod, {
        apiKey: config.apiKey,
        region: config.region,
        service: config.service,
        credentials: options.credentials,
        onMissingCredentials: options.onMissingCredentials,
        logger: options.logger,
        now: options.now,
      }),
      ...(options.plugins ?? []),
    ],
  });
}

async function probeUrl(
  url: string,
  config: ProbeConfig,
  authMethod: AuthMethod,
  options: ProbeOptions
): Promise<ProbeResult> {
  const logger = options.logger ?? silentLogger;
  const client = buildClient(config, authMethod, options, false);
  const start = performance.now();

  try {
    const res = await client.post(url, options.payload ?? { ...DEFAULT_PROBE_PAYLOAD });
    const body = await res.text();
    const result: ProbeResult = {
      authMethod,
      url,
      status: res.status,
      ok: res.ok,
      body,
      durationMs: Math.round(performance.now() - start),
      outcome: classifyStatus(res.status),
    };
    const json = parseJson(body);
    if (json !== undefined) {
      result.json = json;
    }
    logger.debug({ authMethod, url, status: res.status, outcome: result.outcome }, 'Probe finished');
    return result;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    const outcome: ProbeOutcome = error instanceof AuthenticationUnavailableError ? 'unauthenticated' : 'failed';
    logger.debug({ authMethod, url, outcome, error: message }, 'Probe did not get a response');
    return {
      authMethod,
      url,
      status: 0,
      ok: false,
      body: '',
      durationMs: Math.round(performance.now() - start),
      outcome,
      error: message,
    };
  }
}

/**
 * POST the probe payload to the configured URL with one auth method.
 * Never throws for HTTP or network failures; they are reported in the result.
 */
export function probe(config: ProbeConfig, authMethod: AuthMethod, options: ProbeOptions = {}): Promise<ProbeResult> {
  return probeUrl(config.apiUrl, config, authMethod, options);
}

/**
 * One probe per auth method, sequentially, in {@link AUTH_METHODS} order
 */
export async function probeAll(config: ProbeConfig, options: ProbeOptions = {}): Promise<ProbeResult[]> {
  const results: ProbeResult[] = [];
  for (const method of AUTH_METHODS) {
    results.push(await probe(config, method, options));
  }
  return results;
}

/**
 * Append each candidate path to the base URL and POST a SigV4-signed probe,
 * stopping at the first 200.
 */
export async function discoverEndpoints(
  config: ProbeConfig,
  options: ProbeOptions & { paths?: readonly string[] } = {}
): Promise<DiscoveryResult> {
  const base = config.apiUrl.replace(/\/+$/, '');
  const results: ProbeResult[] = [];

  for (const path of options.paths ?? DISCOVERY_PATHS) {
    const result = await probeUrl(`${base}${path}`, config, 'aws-iam', options);
    results.push(result);
    if (result.status === 200) {
      return { results, workingPath: path };
    }
  }

  return { results };
}

const askReplySchema = z.object({ response: z.unknown().optional() }).passthrough();

export const NO_RESPONSE_FIELD = 'No response field';

/**
 * Send one question with the `x-api-key` scheme and return the reply's
 * `response` field.
 *
 * @throws {HttpError} non-2xx reply
 */
export async function ask(config: ProbeConfig, question: string, options: ProbeOptions = {}): Promise<string> {
  const client = buildClient(config, 'x-api-key', options, true);
  const reply = await client
    .post(config.apiUrl, { query: question, max_tokens: ASK_MAX_TOKENS })
    .parse(askReplySchema);

  if (reply.response === undefined || reply.response === null) {
    return NO_RESPONSE_FIELD;
  }
  return typeof reply.response === 'string' ? reply.response : JSON.stringify(reply.response);
}
