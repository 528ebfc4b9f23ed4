import { ProbeRequest, ProbeResponse } from '../types/index.js';

export class ProbeError extends Error {
  request?: ProbeRequest;
  response?: ProbeResponse;
  suggestions: string[];
  retriable: boolean;

  constructor(
    message: string,
    request?: ProbeRequest,
    response?: ProbeResponse,
    suggestions: string[] = [],
    retriable = false
  ) {
    super(message);
    this.name = 'ProbeError';
    this.request = request;
    this.response = response;
    this.suggestions = suggestions;
    this.retriable = retriable;
  }
}

export class HttpError extends ProbeError {
  status: number;
  statusText: string;

  constructor(response: ProbeResponse, request?: ProbeRequest) {
    super(
      `Request failed with status code ${response.status} ${response.statusText}`,
      request,
      response,
      ['Check the upstream service response body for error details.', 'Inspect request headers/body to ensure they match the API contract.', 'Retry if this is a transient 5xx/429 error.'],
      isRetryableStatus(response.status)
    );
    this.name = 'HttpError';
    this.status = response.status;
    this.statusText = response.statusText;
  }
}

/**
 * Timeout phases reported by the transport
 */
export type TimeoutPhase =
  | 'connect'  // TCP/TLS connection
  | 'response' // First byte (TTFB)
  | 'body'     // Response body read
  | 'request'; // Total request time

export class TimeoutError extends ProbeError {
  phase: TimeoutPhase;

  /**
   * The configured timeout for this phase (ms)
   */
  timeout: number;

  constructor(
    request?: ProbeRequest,
    options?: {
      phase?: TimeoutPhase;
      timeout?: number;
    }
  ) {
    const phase = options?.phase || 'request';
    const timeout = options?.timeout;

    const phaseMessages: Record<TimeoutPhase, string> = {
      connect: 'Connection timed out',
      response: 'Waiting for response timed out (TTFB)',
      body: 'Reading response body timed out',
      request: 'Request timed out (total time exceeded)',
    };

    let message = phaseMessages[phase];
    if (timeout !== undefined) {
      message += ` after ${timeout}ms`;
    }

    super(
      message,
      request,
      undefined,
      [
        'Verify network connectivity and DNS resolution for the target host.',
        'Inference endpoints can be slow on a cold start; raise REQUEST_TIMEOUT_MS.',
      ],
      true
    );
    this.name = 'TimeoutError';
    this.phase = phase;
    this.timeout = timeout ?? 0;
  }
}

export class NetworkError extends ProbeError {
  code?: string;

  constructor(message: string, code?: string, request?: ProbeRequest) {
    const suggestions = [
      'Confirm the host and port are reachable from this environment.',
      'Check proxy/VPN/firewall settings that might block the request.',
    ];
    super(message, request, undefined, suggestions, true);
    this.name = 'NetworkError';
    this.code = code;
  }
}

function isRetryableStatus(status: number): boolean {
  return [408, 425, 429, 500, 502, 503, 504].includes(status);
}

/**
 * No usable credential for signing.
 * Recoverable: the caller may pick another auth scheme or abort.
 */
export class AuthenticationUnavailableError extends ProbeError {
  missing: Array<'accessKeyId' | 'secretAccessKey' | 'credential'>;

  constructor(
    message: string,
    options?: {
      missing?: Array<'accessKeyId' | 'secretAccessKey' | 'credential'>;
      request?: ProbeRequest;
    }
  ) {
    super(
      message,
      options?.request,
      undefined,
      [
        'Set AWS_ACCESS_KEY_ID and AWS_SECRET_ACCESS_KEY, or configure a profile in ~/.aws/credentials.',
        'Use an API key auth method if the endpoint does not require IAM.',
      ],
      false
    );
    this.name = 'AuthenticationUnavailableError';
    this.missing = options?.missing ?? ['credential'];
  }
}

/**
 * The request URL could not be parsed into host, path and query.
 * Not retryable without fixing the input.
 */
export class InvalidRequestTargetError extends ProbeError {
  target: string;

  constructor(target: string, options?: { cause?: unknown; request?: ProbeRequest }) {
    super(
      `Invalid request target: ${target}`,
      options?.request,
      undefined,
      [
        'Pass an absolute URL including the scheme, e.g. https://abc123.execute-api.us-east-1.amazonaws.com/prod.',
        'Check API_URL in the environment or .env file.',
      ],
      false
    );
    this.name = 'InvalidRequestTargetError';
    this.target = target;
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

/**
 * Error thrown when input validation fails
 */
export class ValidationError extends ProbeError {
  field?: string;
  value?: unknown;

  constructor(
    message: string,
    options?: {
      field?: string;
      value?: unknown;
      request?: ProbeRequest;
    }
  ) {
    super(
      message,
      options?.request,
      undefined,
      [
        'Check the input format and constraints.',
        'Ensure required fields are provided.',
      ],
      false
    );
    this.name = 'ValidationError';
    this.field = options?.field;
    this.value = options?.value;
  }
}

/**
 * Error thrown when configuration is invalid or missing
 */
export class ConfigurationError extends ProbeError {
  configKey?: string;

  constructor(
    message: string,
    options?: {
      configKey?: string;
    }
  ) {
    super(
      message,
      undefined,
      undefined,
      [
        'Check the .env file or environment variables.',
        'Verify the configuration values are in the correct format.',
      ],
      false
    );
    this.name = 'ConfigurationError';
    this.configKey = options?.configKey;
  }
}
