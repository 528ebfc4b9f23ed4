/**
 * Defaults shared by the client, config loader and CLI
 */

// Timeouts
export const DEFAULT_TIMEOUT_MS = 30000;

// Endpoint
export const DEFAULT_API_URL = 'https://example.execute-api.us-east-1.amazonaws.com/prod';
export const DEFAULT_REGION = 'us-east-1';
export const DEFAULT_SERVICE = 'execute-api';

// Probe payloads
export const DEFAULT_PROBE_PAYLOAD = {
  query: 'Hello, can you explain what AWS SageMaker is?',
  max_tokens: 100,
} as const;
export const ASK_MAX_TOKENS = 150;

/**
 * Paths tried by endpoint discovery, in order
 */
export const DISCOVERY_PATHS: readonly string[] = ['/invoke', '/predict', '/completion', '/chat', '/generate', '/query', '/'];

export const USER_AGENT = 'sigv4-probe/0.1.0';
