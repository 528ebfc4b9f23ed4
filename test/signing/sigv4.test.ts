import { describe, it, expect, vi } from 'vitest';
import { createHash, createHmac } from 'node:crypto';
import {
  sign,
  createSigningContext,
  canonicalizeHeaders,
  deriveSigningKey,
  formatAmzDate,
  hashPayload,
} from '../../src/signing/sigv4.js';
import type { SigningCredential } from '../../src/signing/types.js';
import {
  AuthenticationUnavailableError,
  InvalidRequestTargetError,
  ValidationError,
} from '../../src/core/errors.js';
import type { Logger } from '../../src/types/logger.js';

const credential: SigningCredential = {
  accessKeyId: 'AKIDEXAMPLE',
  secretAccessKey: 'test-secret',
  region: 'us-east-1',
  service: 'execute-api',
};

const fixedNow = () => new Date('2024-01-01T00:00:00Z');
const body = '{"query":"hi"}';

function sha256(data: string): string {
  return createHash('sha256').update(data).digest('hex');
}

function hmac(key: string | Buffer, data: string): Buffer {
  return createHmac('sha256', key).update(data).digest();
}

describe('sign', () => {
  it('should match an independently computed SigV4 signature', () => {
    const headers = sign('POST', 'https://example.com/invoke', body, { 'Content-Type': 'application/json' }, credential, {
      now: fixedNow,
    });

    const canonicalRequest = [
      'POST',
      '/invoke',
      '',
      'content-type:application/json\nhost:example.com\nx-amz-date:20240101T000000Z\n',
      'content-type;host;x-amz-date',
      sha256(body),
    ].join('\n');
    const scope = '20240101/us-east-1/execute-api/aws4_request';
    const stringToSign = ['AWS4-HMAC-SHA256', '20240101T000000Z', scope, sha256(canonicalRequest)].join('\n');
    const kSigning = hmac(hmac(hmac(hmac('AWS4test-secret', '20240101'), 'us-east-1'), 'execute-api'), 'aws4_request');
    const signature = createHmac('sha256', kSigning).update(stringToSign).digest('hex');

    expect(headers).toEqual({
      'Content-Type': 'application/json',
      Host: 'example.com',
      'X-Amz-Date': '20240101T000000Z',
      Authorization: `AWS4-HMAC-SHA256 Credential=AKIDEXAMPLE/${scope}, SignedHeaders=content-type;host;x-amz-date, Signature=${signature}`,
    });
  });

  it('should produce the pinned signature for the documented example request', () => {
    const exampleCredential: SigningCredential = { ...credential, secretAccessKey: 'secret123' };
    const ctx = createSigningContext(
      'POST',
      'https://example.com/invoke',
      body,
      { 'Content-Type': 'application/json' },
      exampleCredential,
      { now: fixedNow }
    );

    expect(ctx.amzDate).toBe('20240101T000000Z');
    expect(ctx.dateStamp).toBe('20240101');
    expect(ctx.credentialScope).toBe('20240101/us-east-1/execute-api/aws4_request');
    expect(ctx.signature).toBe('f85f9d4236980152f12147e02a5853a3807f58c9588a0d2cde8139ede5c415f6');

    const headers = sign('POST', 'https://example.com/invoke', body, { 'Content-Type': 'application/json' }, exampleCredential, {
      now: fixedNow,
    });
    expect(headers['Authorization']).toBe(
      'AWS4-HMAC-SHA256 Credential=AKIDEXAMPLE/20240101/us-east-1/execute-api/aws4_request, ' +
        'SignedHeaders=content-type;host;x-amz-date, ' +
        'Signature=f85f9d4236980152f12147e02a5853a3807f58c9588a0d2cde8139ede5c415f6'
    );
  });

  it('should return the same map it was given', () => {
    const headers = { 'Content-Type': 'application/json' };
    const result = sign('POST', 'https://example.com/invoke', body, headers, credential, { now: fixedNow });
    expect(result).toBe(headers);
    expect(headers).toHaveProperty('Authorization');
  });

  it('should be deterministic for a fixed clock', () => {
    const a = sign('POST', 'https://example.com/invoke', body, { 'Content-Type': 'application/json' }, credential, { now: fixedNow });
    const b = sign('POST', 'https://example.com/invoke', body, { 'Content-Type': 'application/json' }, credential, { now: fixedNow });
    expect(a['Authorization']).toBe(b['Authorization']);
  });

  it('should change the signature when only the body changes', () => {
    const a = sign('POST', 'https://example.com/invoke', body, {}, credential, { now: fixedNow });
    const b = sign('POST', 'https://example.com/invoke', '{"query":"bye"}', {}, credential, { now: fixedNow });
    expect(a['X-Amz-Date']).toBe(b['X-Amz-Date']);
    expect(a['Authorization']).not.toBe(b['Authorization']);
  });

  it('should not depend on header insertion order', () => {
    const a = sign('POST', 'https://example.com/invoke', body, { 'Content-Type': 'application/json', 'X-Trace': 'abc' }, credential, { now: fixedNow });
    const b = sign('POST', 'https://example.com/invoke', body, { 'X-Trace': 'abc', 'Content-Type': 'application/json' }, credential, { now: fixedNow });
    expect(a['Authorization']).toBe(b['Authorization']);
  });

  it('should read the clock exactly once', () => {
    const now = vi.fn(fixedNow);
    sign('POST', 'https://example.com/invoke', body, {}, credential, { now });
    expect(now).toHaveBeenCalledTimes(1);
  });

  it('should include the port in Host', () => {
    const headers = sign('GET', 'http://127.0.0.1:8080/prod', null, {}, credential, { now: fixedNow });
    expect(headers['Host']).toBe('127.0.0.1:8080');
  });

  it('should replace a host header supplied in another case', () => {
    const headers = sign('POST', 'https://example.com/invoke', body, { host: 'stale.example.com' }, credential, { now: fixedNow });
    expect(headers['host']).toBeUndefined();
    expect(headers['Host']).toBe('example.com');
    expect(headers['Authorization']).toContain('SignedHeaders=host;x-amz-date,');
  });

  it('should not canonicalize a stale Authorization when re-signing', () => {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    sign('POST', 'https://example.com/invoke', body, headers, credential, { now: fixedNow });
    sign('POST', 'https://example.com/invoke', body, headers, credential, { now: () => new Date('2024-01-02T00:00:00Z') });

    expect(headers['X-Amz-Date']).toBe('20240102T000000Z');
    expect(headers['Authorization']).toContain('Credential=AKIDEXAMPLE/20240102/us-east-1/execute-api/aws4_request');
    expect(headers['Authorization']).toContain('SignedHeaders=content-type;host;x-amz-date,');
  });

  it('should add and sign X-Amz-Security-Token for temporary credentials', () => {
    const headers = sign('POST', 'https://example.com/invoke', body, { 'Content-Type': 'application/json' }, {
      ...credential,
      sessionToken: 'test-session-token',
    }, { now: fixedNow });

    expect(headers['X-Amz-Security-Token']).toBe('test-session-token');
    expect(headers['Authorization']).toContain('SignedHeaders=content-type;host;x-amz-date;x-amz-security-token,');
  });

  it('should not mutate the credential', () => {
    const input: SigningCredential = { ...credential, sessionToken: 'test-session-token' };
    sign('POST', 'https://example.com/invoke', body, {}, input, { now: fixedNow });
    expect(input).toEqual({ ...credential, sessionToken: 'test-session-token' });
  });

  describe('failures', () => {
    it('should throw AuthenticationUnavailableError and leave headers untouched when the secret is missing', () => {
      const warn = vi.fn();
      const logger: Logger = { debug: vi.fn(), info: vi.fn(), warn, error: vi.fn() };
      const headers = { 'Content-Type': 'application/json' };

      let caught: unknown;
      try {
        sign('POST', 'https://example.com/invoke', body, headers, { ...credential, secretAccessKey: '' }, { now: fixedNow, logger });
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(AuthenticationUnavailableError);
      expect(caught).toMatchObject({ missing: ['secretAccessKey'] });
      expect(headers).toEqual({ 'Content-Type': 'application/json' });
      expect(warn).toHaveBeenCalledTimes(1);
      expect(JSON.stringify(warn.mock.calls)).not.toContain('test-secret');
    });

    it('should report both missing keys', () => {
      expect(() => sign('GET', 'https://example.com/', null, {}, { region: 'us-east-1', service: 'execute-api' }))
        .toThrow('Cannot sign request: missing accessKeyId and secretAccessKey');
    });

    it('should throw InvalidRequestTargetError for a relative URL', () => {
      const headers = { 'Content-Type': 'application/json' };
      expect(() => sign('POST', '/invoke', body, headers, credential, { now: fixedNow })).toThrow(InvalidRequestTargetError);
      expect(headers).toEqual({ 'Content-Type': 'application/json' });
    });

    it('should reject header names that differ only in case', () => {
      const headers = { 'X-Trace': 'a', 'x-trace': 'b' };
      expect(() => sign('POST', 'https://example.com/invoke', body, headers, credential, { now: fixedNow })).toThrow(ValidationError);
      expect(headers).toEqual({ 'X-Trace': 'a', 'x-trace': 'b' });
    });
  });
});

describe('createSigningContext', () => {
  it('should use / for an empty path', () => {
    const ctx = createSigningContext('GET', 'https://example.com', null, {}, credential, { now: fixedNow });
    expect(ctx.canonicalRequest.split('\n')[1]).toBe('/');
  });

  it('should keep the raw query string verbatim', () => {
    const ctx = createSigningContext('GET', 'https://example.com/items?b=2&a=1', null, {}, credential, { now: fixedNow });
    expect(ctx.canonicalRequest.split('\n')[2]).toBe('b=2&a=1');
  });

  it('should expose every intermediate value without touching the input headers', () => {
    const headers = { 'Content-Type': 'application/json' };
    const ctx = createSigningContext('POST', 'https://example.com/invoke', body, headers, credential, { now: fixedNow });

    expect(headers).toEqual({ 'Content-Type': 'application/json' });
    expect(ctx.amzDate).toBe('20240101T000000Z');
    expect(ctx.dateStamp).toBe('20240101');
    expect(ctx.credentialScope).toBe('20240101/us-east-1/execute-api/aws4_request');
    expect(ctx.signedHeaders).toBe('content-type;host;x-amz-date');
    expect(ctx.payloadHash).toBe(sha256(body));
    expect(ctx.stringToSign.split('\n')).toEqual([
      'AWS4-HMAC-SHA256',
      '20240101T000000Z',
      '20240101/us-east-1/execute-api/aws4_request',
      sha256(ctx.canonicalRequest),
    ]);
    expect(ctx.authorization.endsWith(`Signature=${ctx.signature}`)).toBe(true);
  });

  it('should leave a blank line between canonical headers and signed headers', () => {
    const ctx = createSigningContext('GET', 'https://example.com/', null, {}, credential, { now: fixedNow });
    expect(ctx.canonicalRequest).toBe(
      `GET\n/\n\nhost:example.com\nx-amz-date:20240101T000000Z\n\nhost;x-amz-date\n${sha256('')}`
    );
  });
});

describe('deriveSigningKey', () => {
  it('should match the key derivation example from the AWS documentation', () => {
    const key = deriveSigningKey('wJalrXUtnFEMI/K7MDENG+bPxRfiCYEXAMPLEKEY', '20120215', 'us-east-1', 'iam');
    expect(key.toString('hex')).toBe('f4780e2d9f65fa895f9c67b32ce1baf0b0d8a43505a000a1a9e090d414db404d');
  });
});

describe('formatAmzDate', () => {
  it('should drop separators and milliseconds', () => {
    expect(formatAmzDate(new Date('2024-03-05T07:08:09.123Z'))).toEqual({
      amzDate: '20240305T070809Z',
      dateStamp: '20240305',
    });
  });
});

describe('hashPayload', () => {
  it('should hash a missing body as empty', () => {
    expect(hashPayload(null)).toBe('e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855');
    expect(hashPayload(undefined)).toBe(hashPayload(''));
  });

  it('should hash bytes and their UTF-8 string the same way', () => {
    expect(hashPayload(new TextEncoder().encode('héllo'))).toBe(hashPayload('héllo'));
  });
});

describe('canonicalizeHeaders', () => {
  it('should lowercase, sort and trim without collapsing inner whitespace', () => {
    expect(canonicalizeHeaders({ 'X-Custom': '  a  b  ', Accept: 'application/json' })).toEqual({
      canonicalHeaders: 'accept:application/json\nx-custom:a  b\n',
      signedHeaders: 'accept;x-custom',
    });
  });
});
