import { describe, it, expect, beforeAll, afterAll, beforeEach } from 'vitest';
import { createHash, createHmac } from 'node:crypto';
import { createClient } from '../../src/core/client.js';
import { UndiciTransport } from '../../src/transport/undici.js';
import { HttpRequest } from '../../src/core/request.js';
import { NetworkError, TimeoutError } from '../../src/core/errors.js';
import { authPlugin } from '../../src/plugins/auth/index.js';
import { MockHttpServer } from '../../src/testing/index.js';

describe('UndiciTransport', () => {
  let server: MockHttpServer;
  const transport = new UndiciTransport();

  beforeAll(async () => {
    server = await MockHttpServer.create();
  });

  afterAll(async () => {
    await server.stop();
  });

  beforeEach(() => {
    server.reset();
  });

  it('should send method, body and headers exactly as given', async () => {
    server.post('/echo', { status: 200, body: { ok: true } });

    const res = await transport.dispatch(new HttpRequest(`${server.url}/echo?a=1`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', 'X-Custom-Header': 'value' },
      body: '{"query":"hi"}',
    }));

    expect(res.status).toBe(200);
    expect(res.statusText).toBe('OK');
    expect(await res.json()).toEqual({ ok: true });
    expect(server.requests).toHaveLength(1);
    expect(server.requests[0]).toMatchObject({
      method: 'POST',
      path: '/echo',
      query: 'a=1',
      rawBody: '{"query":"hi"}',
    });
    expect(server.requests[0].headers['content-type']).toBe('application/json');
    expect(server.requests[0].headers['x-custom-header']).toBe('value');
  });

  it('should buffer the body so it can be read after cloning', async () => {
    server.get('/text', { status: 200, body: 'Hello World', headers: { 'Content-Type': 'text/plain' } });

    const res = await transport.dispatch(new HttpRequest(`${server.url}/text`));
    const copy = res.clone();

    expect(await res.text()).toBe('Hello World');
    expect(await copy.text()).toBe('Hello World');
    expect(res.headers.get('content-type')).toBe('text/plain');
    expect(res.url).toBe(`${server.url}/text`);
    expect(res.timings?.total).toBeGreaterThanOrEqual(0);
  });

  it('should accept a 204 with no body', async () => {
    server.get('/empty', { status: 204 });

    const res = await transport.dispatch(new HttpRequest(`${server.url}/empty`));
    expect(res.status).toBe(204);
    expect(await res.text()).toBe('');
  });

  it('should hand non-2xx responses back without throwing', async () => {
    const res = await transport.dispatch(new HttpRequest(`${server.url}/nowhere`));
    expect(res.status).toBe(404);
    expect(res.ok).toBe(false);
    expect(await res.json()).toEqual({ message: 'Not Found' });
  });

  it('should map a dropped connection to NetworkError', async () => {
    server.get('/drop', { drop: true });

    await expect(transport.dispatch(new HttpRequest(`${server.url}/drop`))).rejects.toBeInstanceOf(NetworkError);
  });

  it('should map a slow response to TimeoutError', async () => {
    server.get('/slow', { status: 200, body: 'late', delay: 300 });

    await expect(transport.dispatch(new HttpRequest(`${server.url}/slow`, { timeout: 50 })))
      .rejects.toBeInstanceOf(TimeoutError);
  });

  it('should map a caller abort to NetworkError', async () => {
    server.get('/slow', { status: 200, body: 'late', delay: 300 });
    const controller = new AbortController();
    controller.abort();

    const error = await transport.dispatch(new HttpRequest(`${server.url}/slow`, { signal: controller.signal }))
      .catch((e: unknown) => e);
    expect(error).toBeInstanceOf(NetworkError);
    expect(error).toMatchObject({ code: 'ABORT_ERR' });
  });

  it('should deliver a signed request whose headers verify on the server side', async () => {
    server.post('/prod/invoke', { status: 200, body: { response: 'SageMaker is a managed ML service.' } });
    const now = () => new Date('2024-01-01T00:00:00Z');
    const credentials = { accessKeyId: 'AKIDEXAMPLE', secretAccessKey: 'test-secret' };

    const client = createClient({
      baseUrl: `${server.url}/prod`,
      transport,
      plugins: [authPlugin('aws-iam', { region: 'us-east-1', service: 'execute-api', credentials, now })],
    });

    const data = await client.post('/invoke', { query: 'hi' }).json<{ response: string }>();
    expect(data.response).toBe('SageMaker is a managed ML service.');

    const received = server.requests[0];
    const header = (name: string): string => {
      const value = received.headers[name];
      return typeof value === 'string' ? value : '';
    };

    const auth = header('authorization').match(
      /^AWS4-HMAC-SHA256 Credential=([^/]+)\/(\S+), SignedHeaders=(\S+), Signature=([0-9a-f]{64})$/
    );
    expect(auth).not.toBeNull();
    const [, accessKeyId, scope, signedHeaders, signature] = auth ?? [];
    expect(accessKeyId).toBe('AKIDEXAMPLE');
    expect(scope).toBe('20240101/us-east-1/execute-api/aws4_request');
    expect(signedHeaders).toBe('content-type;host;user-agent;x-amz-date');

    // Rebuild the canonical request from what arrived on the wire
    const canonicalHeaders = signedHeaders
      .split(';')
      .map((name) => `${name}:${header(name).trim()}\n`)
      .join('');
    const canonicalRequest = [
      received.method,
      received.path,
      received.query,
      canonicalHeaders,
      signedHeaders,
      createHash('sha256').update(received.rawBody).digest('hex'),
    ].join('\n');
    const stringToSign = [
      'AWS4-HMAC-SHA256',
      header('x-amz-date'),
      scope,
      createHash('sha256').update(canonicalRequest).digest('hex'),
    ].join('\n');
    const signingKey = scope
      .split('/')
      .reduce<Buffer>((key, part) => createHmac('sha256', key).update(part).digest(), Buffer.from('AWS4test-secret'));

    expect(received.rawBody).toBe('{"query":"hi"}');
    expect(header('host')).toBe(`127.0.0.1:${server.port}`);
    expect(header('x-amz-date')).toBe('20240101T000000Z');
    expect(createHmac('sha256', signingKey).update(stringToSign).digest('hex')).toBe(signature);
  });
});
