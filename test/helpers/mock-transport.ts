import { HttpResponse } from '../../src/core/response.js';
import type { ProbeRequest, ProbeResponse, Transport } from '../../src/types/index.js';

interface MockResponse {
  status: number;
  body: unknown;
  headers?: Record<string, string>;
  times?: number; // How many times this response can be used
  error?: Error; // If set, throw this error instead of returning a response
}

/**
 * What the transport saw, captured before the response is built
 */
export interface RecordedRequest {
  method: string;
  url: string;
  headers: Record<string, string>;
  body: string | null;
}

export class MockTransport implements Transport {
  private mockResponses: Map<string, MockResponse[]> = new Map();
  private callCounts: Map<string, number> = new Map();
  readonly requests: RecordedRequest[] = [];

  setMockResponse(method: string, url: string, status: number, body: unknown, headers?: Record<string, string>, options?: { times?: number }) {
    const key = `${method}:${url}`;
    const existing = this.mockResponses.get(key) || [];
    existing.push({ status, body, headers, times: options?.times });
    this.mockResponses.set(key, existing);
  }

  setMockError(method: string, url: string, error: Error, options?: { times?: number }) {
    const key = `${method}:${url}`;
    const existing = this.mockResponses.get(key) || [];
    existing.push({ status: 0, body: null, error, times: options?.times });
    this.mockResponses.set(key, existing);
  }

  getCallCount(method: string, url: string): number {
    return this.callCounts.get(`${method}:${url}`) || 0;
  }

  get lastRequest(): RecordedRequest | undefined {
    return this.requests[this.requests.length - 1];
  }

  async dispatch(req: ProbeRequest): Promise<ProbeResponse> {
    const headers: Record<string, string> = {};
    req.headers.forEach((value, key) => {
      headers[key] = value;
    });
    this.requests.push({
      method: req.method,
      url: req.url,
      headers,
      body: typeof req.body === 'string' ? req.body : req.body ? Buffer.from(req.body).toString('utf-8') : null,
    });

    const key = `${req.method}:${req.url}`;
    const count = (this.callCounts.get(key) || 0) + 1;
    this.callCounts.set(key, count);

    const responses = this.mockResponses.get(key);
    if (!responses || responses.length === 0) {
      throw new Error(`No mock response configured for ${key}`);
    }

    // Find the right response based on call count and times
    let mockResponse: MockResponse | undefined;
    let cumulativeTimes = 0;
    for (const response of responses) {
      if (response.times === undefined) {
        mockResponse = response;
        break;
      }
      cumulativeTimes += response.times;
      if (count <= cumulativeTimes) {
        mockResponse = response;
        break;
      }
    }

    if (!mockResponse) {
      throw new Error(`No more mock responses available for ${key} (called ${count} times)`);
    }

    if (mockResponse.error) {
      throw mockResponse.error;
    }

    const bodyString = typeof mockResponse.body === 'string' ? mockResponse.body : JSON.stringify(mockResponse.body);
    const webResponse = new Response(mockResponse.status === 204 ? null : bodyString, {
      status: mockResponse.status,
      headers: new Headers(mockResponse.headers || { 'content-type': 'application/json' }),
    });

    return new HttpResponse(webResponse, { url: req.url });
  }
}
