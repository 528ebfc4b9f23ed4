import { HeaderInput, Method, ProbeRequest, RequestBody, RequestOptions } from '../types/index.js';

export class HttpRequest implements ProbeRequest {
  public readonly url: string;
  public readonly method: Method;
  public readonly headers: Headers;
  public readonly body: RequestBody | null;
  public readonly signal?: AbortSignal;
  public readonly throwHttpErrors?: boolean;
  public readonly timeout?: number;

  constructor(url: string, options: RequestOptions = {}) {
    this.url = url;
    this.method = options.method || 'GET';
    this.headers = new Headers(options.headers);
    this.body = options.body ?? null;
    this.signal = options.signal;
    this.throwHttpErrors = options.throwHttpErrors !== undefined ? options.throwHttpErrors : true;
    this.timeout = options.timeout;
  }

  private toOptions(): RequestOptions {
    return {
      method: this.method,
      headers: this.headers,
      body: this.body,
      signal: this.signal,
      throwHttpErrors: this.throwHttpErrors,
      timeout: this.timeout,
    };
  }

  withHeader(name: string, value: string): ProbeRequest {
    const newHeaders = new Headers(this.headers);
    newHeaders.set(name, value);
    return new HttpRequest(this.url, { ...this.toOptions(), headers: newHeaders });
  }

  /**
   * Replace the whole header set. Used by signers, whose output must be
   * exactly what goes on the wire.
   */
  withHeaders(headers: HeaderInput): ProbeRequest {
    return new HttpRequest(this.url, { ...this.toOptions(), headers: new Headers(headers) });
  }
}
