import { ProbeResponse, Timings } from '../types/index.js';

export class HttpResponse<T = unknown> implements ProbeResponse<T> {
  public readonly timings?: Timings;
  public readonly raw: Response; // Always a Web Response object
  private readonly requestUrl: string;

  constructor(raw: Response, options: { timings?: Timings; url?: string } = {}) {
    this.raw = raw;
    this.timings = options.timings;
    this.requestUrl = options.url ?? '';
  }

  get status() {
    return this.raw.status;
  }

  get statusText() {
    return this.raw.statusText;
  }

  get headers() {
    return this.raw.headers;
  }

  get ok() {
    return this.raw.ok;
  }

  /**
   * Responses built by the transport have no `raw.url`; fall back to the
   * URL that was requested.
   */
  get url() {
    return this.raw.url || this.requestUrl;
  }

  async json<R = T>(): Promise<R> {
    return (await this.raw.json()) as R;
  }

  async text(): Promise<string> {
    return this.raw.text();
  }

  clone(): ProbeResponse<T> {
    return new HttpResponse<T>(this.raw.clone(), {
      timings: this.timings,
      url: this.requestUrl,
    });
  }
}
