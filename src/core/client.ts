import {
  AfterResponseHook,
  BeforeRequestHook,
  ClientOptions,
  ErrorHook,
  HeaderInput,
  Hooks,
  Middleware,
  ProbeRequest,
  ProbeResponse,
  RequestBody,
  RequestOptions,
  Transport,
} from '../types/index.js';
import { HttpRequest } from './request.js';
import { RequestPromise } from './request-promise.js';
import { ConfigurationError, HttpError } from './errors.js';
import { UndiciTransport } from '../transport/undici.js';
import { DEFAULT_TIMEOUT_MS, USER_AGENT } from '../constants.js';

type Handler = (req: ProbeRequest) => Promise<ProbeResponse>;

/**
 * JSON-serializable body accepted by {@link Client.post}
 */
export type PostBody = RequestBody | Record<string, unknown> | unknown[] | null;

export class Client {
  private baseUrl: string;
  private middlewares: Middleware[];
  private hooks: Required<Hooks>;
  private transport: Transport;
  private defaultHeaders: Headers;
  private defaultTimeout: number;
  private throwHttpErrors: boolean;
  private handler: Handler;

  constructor(options: ClientOptions = {}) {
    this.baseUrl = options.baseUrl || '';
    this.middlewares = [...(options.middlewares || [])];
    this.hooks = {
      beforeRequest: options.hooks?.beforeRequest || [],
      afterResponse: options.hooks?.afterResponse || [],
      onError: options.hooks?.onError || [],
    };

    this.defaultHeaders = new Headers({ 'User-Agent': USER_AGENT });
    new Headers(options.headers).forEach((value, key) => this.defaultHeaders.set(key, value));

    this.defaultTimeout = options.timeout ?? DEFAULT_TIMEOUT_MS;
    this.throwHttpErrors = options.throwHttpErrors ?? true;
    this.transport = options.transport ?? new UndiciTransport();

    if (options.plugins) {
      options.plugins.forEach((plugin) => plugin(this));
    }

    this.handler = this.composeMiddlewares();
  }

  private composeMiddlewares(): Handler {
    // Error mapping sits closest to the transport so hooks see HttpError
    const chain: Middleware[] = [...this.middlewares, this.httpErrorMiddleware];

    if (this.hooks.beforeRequest.length || this.hooks.afterResponse.length || this.hooks.onError.length) {
      chain.unshift(this.hooksMiddleware);
    }

    const transportDispatch: Handler = (req) => this.transport.dispatch(req);

    // Last middleware calls transport, previous middleware calls last, etc.
    return chain.reduceRight<Handler>((next, middleware) => {
      return (req) => middleware(req, next);
    }, transportDispatch);
  }

  private hooksMiddleware: Middleware = async (req, next) => {
    let modifiedReq = req;

    for (const hook of this.hooks.beforeRequest) {
      const result = await hook(modifiedReq);
      if (result) {
        modifiedReq = result;
      }
    }

    try {
      let response = await next(modifiedReq);

      for (const hook of this.hooks.afterResponse) {
        const result = await hook(modifiedReq, response);
        if (result) {
          response = result;
        }
      }

      return response;
    } catch (error) {
      const failure = error instanceof Error ? error : new Error(String(error));
      for (const hook of this.hooks.onError) {
        const result = await hook(failure, modifiedReq);
        if (result) {
          // Hook provided a fallback response
          return result;
        }
      }
      throw error;
    }
  };

  private httpErrorMiddleware: Middleware = async (req, next) => {
    const response = await next(req);
    if (req.throwHttpErrors !== false && !response.ok) {
      throw new HttpError(response, req);
    }
    return response;
  };

  public use(middleware: Middleware) {
    this.middlewares.push(middleware);
    this.handler = this.composeMiddlewares();
    return this;
  }

  /**
   * Add a hook that runs before each request.
   * Returning a request replaces the one sent.
   */
  public beforeRequest(hook: BeforeRequestHook) {
    this.hooks.beforeRequest.push(hook);
    this.handler = this.composeMiddlewares();
    return this;
  }

  public afterResponse(hook: AfterResponseHook) {
    this.hooks.afterResponse.push(hook);
    this.handler = this.composeMiddlewares();
    return this;
  }

  /**
   * Add a hook that runs when an error occurs.
   * Hook can return a fallback response or void to rethrow.
   */
  public onError(hook: ErrorHook) {
    this.hooks.onError.push(hook);
    this.handler = this.composeMiddlewares();
    return this;
  }

  private buildUrl(path: string): string {
    if (path.startsWith('http://') || path.startsWith('https://')) {
      return path;
    }
    if (!this.baseUrl) {
      throw new ConfigurationError(`Relative path "${path}" provided without a baseUrl`, { configKey: 'baseUrl' });
    }
    // Append rather than resolve: a base with a stage path (/prod) must keep it
    const base = this.baseUrl.endsWith('/') ? this.baseUrl.slice(0, -1) : this.baseUrl;
    if (!path) {
      return base;
    }
    return `${base}${path.startsWith('/') ? '' : '/'}${path}`;
  }

  private mergeHeaders(headers?: HeaderInput): Headers {
    const merged = new Headers(this.defaultHeaders);
    if (headers) {
      new Headers(headers).forEach((value, key) => merged.set(key, value));
    }
    return merged;
  }

  request<T = unknown>(path: string, options: RequestOptions = {}): RequestPromise<T> {
    const controller = new AbortController();
    const timeout = options.timeout ?? this.defaultTimeout;
    let externalAbortCleanup: (() => void) | undefined;

    if (options.signal) {
      const externalSignal = options.signal;
      const abortHandler = () => controller.abort(externalSignal.reason);
      if (externalSignal.aborted) {
        abortHandler();
      } else {
        externalSignal.addEventListener('abort', abortHandler, { once: true });
        externalAbortCleanup = () => externalSignal.removeEventListener('abort', abortHandler);
      }
    }

    const dispatch = async (): Promise<ProbeResponse<T>> => {
      const req = new HttpRequest(this.buildUrl(path), {
        ...options,
        headers: this.mergeHeaders(options.headers),
        signal: controller.signal,
        throwHttpErrors: options.throwHttpErrors ?? this.throwHttpErrors,
        timeout,
      });
      try {
        const response: ProbeResponse<T> = await this.handler(req);
        return response;
      } finally {
        externalAbortCleanup?.();
      }
    };

    return new RequestPromise<T>(dispatch(), controller);
  }

  get<T = unknown>(path: string, options: Omit<RequestOptions, 'method'> = {}) {
    return this.request<T>(path, { ...options, method: 'GET' });
  }

  /**
   * Objects and arrays are sent as JSON; Content-Type defaults to
   * application/json for them.
   */
  post<T = unknown>(path: string, body?: PostBody, options: Omit<RequestOptions, 'method' | 'body'> = {}) {
    if (body === undefined || body === null || typeof body === 'string' || body instanceof Uint8Array) {
      return this.request<T>(path, { ...options, method: 'POST', body: body ?? null });
    }

    const headers = new Headers(options.headers);
    if (!headers.has('Content-Type')) {
      headers.set('Content-Type', 'application/json');
    }
    return this.request<T>(path, { ...options, headers, method: 'POST', body: JSON.stringify(body) });
  }
}

export function createClient(options: ClientOptions = {}) {
  return new Client(options);
}
