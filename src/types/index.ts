export type Method =
  | 'GET'
  | 'POST'
  | 'PUT'
  | 'DELETE'
  | 'PATCH'
  | 'HEAD'
  | 'OPTIONS';

/**
 * Body types the client can send and the signer can hash.
 * Streams are not supported: SigV4 needs the full payload up front.
 */
export type RequestBody = string | Uint8Array;

export type HeaderInput = Headers | Record<string, string> | Array<[string, string]>;

export interface RequestOptions {
  method?: Method;
  headers?: HeaderInput;
  body?: RequestBody | null;
  signal?: AbortSignal;
  throwHttpErrors?: boolean; // Default true
  timeout?: number; // Timeout in milliseconds
}

export interface ProbeRequest {
  url: string;
  method: Method;
  headers: Headers;
  body: RequestBody | null;
  signal?: AbortSignal;
  throwHttpErrors?: boolean;
  timeout?: number;

  // Helpers for immutability
  withHeader(name: string, value: string): ProbeRequest;
  withHeaders(headers: HeaderInput): ProbeRequest;
}

export interface Timings {
  firstByte?: number; // TTFB
  total?: number;
}

export interface ProbeResponse<T = unknown> {
  status: number;
  statusText: string;
  headers: Headers;
  ok: boolean;
  url: string;
  timings?: Timings;

  json<R = T>(): Promise<R>;
  text(): Promise<string>;

  clone(): ProbeResponse<T>;
  raw: Response;
}

export type NextFunction = (req: ProbeRequest) => Promise<ProbeResponse>;
export type Middleware = (req: ProbeRequest, next: NextFunction) => Promise<ProbeResponse>;

/**
 * Anything that can put a request on the wire.
 * The default is {@link UndiciTransport}; tests swap in an in-process fake.
 */
export interface Transport {
  dispatch(req: ProbeRequest): Promise<ProbeResponse>;
}

export type BeforeRequestHook = (req: ProbeRequest) => ProbeRequest | void | Promise<ProbeRequest | void>;
export type AfterResponseHook = (req: ProbeRequest, res: ProbeResponse) => ProbeResponse | void | Promise<ProbeResponse | void>;
export type ErrorHook = (error: Error, req: ProbeRequest) => ProbeResponse | void | Promise<ProbeResponse | void>;

export interface Hooks {
  beforeRequest?: BeforeRequestHook[];
  afterResponse?: AfterResponseHook[];
  onError?: ErrorHook[];
}

/**
 * Surface a plugin may touch when it is installed.
 */
export interface PluginHost {
  use(middleware: Middleware): PluginHost;
  beforeRequest(hook: BeforeRequestHook): PluginHost;
  afterResponse(hook: AfterResponseHook): PluginHost;
  onError(hook: ErrorHook): PluginHost;
}

export type Plugin = (client: PluginHost) => void;

export interface ClientOptions {
  baseUrl?: string;
  headers?: HeaderInput;
  middlewares?: Middleware[];
  hooks?: Hooks;
  plugins?: Plugin[];
  transport?: Transport;
  /**
   * Default timeout applied when a request does not set its own
   * @default 30000
   */
  timeout?: number;
  /**
   * Throw {@link HttpError} on non-2xx responses
   * @default true
   */
  throwHttpErrors?: boolean;
}
