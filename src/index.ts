// Core
export { Client, createClient, type PostBody } from './core/client.js';
export { HttpRequest } from './core/request.js';
export { HttpResponse } from './core/response.js';
export { RequestPromise } from './core/request-promise.js';
export * from './core/errors.js';

// Transport
export { UndiciTransport, type UndiciTransportOptions } from './transport/undici.js';

// Signing
export * from './signing/sigv4.js';
export type {
  HeaderMap,
  SigningCredential,
  SigningOptions,
  SigningTimestamp,
  CanonicalHeaders,
  SigningContext,
} from './signing/types.js';

// Credentials
export * from './credentials/index.js';

// Plugins
export * from './plugins/auth/index.js';
export * from './plugins/logger.js';

// Probe and config
export * from './probe/index.js';
export * from './config.js';
export * from './constants.js';

// Types
export type {
  Method,
  RequestBody,
  HeaderInput,
  RequestOptions,
  ProbeRequest,
  Timings,
  ProbeResponse,
  NextFunction,
  Middleware,
  Transport,
  BeforeRequestHook,
  AfterResponseHook,
  ErrorHook,
  Hooks,
  PluginHost,
  Plugin,
  ClientOptions,
} from './types/index.js';
export * from './types/logger.js';
