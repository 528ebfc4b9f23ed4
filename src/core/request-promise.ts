import type { ZodType, ZodTypeDef } from 'zod';
import { ProbeResponse } from '../types/index.js';

export class RequestPromise<T = unknown> implements Promise<ProbeResponse<T>> {
  private promise: Promise<ProbeResponse<T>>;
  private abortController?: AbortController;

  constructor(promise: Promise<ProbeResponse<T>>, abortController?: AbortController) {
    this.promise = promise;
    this.abortController = abortController;
  }

  get [Symbol.toStringTag]() {
    return 'RequestPromise';
  }

  then<TResult1 = ProbeResponse<T>, TResult2 = never>(
    onfulfilled?: ((value: ProbeResponse<T>) => TResult1 | PromiseLike<TResult1>) | null,
    onrejected?: ((reason: unknown) => TResult2 | PromiseLike<TResult2>) | null
  ): Promise<TResult1 | TResult2> {
    return this.promise.then(onfulfilled, onrejected);
  }

  catch<TResult = never>(
    onrejected?: ((reason: unknown) => TResult | PromiseLike<TResult>) | null
  ): Promise<ProbeResponse<T> | TResult> {
    return this.promise.catch(onrejected);
  }

  finally(onfinally?: (() => void) | null): Promise<ProbeResponse<T>> {
    return this.promise.finally(onfinally);
  }

  cancel(): void {
    if (this.abortController) {
      this.abortController.abort();
    }
  }

  async json<R = T>(): Promise<R> {
    const response = await this.promise;
    return response.json<R>();
  }

  async text(): Promise<string> {
    const response = await this.promise;
    return response.text();
  }

  /**
   * Parse the JSON body with a zod schema; throws ZodError on mismatch
   */
  async parse<R>(schema: ZodType<R, ZodTypeDef, unknown>): Promise<R> {
    const data = await this.json<unknown>();
    return schema.parse(data);
  }
}
