// src/utils/response-future.ts

/**
 * Single-assignment result slot. The first `set` wins; later calls are ignored.
 */
export class ResponseFuture<T> {
  private _settled: boolean = false;
  private readonly _resolve: (value: T) => void;
  private readonly _reject: (error: unknown) => void;
  private readonly _promise: Promise<T>;

  constructor() {
    let resolveFn: (value: T) => void = () => undefined;
    let rejectFn: (error: unknown) => void = () => undefined;
    // executor runs synchronously, so both are bound before the constructor returns
    this._promise = new Promise<T>((resolve, reject) => {
      resolveFn = resolve;
      rejectFn = reject;
    });
    this._resolve = resolveFn;
    this._reject = rejectFn;
  }

  get settled(): boolean {
    return this._settled;
  }

  /**
   * Fulfils the future. Returns false if it was already settled.
   */
  set(value: T): boolean {
    if (this._settled) return false;
    this._settled = true;
    this._resolve(value);
    return true;
  }

  /**
   * Rejects the future. Returns false if it was already settled.
   */
  fail(error: unknown): boolean {
    if (this._settled) return false;
    this._settled = true;
    this._reject(error);
    return true;
  }

  get(): Promise<T> {
    return this._promise;
  }
}
