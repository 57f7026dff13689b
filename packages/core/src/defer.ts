/**
 * Promise with its settle functions exposed, used as a reply slot for calls.
 */
export class Deferred<T> {
  readonly promise: Promise<T>;
  resolve: (value: T | PromiseLike<T>) => void = () => {};
  reject: (err: unknown) => void = () => {};

  constructor() {
    this.promise = new Promise<T>((resolve, reject) => {
      this.resolve = resolve;
      this.reject = reject;
    });
  }
}

export function defer<T = void>(): Deferred<T> {
  return new Deferred<T>();
}
