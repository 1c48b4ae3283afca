/**
 * 외부에서 resolve할 수 있는 Promise
 * 락 점유 구간을 테스트에서 직접 제어할 때 사용한다.
 */
export interface Deferred<T = void> {
  promise: Promise<T>;
  resolve: (value: T) => void;
}

export function createDeferred<T = void>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

/**
 * 대기 중인 마이크로태스크와 타이머 콜백을 한 차례 흘려보낸다.
 */
export function flushAsync(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
