/** A value published at most once; later publishes are ignored. */
export interface OneShot<T> {
  readonly promise: Promise<T>;
  readonly published: boolean;
  publish(value: T): boolean;
}

export function createOneShot<T>(): OneShot<T> {
  let resolve: (value: T) => void = () => undefined;
  let published = false;
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return {
    promise,
    get published() {
      return published;
    },
    publish(value: T) {
      if (published) return false;
      published = true;
      resolve(value);
      return true;
    },
  };
}
