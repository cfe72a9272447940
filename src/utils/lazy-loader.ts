// Deferred imports keep `dscribe --help` fast and keep the model runtime
// out of the process until the local backend is actually used.

export type LazyModule<T> = () => Promise<T>;

/**
 * Wrap a loader so it runs at most once per process. The in-flight promise is
 * cached, so concurrent callers share one load; a rejected load is evicted.
 */
export const createLazyModule = <T>(loader: () => Promise<T>): LazyModule<T> => {
  let pending: Promise<T> | undefined;

  return (): Promise<T> => {
    if (!pending) {
      pending = loader().catch((error: unknown) => {
        pending = undefined;
        throw error;
      });
    }
    return pending;
  };
};

export const lazyModules = {
  transformers: createLazyModule(() => import("@huggingface/transformers")),
  diffscribe: createLazyModule(() => import("../core/diffscribe.js")),
  gradientString: createLazyModule(() => import("gradient-string")),
};
