/**
 * Bounds how many tasks run at once. A task still waiting for a slot when its
 * signal aborts is dropped from the queue and rejects with the signal's reason.
 *
 *   const limit = createLimiter(3);
 *   await Promise.all(ids.map((id) => limit(() => work(id), signal)));
 */
export const createLimiter = (concurrency: number) => {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new Error("concurrency must be an integer >= 1");
  }

  let active = 0;
  const queue: Array<() => void> = [];

  const next = () => {
    if (active >= concurrency) return;
    const start = queue.shift();
    if (!start) return;
    active += 1;
    start();
  };

  return <T>(task: () => Promise<T>, signal?: AbortSignal): Promise<T> =>
    new Promise<T>((resolve, reject) => {
      if (signal?.aborted) {
        reject(signal.reason);
        return;
      }

      const onAbort = () => {
        const index = queue.indexOf(start);
        if (index === -1) return;
        queue.splice(index, 1);
        reject(signal?.reason);
      };

      const start = () => {
        signal?.removeEventListener("abort", onAbort);
        void Promise.resolve()
          .then(task)
          .then(resolve, reject)
          .finally(() => {
            active -= 1;
            next();
          });
      };

      signal?.addEventListener("abort", onAbort, { once: true });
      queue.push(start);
      next();
    });
};
