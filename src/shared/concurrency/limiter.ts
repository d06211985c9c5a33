export type Limiter = {
  <T>(task: () => Promise<T>): Promise<T>;
  activeCount: () => number;
  pendingCount: () => number;
};

/**
 * Runs at most `concurrency` tasks at a time, in submission order.
 *   const limit = createLimiter(2);
 *   await Promise.all(partitions.map((p) => limit(() => pollOnce(p))));
 */
export const createLimiter = (concurrency: number): Limiter => {
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

  const limit = <T>(task: () => Promise<T>): Promise<T> =>
    new Promise<T>((resolve, reject) => {
      queue.push(() => {
        void Promise.resolve()
          .then(task)
          .then(resolve, reject)
          .finally(() => {
            active -= 1;
            next();
          });
      });
      next();
    });

  return Object.assign(limit, {
    activeCount: () => active,
    pendingCount: () => queue.length
  });
};
