export type Limiter = <T>(task: () => Promise<T>) => Promise<T>;

/**
 * Promise-based concurrency limiter.
 *   const limit = createLimiter(4);
 *   await Promise.all(paths.map((p) => limit(() => stat(p))));
 */
export const createLimiter = (concurrency: number): Limiter => {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new Error("concurrency must be an integer >= 1");
  }

  let active = 0;
  const queue: Array<() => void> = [];

  const next = () => {
    if (active >= concurrency) return;
    const fn = queue.shift();
    if (!fn) return;
    active += 1;
    fn();
  };

  return <T>(task: () => Promise<T>): Promise<T> =>
    new Promise<T>((resolve, reject) => {
      queue.push(async () => {
        try {
          resolve(await task());
        } catch (err) {
          reject(err);
        } finally {
          active -= 1;
          next();
        }
      });
      next();
    });
};

/**
 * Runs tasks one at a time, in submission order. Used as the single mutation point for shared state.
 */
export const createSerialSection = (): Limiter => createLimiter(1);
