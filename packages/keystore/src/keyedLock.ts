/**
 * Serializes async tasks per key within one process. Queues are chained
 * promises; a key's entry is dropped once its last task settles.
 */
export type KeyedLock = {
  runExclusive: <T>(key: string, task: () => Promise<T>) => Promise<T>;
  pendingKeys: () => number;
};

export const createKeyedLock = (): KeyedLock => {
  const tails = new Map<string, Promise<void>>();

  return {
    runExclusive: async <T>(key: string, task: () => Promise<T>): Promise<T> => {
      const previous = tails.get(key) ?? Promise.resolve();
      let release: () => void = () => undefined;
      const current = new Promise<void>(resolve => {
        release = resolve;
      });
      const tail = previous.then(() => current);
      tails.set(key, tail);

      await previous;
      try {
        return await task();
      } finally {
        release();
        if (tails.get(key) === tail) {
          tails.delete(key);
        }
      }
    },
    pendingKeys: () => tails.size
  };
};
