export type RedisSetOptions = {
  NX?: boolean;
};

export type RedisClient = {
  get: (key: string) => Promise<string | null> | string | null;
  set: (key: string, value: string, options?: RedisSetOptions) => Promise<string | null> | string | null;
};

export type RedisEvalClient = RedisClient & {
  eval: (script: string, keys: string[], args: Array<string | number>) => Promise<unknown>;
};
