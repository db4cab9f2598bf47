type BackoffSignalKind = 'rate-limited' | 'not-indexed';

type BackoffSignal = {
  kind: BackoffSignalKind;
  serverWaitSeconds: number;
  waitMs: number;
};

type BackoffConfig = {
  rateLimitMultiplier: number;
  defaultRateLimitSeconds: number;
  defaultNotIndexedSeconds: number;
};

type Sleeper = (ms: number, signal: AbortSignal) => Promise<void>;

export type { BackoffSignalKind, BackoffSignal, BackoffConfig, Sleeper };
