export interface Clock {
  now(): Date;
  /** Unix time in seconds. */
  seconds(): number;
}

export const systemClock: Clock = {
  now: () => new Date(),
  seconds: () => Date.now() / 1000,
};

export function fixedClock(epochSeconds: number): Clock {
  return {
    now: () => new Date(epochSeconds * 1000),
    seconds: () => epochSeconds,
  };
}
