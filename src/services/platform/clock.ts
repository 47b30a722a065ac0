/**
 * Wall-clock abstraction so cache freshness can be tested deterministically.
 */
export interface Clock {
  /** Whole seconds since the Unix epoch. */
  nowSeconds(): number;
}

export const systemClock: Clock = {
  nowSeconds: () => Math.floor(Date.now() / 1000),
};
