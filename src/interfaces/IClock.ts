export interface IClock {
  /** Current time in epoch seconds. */
  now(): number;
}

export const systemClock: IClock = {
  now: () => Date.now() / 1000,
};
