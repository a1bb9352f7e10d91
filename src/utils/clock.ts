/** Milliseconds since the epoch; injectable so time-based logic can be tested. */
export interface Clock {
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};
