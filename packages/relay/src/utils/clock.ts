/**
 * Clock abstraction, injectable for deterministic testing.
 *
 * Production code reads wall time via `systemClock`. Tests either inject a
 * fake clock or rely on vitest fake timers, which also drive `Date.now()`.
 */
export interface Clock {
  readonly now: () => number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};
