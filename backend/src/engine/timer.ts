/** Milliseconds on a monotonic scale. */
export type Timestamp = number;
export type Duration = number;

export interface Clock {
  now: () => Timestamp;
}

export const monotonicClock: Clock = {
  now: () => performance.now(),
};

export const isClockRegression = (since: Timestamp, now: Timestamp): boolean => now < since;

/** Jittery clocks can report `now` before `since`; that reads as zero elapsed time. */
export const elapsed = (since: Timestamp, now: Timestamp): Duration => Math.max(0, now - since);

export const remaining = (since: Timestamp, now: Timestamp, duration: Duration): Duration =>
  Math.max(0, duration - elapsed(since, now));

export interface ManualClock extends Clock {
  advance: (ms: Duration) => Timestamp;
  set: (at: Timestamp) => Timestamp;
}

export const createManualClock = (start: Timestamp = 0): ManualClock => {
  let current = start;
  return {
    now: () => current,
    advance: (ms) => {
      current += ms;
      return current;
    },
    set: (at) => {
      current = at;
      return current;
    },
  };
};
