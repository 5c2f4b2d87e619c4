import { elapsed, remaining, type Timestamp } from "./timer";
import type { SignalTimings } from "./timings";

export interface StabilizerState {
  /** Most recent raw counts, oldest first. */
  history: readonly number[];
  confirmedCount: number;
  pendingCount: number;
  pendingSince: Timestamp;
}

export type StabilizerEvent =
  | { type: "pending"; count: number; requiredMs: number }
  | { type: "confirmed"; count: number; previous: number; stableForMs: number };

export interface ObserveResult {
  state: StabilizerState;
  event: StabilizerEvent | null;
}

export const createStabilizerState = (now: Timestamp = 0): StabilizerState => ({
  history: [],
  confirmedCount: 0,
  pendingCount: 0,
  pendingSince: now,
});

const mean = (values: readonly number[]) =>
  values.length === 0 ? 0 : values.reduce((sum, value) => sum + value, 0) / values.length;

/** Nearest integer, with ties going to the even neighbour (0.5 to 0, 2.5 to 2, 7.5 to 8). */
export const roundHalfEven = (value: number): number => {
  const floor = Math.floor(value);
  const fraction = value - floor;
  if (fraction > 0.5) return floor + 1;
  if (fraction < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
};

export const requiredDelayFor = (count: number, timings: SignalTimings): number =>
  count >= timings.highTrafficThreshold ? timings.highConfirmationDelayMs : timings.confirmationDelayMs;

/**
 * A smoothed count is a candidate when it moves away from the confirmed value, or when it sits at or
 * above the high threshold (those are re-evaluated on every sample).
 */
const isCandidate = (smoothed: number, confirmed: number, timings: SignalTimings) =>
  smoothed >= timings.highTrafficThreshold || smoothed !== confirmed;

/**
 * Feeds one raw count through the sliding window. The confirmed count only moves once the same
 * smoothed candidate has been seen for the required delay; a different candidate restarts the wait.
 * `rawCount` must already be validated.
 */
export const observeCount = (
  state: StabilizerState,
  rawCount: number,
  now: Timestamp,
  timings: SignalTimings,
): ObserveResult => {
  const history = [...state.history, rawCount].slice(-Math.max(1, timings.historySize));
  const smoothed = roundHalfEven(mean(history));

  if (!isCandidate(smoothed, state.confirmedCount, timings)) {
    return { state: { ...state, history, pendingCount: state.confirmedCount }, event: null };
  }

  if (smoothed !== state.pendingCount) {
    return {
      state: { ...state, history, pendingCount: smoothed, pendingSince: now },
      event: { type: "pending", count: smoothed, requiredMs: requiredDelayFor(smoothed, timings) },
    };
  }

  const stableForMs = elapsed(state.pendingSince, now);
  if (stableForMs < requiredDelayFor(state.pendingCount, timings)) {
    return { state: { ...state, history }, event: null };
  }

  const confirmed = { ...state, history, confirmedCount: state.pendingCount };
  if (state.pendingCount === state.confirmedCount) {
    return { state: confirmed, event: null };
  }
  return {
    state: confirmed,
    event: { type: "confirmed", count: state.pendingCount, previous: state.confirmedCount, stableForMs },
  };
};

/** Time left before the pending candidate is confirmed, or null when nothing is pending. */
export const confirmationRemaining = (
  state: StabilizerState,
  now: Timestamp,
  timings: SignalTimings,
): number | null => {
  if (state.pendingCount === state.confirmedCount) return null;
  return remaining(state.pendingSince, now, requiredDelayFor(state.pendingCount, timings));
};

