import type { Direction, LightPair, ModeLabel } from "@signalpair/core";
import { elapsed, remaining, type Timestamp } from "./timer";
import type { SignalTimings } from "./timings";

export type PostYellowOutcome =
  | { kind: "crossGreen" }
  | { kind: "aiGreen" }
  /** `entering` is true only when leaving Normal mode; alternations never re-raise the alert. */
  | { kind: "highTraffic"; direction: Direction; entering: boolean };

export type OperatingMode =
  | { kind: "normal" }
  | { kind: "yellowClearance"; startedAt: Timestamp; target: PostYellowOutcome }
  | { kind: "highTraffic"; activeDirection: Direction; windowStartedAt: Timestamp };

export interface ModeState {
  lights: LightPair;
  mode: OperatingMode;
}

export type TransitionReason =
  | "clear_for_ai"
  | "clear_for_cross"
  | "clear_for_high_traffic"
  | "high_traffic_alternation"
  | "high_traffic_clearing"
  | "ai_green"
  | "cross_green"
  | "high_traffic_entered"
  | "high_traffic_switched"
  | "high_traffic_exited";

export interface LightChange {
  lights: LightPair;
  /** One-shot high-traffic alert; only set on the edge into High-traffic mode. */
  alert: boolean;
  reason: TransitionReason;
}

export interface ModeTickResult {
  state: ModeState;
  change: LightChange | null;
}

export const INITIAL_LIGHTS: LightPair = { colorA: "red", colorB: "green" };

export const createModeState = (): ModeState => ({
  lights: { ...INITIAL_LIGHTS },
  mode: { kind: "normal" },
});

export const opposite = (direction: Direction): Direction => (direction === "A" ? "B" : "A");

export const greenFor = (direction: Direction): LightPair =>
  direction === "A" ? { colorA: "green", colorB: "red" } : { colorA: "red", colorB: "green" };

const yellowFor = (direction: Direction): LightPair =>
  direction === "A" ? { colorA: "yellow", colorB: "red" } : { colorA: "red", colorB: "yellow" };

export const sameLights = (left: LightPair, right: LightPair) =>
  left.colorA === right.colorA && left.colorB === right.colorB;

/** True when both sides are active at once, which must never be reachable. */
export const hasConflict = (lights: LightPair) => lights.colorA !== "red" && lights.colorB !== "red";

export const modeLabel = (mode: OperatingMode): ModeLabel => {
  switch (mode.kind) {
    case "normal":
      return "normal";
    case "yellowClearance":
      return "yellow_clearance";
    case "highTraffic":
      return "high_traffic";
  }
};

const unchanged = (state: ModeState): ModeTickResult => ({ state, change: null });

const beginClearance = (
  side: Direction,
  target: PostYellowOutcome,
  now: Timestamp,
  reason: TransitionReason,
): ModeTickResult => {
  const lights = yellowFor(side);
  return {
    state: { lights, mode: { kind: "yellowClearance", startedAt: now, target } },
    change: { lights, alert: false, reason },
  };
};

const settle = (lights: LightPair, mode: OperatingMode, reason: TransitionReason, alert = false): ModeTickResult => ({
  state: { lights, mode },
  change: { lights, alert, reason },
});

const completeClearance = (target: PostYellowOutcome, now: Timestamp): ModeTickResult => {
  switch (target.kind) {
    case "crossGreen":
      return settle(greenFor("B"), { kind: "normal" }, "cross_green");
    case "aiGreen":
      return settle(greenFor("A"), { kind: "normal" }, "ai_green");
    case "highTraffic":
      return settle(
        greenFor(target.direction),
        { kind: "highTraffic", activeDirection: target.direction, windowStartedAt: now },
        target.entering ? "high_traffic_entered" : "high_traffic_switched",
        target.entering,
      );
  }
};

const tickNormal = (state: ModeState, count: number, now: Timestamp, timings: SignalTimings): ModeTickResult => {
  const aiGreen = state.lights.colorA === "green";

  if (count >= timings.highTrafficThreshold) {
    if (aiGreen) {
      return beginClearance(
        "A",
        { kind: "highTraffic", direction: "B", entering: true },
        now,
        "clear_for_high_traffic",
      );
    }
    // A is already red, so cross traffic can hold the first window without a clearance.
    return settle(
      greenFor("B"),
      { kind: "highTraffic", activeDirection: "B", windowStartedAt: now },
      "high_traffic_entered",
      true,
    );
  }

  if (count === 0) {
    if (aiGreen) return beginClearance("A", { kind: "crossGreen" }, now, "clear_for_cross");
    if (state.lights.colorB !== "green") return settle(greenFor("B"), { kind: "normal" }, "cross_green");
    return unchanged(state);
  }

  if (aiGreen) return unchanged(state);
  if (state.lights.colorB === "green") return beginClearance("B", { kind: "aiGreen" }, now, "clear_for_ai");
  return settle(greenFor("A"), { kind: "normal" }, "ai_green");
};

/**
 * Advances the operating mode by one tick. Pure: the same state, count and instant always produce the
 * same result. Every Green to Red change goes through a yellow clearance of `yellowDurationMs`.
 */
export const tickMode = (
  state: ModeState,
  confirmedCount: number,
  now: Timestamp,
  timings: SignalTimings,
): ModeTickResult => {
  const { mode } = state;
  switch (mode.kind) {
    case "yellowClearance":
      if (elapsed(mode.startedAt, now) < timings.yellowDurationMs) return unchanged(state);
      return completeClearance(mode.target, now);

    case "highTraffic":
      if (confirmedCount === 0) {
        if (mode.activeDirection === "A") {
          return beginClearance("A", { kind: "crossGreen" }, now, "high_traffic_clearing");
        }
        return settle(greenFor("B"), { kind: "normal" }, "high_traffic_exited");
      }
      // Below the threshold but not empty still alternates; only a zero count leaves the regime.
      if (elapsed(mode.windowStartedAt, now) < timings.highTrafficWindowMs) return unchanged(state);
      return beginClearance(
        mode.activeDirection,
        { kind: "highTraffic", direction: opposite(mode.activeDirection), entering: false },
        now,
        "high_traffic_alternation",
      );

    case "normal":
      return tickNormal(state, confirmedCount, now, timings);
  }
};

export const yellowRemaining = (mode: OperatingMode, now: Timestamp, timings: SignalTimings): number | null =>
  mode.kind === "yellowClearance" ? remaining(mode.startedAt, now, timings.yellowDurationMs) : null;

export const highTrafficRemaining = (mode: OperatingMode, now: Timestamp, timings: SignalTimings): number | null =>
  mode.kind === "highTraffic" ? remaining(mode.windowStartedAt, now, timings.highTrafficWindowMs) : null;
