import test from "node:test";
import assert from "node:assert/strict";
import type { LightColor, LightPair } from "@signalpair/core";
import {
  createModeState,
  hasConflict,
  tickMode,
  type ModeState,
} from "../engine/modeMachine";
import { DEFAULT_TIMINGS } from "../engine/timings";

const RED_GREEN: LightPair = { colorA: "red", colorB: "green" };
const GREEN_RED: LightPair = { colorA: "green", colorB: "red" };

const aiGreenState = (): ModeState => ({ lights: { ...GREEN_RED }, mode: { kind: "normal" } });

const highTrafficState = (activeDirection: "A" | "B", windowStartedAt: number): ModeState => ({
  lights: activeDirection === "A" ? { ...GREEN_RED } : { ...RED_GREEN },
  mode: { kind: "highTraffic", activeDirection, windowStartedAt },
});

test("normal mode with no vehicles keeps cross traffic green", () => {
  const result = tickMode(createModeState(), 0, 1_000, DEFAULT_TIMINGS);
  assert.equal(result.change, null);
  assert.deepEqual(result.state.lights, RED_GREEN);
});

test("vehicles on A clear cross traffic through yellow before A turns green", () => {
  const start = tickMode(createModeState(), 3, 10_000, DEFAULT_TIMINGS);
  assert.deepEqual(start.change, {
    lights: { colorA: "red", colorB: "yellow" },
    alert: false,
    reason: "clear_for_ai",
  });
  assert.deepEqual(start.state.mode, { kind: "yellowClearance", startedAt: 10_000, target: { kind: "aiGreen" } });

  assert.equal(tickMode(start.state, 3, 11_999, DEFAULT_TIMINGS).change, null);

  const done = tickMode(start.state, 3, 12_000, DEFAULT_TIMINGS);
  assert.deepEqual(done.change, { lights: GREEN_RED, alert: false, reason: "ai_green" });
  assert.deepEqual(done.state.mode, { kind: "normal" });
});

test("A keeps green while vehicles remain below the threshold", () => {
  assert.equal(tickMode(aiGreenState(), 5, 0, DEFAULT_TIMINGS).change, null);
});

test("an empty approach yellows A and hands green back to cross traffic", () => {
  const start = tickMode(aiGreenState(), 0, 0, DEFAULT_TIMINGS);
  assert.deepEqual(start.state.lights, { colorA: "yellow", colorB: "red" });
  assert.equal(start.change?.reason, "clear_for_cross");

  const done = tickMode(start.state, 0, 2_000, DEFAULT_TIMINGS);
  assert.deepEqual(done.state.lights, RED_GREEN);
  assert.equal(done.change?.reason, "cross_green");
});

test("the clearance target is fixed when yellow begins", () => {
  const start = tickMode(createModeState(), 4, 0, DEFAULT_TIMINGS);
  const done = tickMode(start.state, 0, 2_000, DEFAULT_TIMINGS);
  assert.deepEqual(done.state.lights, GREEN_RED);
});

test("high traffic with A already red enters the regime at once and raises the alert", () => {
  const result = tickMode(createModeState(), 9, 5_000, DEFAULT_TIMINGS);
  assert.deepEqual(result.change, { lights: RED_GREEN, alert: true, reason: "high_traffic_entered" });
  assert.deepEqual(result.state.mode, { kind: "highTraffic", activeDirection: "B", windowStartedAt: 5_000 });
});

test("high traffic with A green yellows A first and alerts on completion", () => {
  const start = tickMode(aiGreenState(), 8, 1_000, DEFAULT_TIMINGS);
  assert.deepEqual(start.change, {
    lights: { colorA: "yellow", colorB: "red" },
    alert: false,
    reason: "clear_for_high_traffic",
  });

  const done = tickMode(start.state, 8, 3_000, DEFAULT_TIMINGS);
  assert.deepEqual(done.change, { lights: RED_GREEN, alert: true, reason: "high_traffic_entered" });
  assert.deepEqual(done.state.mode, { kind: "highTraffic", activeDirection: "B", windowStartedAt: 3_000 });
});

test("high traffic alternates after the window even below the threshold, without a new alert", () => {
  const state = highTrafficState("B", 0);
  assert.equal(tickMode(state, 5, 29_999, DEFAULT_TIMINGS).change, null);

  const start = tickMode(state, 5, 30_000, DEFAULT_TIMINGS);
  assert.deepEqual(start.change, {
    lights: { colorA: "red", colorB: "yellow" },
    alert: false,
    reason: "high_traffic_alternation",
  });

  const done = tickMode(start.state, 5, 32_000, DEFAULT_TIMINGS);
  assert.deepEqual(done.change, { lights: GREEN_RED, alert: false, reason: "high_traffic_switched" });
  assert.deepEqual(done.state.mode, { kind: "highTraffic", activeDirection: "A", windowStartedAt: 32_000 });
});

test("the alternation window is re-armed only when the clearance completes", () => {
  const start = tickMode(highTrafficState("A", 0), 12, 30_500, DEFAULT_TIMINGS);
  const done = tickMode(start.state, 12, 33_000, DEFAULT_TIMINGS);
  assert.deepEqual(done.state.mode, { kind: "highTraffic", activeDirection: "B", windowStartedAt: 33_000 });
  assert.equal(tickMode(done.state, 12, 62_999, DEFAULT_TIMINGS).change, null);
});

test("a zero count exits high traffic with cross traffic green, whatever the window", () => {
  const result = tickMode(highTrafficState("B", 0), 0, 4_000, DEFAULT_TIMINGS);
  assert.deepEqual(result.change, { lights: RED_GREEN, alert: false, reason: "high_traffic_exited" });
  assert.deepEqual(result.state.mode, { kind: "normal" });
});

test("exiting high traffic while A holds green goes through yellow", () => {
  const start = tickMode(highTrafficState("A", 0), 0, 4_000, DEFAULT_TIMINGS);
  assert.deepEqual(start.state.lights, { colorA: "yellow", colorB: "red" });
  assert.equal(start.change?.reason, "high_traffic_clearing");

  const done = tickMode(start.state, 0, 6_000, DEFAULT_TIMINGS);
  assert.deepEqual(done.state.lights, RED_GREEN);
  assert.deepEqual(done.state.mode, { kind: "normal" });
});

test("a clock that jumps backwards holds the clearance instead of finishing it", () => {
  const start = tickMode(createModeState(), 3, 5_000, DEFAULT_TIMINGS);
  assert.equal(tickMode(start.state, 3, 4_000, DEFAULT_TIMINGS).change, null);
});

test("random count streams never show two active sides or skip the yellow", () => {
  let seed = 42;
  const nextCount = () => {
    seed = (seed * 48_271) % 2_147_483_647;
    return seed % 13;
  };

  let state = createModeState();
  const yellowSince: Record<"A" | "B", number | null> = { A: null, B: null };
  let count = 0;
  for (let step = 0; step < 4_000; step += 1) {
    const now = step * 250;
    if (step % 20 === 0) count = nextCount() < 4 ? 0 : nextCount();
    const previous = state.lights;
    state = tickMode(state, count, now, DEFAULT_TIMINGS).state;
    assert.equal(hasConflict(state.lights), false, `conflict at ${now}ms`);

    const sides: Array<["A" | "B", LightColor, LightColor]> = [
      ["A", previous.colorA, state.lights.colorA],
      ["B", previous.colorB, state.lights.colorB],
    ];
    for (const [side, before, after] of sides) {
      assert.ok(!(before === "green" && after === "red"), `${side} went green to red at ${now}ms`);
      if (before !== "yellow" && after === "yellow") yellowSince[side] = now;
      if (before === "yellow" && after === "red") {
        const since = yellowSince[side];
        assert.ok(since !== null && now - since >= DEFAULT_TIMINGS.yellowDurationMs, `${side} yellow too short`);
      }
    }
  }
});
