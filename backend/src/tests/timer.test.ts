import test from "node:test";
import assert from "node:assert/strict";
import { createManualClock, elapsed, isClockRegression, remaining } from "../engine/timer";

test("elapsed is the difference between two instants", () => {
  assert.equal(elapsed(1_000, 3_500), 2_500);
  assert.equal(elapsed(1_000, 1_000), 0);
});

test("elapsed treats a clock that moved backwards as zero", () => {
  assert.equal(isClockRegression(5_000, 4_200), true);
  assert.equal(elapsed(5_000, 4_200), 0);
  assert.equal(remaining(5_000, 4_200, 2_000), 2_000);
});

test("remaining never goes below zero", () => {
  assert.equal(remaining(0, 1_500, 2_000), 500);
  assert.equal(remaining(0, 9_000, 2_000), 0);
});

test("manual clock advances and jumps on demand", () => {
  const clock = createManualClock(100);
  assert.equal(clock.now(), 100);
  assert.equal(clock.advance(250), 350);
  assert.equal(clock.set(40), 40);
  assert.equal(clock.now(), 40);
});
