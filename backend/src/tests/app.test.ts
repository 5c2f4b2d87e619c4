import test from "node:test";
import assert from "node:assert/strict";
import { once } from "node:events";
import type { Server } from "node:http";
import { fetchStatus, postReset, postSample } from "@signalpair/core";
import { SignalController } from "../engine/controller";
import { createManualClock, type ManualClock } from "../engine/timer";
import { createRecordingLink, type RecordingLink } from "../link/actuatorLinks";
import { createApp } from "../server/app";
import { silentLogger } from "../utils/logger";

interface Harness {
  baseUrl: string;
  clock: ManualClock;
  link: RecordingLink;
}

const withServer = async (run: (harness: Harness) => Promise<void>) => {
  const clock = createManualClock(0);
  const link = createRecordingLink();
  const controller = new SignalController({ link, clock, logger: silentLogger });
  await controller.start();

  const server: Server = createApp({ controller }).listen(0, "127.0.0.1");
  await once(server, "listening");
  const address = server.address();
  if (!address || typeof address === "string") throw new Error("Server has no TCP address");

  try {
    await run({ baseUrl: `http://127.0.0.1:${address.port}`, clock, link });
  } finally {
    server.closeAllConnections();
    await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
  }
};

test("status reflects the initial lights", async () => {
  await withServer(async ({ baseUrl }) => {
    const status = await fetchStatus(baseUrl);
    assert.equal(status.modeLabel, "normal");
    assert.deepEqual(status.lights, { colorA: "red", colorB: "green" });
    assert.equal(status.lastCommand, "ARBG");
  });
});

test("samples drive the controller and report what was sent", async () => {
  await withServer(async ({ baseUrl, clock, link }) => {
    const pending = await postSample(baseUrl, 3);
    assert.deepEqual(pending.emit, { status: "skipped" });
    assert.equal(pending.status.pendingCount, 3);
    assert.equal(pending.status.confirmingRemainingMs, 3_000);

    clock.set(3_000);
    const confirmed = await postSample(baseUrl, 3);
    assert.deepEqual(confirmed.emit, { status: "sent", token: "ARBY" });
    assert.equal(confirmed.status.modeLabel, "yellow_clearance");
    assert.deepEqual(link.tokens(), ["ARBG", "ARBY"]);
  });
});

test("invalid counts are answered with 400", async () => {
  await withServer(async ({ baseUrl }) => {
    await assert.rejects(postSample(baseUrl, -4), { message: "Signal API request failed (400)" });

    const response = await fetch(`${baseUrl}/api/samples`, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify({ count: "many" }),
    });
    assert.equal(response.status, 400);
    const body: unknown = await response.json();
    assert.deepEqual(body, {
      error: "invalid_count",
      message: "Vehicle count must be a non-negative integer, received NaN",
    });
  });
});

test("reset re-sends cross traffic green", async () => {
  await withServer(async ({ baseUrl, link }) => {
    const result = await postReset(baseUrl);
    assert.deepEqual(result.emit, { status: "sent", token: "ARBG" });
    assert.deepEqual(link.tokens(), ["ARBG", "ARBG"]);
  });
});

test("health names the link and reports redis as disabled", async () => {
  await withServer(async ({ baseUrl }) => {
    const response = await fetch(`${baseUrl}/api/health`);
    const body: unknown = await response.json();
    assert.ok(body && typeof body === "object");
    assert.equal(Reflect.get(body, "link"), "recording");
    assert.deepEqual(Reflect.get(body, "redis"), { status: "disabled", error: null, healthy: false });
  });
});

test("unknown routes return 404", async () => {
  await withServer(async ({ baseUrl }) => {
    const response = await fetch(`${baseUrl}/api/nowhere`);
    assert.equal(response.status, 404);
  });
});
