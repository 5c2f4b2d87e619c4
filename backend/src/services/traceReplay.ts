import type { ControllerStatus } from "@signalpair/core";
import { SignalController } from "../engine/controller";
import type { EmitResult } from "../engine/commandEmitter";
import { createManualClock, type Timestamp } from "../engine/timer";
import { DEFAULT_TIMINGS, type SignalTimings } from "../engine/timings";
import { createRecordingLink } from "../link/actuatorLinks";
import { silentLogger, type Logger } from "../utils/logger";

export interface TraceSample {
  atMs: Timestamp;
  count: number;
}

export interface ReplayedCommand {
  atMs: Timestamp;
  token: string;
}

export interface ReplayOptions {
  timings?: SignalTimings;
  /** Heartbeat ticks between samples; 0 disables them. */
  heartbeatMs?: number;
  logger?: Logger;
}

export interface ReplayResult {
  commands: ReplayedCommand[];
  rejectedSamples: number;
  finalStatus: ControllerStatus;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/** Accepts either a bare array of samples or `{ samples: [...] }`. */
export const parseTrace = (raw: unknown): TraceSample[] => {
  const entries = isRecord(raw) ? raw.samples : raw;
  if (!Array.isArray(entries)) {
    throw new Error("Trace must be an array of { atMs, count } samples");
  }
  return entries.map((entry: unknown, index) => {
    if (!isRecord(entry) || typeof entry.atMs !== "number" || !Number.isFinite(entry.atMs)) {
      throw new Error(`Trace sample ${index} is missing a numeric atMs`);
    }
    if (typeof entry.count !== "number") {
      throw new Error(`Trace sample ${index} is missing a numeric count`);
    }
    return { atMs: entry.atMs, count: entry.count };
  });
};

/** Runs a recorded trace through an offline controller and collects every command it delivers. */
export const replayTrace = async (samples: TraceSample[], options: ReplayOptions = {}): Promise<ReplayResult> => {
  const heartbeatMs = options.heartbeatMs ?? 0;
  const clock = createManualClock(samples[0]?.atMs ?? 0);
  const controller = new SignalController({
    link: createRecordingLink("replay"),
    timings: options.timings ?? DEFAULT_TIMINGS,
    clock,
    logger: options.logger ?? silentLogger,
  });

  const commands: ReplayedCommand[] = [];
  const record = (atMs: Timestamp, result: EmitResult) => {
    if (result.status === "sent") commands.push({ atMs, token: result.token });
  };

  record(clock.now(), await controller.start());
  let rejectedSamples = 0;
  let previous = clock.now();

  for (const sample of samples) {
    if (heartbeatMs > 0) {
      for (let at = previous + heartbeatMs; at < sample.atMs; at += heartbeatMs) {
        clock.set(at);
        record(at, (await controller.advance(at)).emit);
      }
    }
    clock.set(sample.atMs);
    const result = await controller.observe(sample.count, sample.atMs);
    if (result.rejected) rejectedSamples += 1;
    record(sample.atMs, result.emit);
    previous = Math.max(previous, sample.atMs);
  }

  return { commands, rejectedSamples, finalStatus: controller.getStatus(previous) };
};
