import type { SignalController } from "../engine/controller";
import { logger as rootLogger } from "../utils/logger";

const logger = rootLogger.child("heartbeat");

export interface HeartbeatJob {
  name: string;
  intervalMs: number;
  run: () => Promise<void>;
  initialDelayMs?: number;
  timer?: NodeJS.Timeout;
  stopped?: boolean;
}

export const createHeartbeatJob = (controller: SignalController, intervalMs: number): HeartbeatJob => ({
  name: "signal-heartbeat",
  intervalMs,
  initialDelayMs: intervalMs,
  run: async () => {
    await controller.advance();
  },
});

export const startJob = (job: HeartbeatJob) => {
  const scheduleNext = (delayMs: number) => {
    job.timer = setTimeout(async () => {
      try {
        await job.run();
      } catch (error) {
        logger.error("Heartbeat job failed", { job: job.name, message: String(error) });
      } finally {
        if (!job.stopped) scheduleNext(job.intervalMs);
      }
    }, Math.max(0, delayMs));
  };

  scheduleNext(job.initialDelayMs ?? 0);
};

export const stopJob = (job: HeartbeatJob) => {
  job.stopped = true;
  if (job.timer) clearTimeout(job.timer);
};
