import type { AppConfig } from "../config";
import type { Duration } from "./timer";

export interface SignalTimings {
  yellowDurationMs: Duration;
  highTrafficWindowMs: Duration;
  highTrafficThreshold: number;
  confirmationDelayMs: Duration;
  highConfirmationDelayMs: Duration;
  historySize: number;
}

export const DEFAULT_TIMINGS: SignalTimings = {
  yellowDurationMs: 2_000,
  highTrafficWindowMs: 30_000,
  highTrafficThreshold: 8,
  confirmationDelayMs: 3_000,
  highConfirmationDelayMs: 1_500,
  historySize: 10,
};

export const timingsFromConfig = (appConfig: AppConfig): SignalTimings => ({
  yellowDurationMs: appConfig.yellowDurationMs,
  highTrafficWindowMs: appConfig.highTrafficWindowMs,
  highTrafficThreshold: appConfig.highTrafficThreshold,
  confirmationDelayMs: appConfig.confirmationDelayMs,
  highConfirmationDelayMs: appConfig.highConfirmationDelayMs,
  historySize: appConfig.historySize,
});
