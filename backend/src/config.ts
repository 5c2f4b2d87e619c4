import dotenv from "dotenv";

dotenv.config();

const DEFAULT_PORT = 4100;
const DEFAULT_YELLOW_DURATION_MS = 2_000;
const DEFAULT_HIGH_TRAFFIC_WINDOW_MS = 30_000;
const DEFAULT_HIGH_TRAFFIC_THRESHOLD = 8;
const DEFAULT_CONFIRMATION_DELAY_MS = 3_000;
const DEFAULT_HIGH_CONFIRMATION_DELAY_MS = 1_500;
const DEFAULT_HISTORY_SIZE = 10;
const DEFAULT_HEARTBEAT_MS = 250;
const DEFAULT_COMMAND_CHANNEL = "signalpair:commands";
export type LogLevel = "debug" | "info" | "warn" | "error";

export interface AppConfig {
  port: number;
  redisUrl: string | undefined;
  logLevel: LogLevel;
  yellowDurationMs: number;
  highTrafficWindowMs: number;
  highTrafficThreshold: number;
  confirmationDelayMs: number;
  highConfirmationDelayMs: number;
  historySize: number;
  heartbeatMs: number;
  commandChannel: string;
}

const normalizeLogLevel = (value?: string): LogLevel => {
  const normalized = (value ?? "").toLowerCase();
  if (normalized === "debug" || normalized === "warn" || normalized === "error") {
    return normalized;
  }
  return "info";
};

const parsePositiveNumber = (value: string | undefined, fallback: number): number => {
  const parsed = Number(value);
  if (Number.isFinite(parsed) && parsed > 0) return parsed;
  return fallback;
};

const parsePositiveInteger = (value: string | undefined, fallback: number): number =>
  Math.max(1, Math.floor(parsePositiveNumber(value, fallback)));

export const config: AppConfig = {
  port: Number(process.env.PORT ?? DEFAULT_PORT),
  redisUrl: process.env.REDIS_URL,
  logLevel: normalizeLogLevel(process.env.LOG_LEVEL),
  yellowDurationMs: parsePositiveNumber(process.env.SIGNAL_YELLOW_DURATION_MS, DEFAULT_YELLOW_DURATION_MS),
  highTrafficWindowMs: parsePositiveNumber(
    process.env.SIGNAL_HIGH_TRAFFIC_WINDOW_MS,
    DEFAULT_HIGH_TRAFFIC_WINDOW_MS,
  ),
  highTrafficThreshold: parsePositiveInteger(
    process.env.SIGNAL_HIGH_TRAFFIC_THRESHOLD,
    DEFAULT_HIGH_TRAFFIC_THRESHOLD,
  ),
  confirmationDelayMs: parsePositiveNumber(
    process.env.SIGNAL_CONFIRMATION_DELAY_MS,
    DEFAULT_CONFIRMATION_DELAY_MS,
  ),
  highConfirmationDelayMs: parsePositiveNumber(
    process.env.SIGNAL_HIGH_CONFIRMATION_DELAY_MS,
    DEFAULT_HIGH_CONFIRMATION_DELAY_MS,
  ),
  historySize: parsePositiveInteger(process.env.SIGNAL_HISTORY_SIZE, DEFAULT_HISTORY_SIZE),
  heartbeatMs: parsePositiveNumber(process.env.SIGNAL_HEARTBEAT_MS, DEFAULT_HEARTBEAT_MS),
  commandChannel: process.env.SIGNAL_COMMAND_CHANNEL ?? DEFAULT_COMMAND_CHANNEL,
};
