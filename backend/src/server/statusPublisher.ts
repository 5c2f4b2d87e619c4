import type { ControllerStatus } from "@signalpair/core";
import type { RedisManager } from "../link/redisClient";

export const STATUS_KEY = "signalpair:status";
const STATUS_TTL_MS = 10_000;

/**
 * Mirrors the latest status into Redis for dashboards. Write-only; the controller never reads it back.
 * `setJson` logs and absorbs its own failures.
 */
export const createStatusPublisher =
  (redis: RedisManager, key: string = STATUS_KEY) =>
  (status: ControllerStatus) => {
    if (redis.status !== "ready") return;
    void redis.setJson(key, status, STATUS_TTL_MS);
  };
