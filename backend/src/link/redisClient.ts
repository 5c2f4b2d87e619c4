import { createClient } from "redis";
import { config } from "../config";
import { logger as rootLogger } from "../utils/logger";

const logger = rootLogger.child("redis");

type RedisClientInstance = ReturnType<typeof createClient>;

export type RedisStatus = "disabled" | "connecting" | "ready" | "error";

export interface RedisManager {
  client: RedisClientInstance | null;
  status: RedisStatus;
  error: Error | undefined;
  connect: () => Promise<void>;
  disconnect: () => Promise<void>;
  publish: (channel: string, message: string) => Promise<void>;
  setJson: <T>(key: string, value: T, ttlMs?: number) => Promise<void>;
}

const NOOP_MANAGER: RedisManager = {
  client: null,
  status: "disabled",
  error: undefined,
  connect: async () => {
    logger.info("Redis disabled; skipping connect");
  },
  disconnect: async () => {
    logger.info("Redis disabled; skipping disconnect");
  },
  publish: async (channel) => {
    throw new Error(`Redis disabled; cannot publish to ${channel}`);
  },
  setJson: async () => undefined,
};

export const createRedisManager = (url: string | undefined = config.redisUrl): RedisManager => {
  if (!url) {
    logger.info("Redis URL not configured; commands will only be logged");
    return NOOP_MANAGER;
  }

  const client = createClient({ url });
  let status: RedisStatus = "connecting";
  let connectionError: Error | undefined;

  client.on("error", (error) => {
    status = "error";
    connectionError = error instanceof Error ? error : new Error(String(error));
    logger.error("Redis connection error", { message: connectionError.message });
  });

  client.on("end", () => {
    status = "disabled";
    logger.info("Redis connection closed");
  });

  const connect = async () => {
    if (status === "ready") return;
    try {
      status = "connecting";
      await client.connect();
      status = "ready";
      connectionError = undefined;
      logger.info("Redis connection established");
    } catch (error) {
      status = "error";
      connectionError = error instanceof Error ? error : new Error(String(error));
      logger.error("Failed to connect to Redis", { message: connectionError.message });
    }
  };

  const disconnect = async () => {
    if (status === "disabled" || status === "error") return;
    try {
      await client.disconnect();
      status = "disabled";
    } catch (error) {
      logger.warn("Failed to close Redis connection", { message: String(error) });
    }
  };

  const publish = async (channel: string, message: string) => {
    if (status !== "ready") {
      throw new Error(`Redis not ready (${status})`);
    }
    await client.publish(channel, message);
  };

  const setJson = async <T>(key: string, value: T, ttlMs?: number) => {
    if (status !== "ready") return;
    try {
      const serialized = JSON.stringify(value);
      if (ttlMs && ttlMs > 0) {
        await client.set(key, serialized, { PX: ttlMs });
      } else {
        await client.set(key, serialized);
      }
    } catch (error) {
      logger.warn("Redis setJson failed", { key, message: String(error) });
    }
  };

  void connect();

  return {
    client,
    get status() {
      return status;
    },
    get error() {
      return connectionError;
    },
    connect,
    disconnect,
    publish,
    setJson,
  };
};
