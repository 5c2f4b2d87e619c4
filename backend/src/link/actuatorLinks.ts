import type { ActuatorLink } from "../engine/commandEmitter";
import type { RedisManager } from "./redisClient";
import { logger as defaultLogger, type Logger } from "../utils/logger";

/** Publishes each token on a pub/sub channel; the serial bridge next to the lights subscribes to it. */
export const createRedisLink = (redis: RedisManager, channel: string): ActuatorLink => ({
  name: `redis:${channel}`,
  write: (token) => redis.publish(channel, token),
});

export const createLoggingLink = (logger: Logger = defaultLogger): ActuatorLink => ({
  name: "log",
  write: async (token) => {
    logger.info("Actuator command", { token });
  },
});

export interface RecordedCommand {
  token: string;
  index: number;
}

export interface RecordingLink extends ActuatorLink {
  readonly commands: RecordedCommand[];
  tokens: () => string[];
  /** The next `count` writes reject. */
  failNext: (count?: number) => void;
}

export const createRecordingLink = (name = "recording"): RecordingLink => {
  const commands: RecordedCommand[] = [];
  let failuresRemaining = 0;
  let attempts = 0;
  return {
    name,
    commands,
    tokens: () => commands.map((command) => command.token),
    failNext: (count = 1) => {
      failuresRemaining = count;
    },
    write: async (token) => {
      attempts += 1;
      if (failuresRemaining > 0) {
        failuresRemaining -= 1;
        throw new Error(`write ${attempts} rejected`);
      }
      commands.push({ token, index: attempts });
    },
  };
};
