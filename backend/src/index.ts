import { config } from "./config";
import { SignalController } from "./engine/controller";
import { timingsFromConfig } from "./engine/timings";
import { createLoggingLink, createRedisLink } from "./link/actuatorLinks";
import { createRedisManager } from "./link/redisClient";
import { createApp } from "./server/app";
import { createHeartbeatJob, startJob, stopJob } from "./server/heartbeat";
import { createStatusPublisher } from "./server/statusPublisher";
import { logger } from "./utils/logger";

const redis = createRedisManager();
const link = config.redisUrl ? createRedisLink(redis, config.commandChannel) : createLoggingLink();

const controller = new SignalController({
  link,
  timings: timingsFromConfig(config),
  onStatus: createStatusPublisher(redis),
});

const heartbeat = createHeartbeatJob(controller, config.heartbeatMs);
const app = createApp({ controller, redis });

const server = app.listen(config.port, () => {
  logger.info(`Signal controller listening on http://localhost:${config.port}`, { link: link.name });
  controller
    .start()
    .then((result) => {
      if (result.status === "failed") {
        logger.warn("Initial light command not delivered; it will be retried on the next tick");
      }
      startJob(heartbeat);
    })
    .catch((error: unknown) => {
      logger.error("Failed to start controller", { message: String(error) });
      process.exit(1);
    });
});

const shutdown = () => {
  logger.info("Shutting down signal controller...");
  stopJob(heartbeat);
  void redis.disconnect();
  server.close(() => {
    process.exit(0);
  });
};

process.on("SIGTERM", shutdown);
process.on("SIGINT", shutdown);
