import cors from "cors";
import express from "express";
import type { EmitSummary, SignalErrorResponse } from "@signalpair/core";
import type { SignalController } from "../engine/controller";
import type { EmitResult } from "../engine/commandEmitter";
import type { RedisManager } from "../link/redisClient";
import { logger as rootLogger } from "../utils/logger";

const logger = rootLogger.child("http");

export interface AppDependencies {
  controller: SignalController;
  redis?: RedisManager;
}

export const summarizeEmit = (result: EmitResult): EmitSummary => {
  if (result.status === "failed") {
    return { status: "failed", token: result.token, message: result.error.message };
  }
  return result;
};

/** Numeric strings from form posts are converted. */
const parseCount = (body: unknown): unknown => {
  if (!body || typeof body !== "object" || !("count" in body)) return undefined;
  const { count } = body;
  if (typeof count === "string" && count.trim() !== "") return Number(count);
  return count;
};

export const createApp = ({ controller, redis }: AppDependencies) => {
  const app = express();

  app.use(cors());
  app.use(express.json());

  app.get("/api/health", (_req, res) => {
    const redisStatus = redis?.status ?? "disabled";
    const redisError = redis?.error ? redis.error.message : null;
    res.json({
      status: "ok",
      timestamp: new Date().toISOString(),
      link: controller.linkName,
      redis: {
        status: redisStatus,
        error: redisError,
        healthy: redisStatus === "ready" && !redisError,
      },
    });
  });

  app.get("/api/status", (_req, res) => {
    res.json(controller.getStatus());
  });

  app.post("/api/samples", async (req, res) => {
    try {
      const result = await controller.observe(parseCount(req.body));
      if (result.rejected) {
        const body: SignalErrorResponse = { error: result.rejected.code, message: result.rejected.message };
        return res.status(400).json(body);
      }
      return res.json({ status: controller.getStatus(), emit: summarizeEmit(result.emit) });
    } catch (error) {
      logger.error("Failed to process vehicle count sample", { message: String(error) });
      return res.status(500).json({ error: "internal_error", message: "Unable to process sample" });
    }
  });

  app.post("/api/reset", async (_req, res) => {
    try {
      const emit = await controller.reset();
      return res.json({ status: controller.getStatus(), emit: summarizeEmit(emit) });
    } catch (error) {
      logger.error("Failed to reset controller", { message: String(error) });
      return res.status(500).json({ error: "internal_error", message: "Unable to reset controller" });
    }
  });

  app.use((_req, res) => {
    res.status(404).json({ error: "not_found", message: "Route not found" });
  });

  return app;
};
