import pino from "pino";
import type { FastifyBaseLogger } from "fastify";
import { config } from "../config";

export type AppLogger = Pick<FastifyBaseLogger, "info" | "warn" | "error" | "debug">;

export const logger: AppLogger = pino({
  name: "bank",
  level: config.LOG_LEVEL
});
