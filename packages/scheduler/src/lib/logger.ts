import { pino } from "pino";
import { env } from "../config.js";

export type { Logger } from "pino";

export const logger = pino({
  level: env.LOG_LEVEL,
  base: { service: "showtime-scheduler" }
});
