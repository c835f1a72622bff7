import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

const LogLevel = z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);

const EnvSchema = z.object({
  NODE_ENV: z.string().default("development"),
  LOG_LEVEL: LogLevel.optional(),
  ALLOW_LEADING_ADJACENCY: z
    .enum(["true", "false"])
    .default("false")
    .transform((v) => v === "true")
});

const parsed = EnvSchema.parse(process.env);
export const env = {
  ...parsed,
  LOG_LEVEL: parsed.LOG_LEVEL ?? (parsed.NODE_ENV === "test" ? "silent" : "info")
};
