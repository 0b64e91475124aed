import path from "node:path";
import { config as loadEnv } from "dotenv";
import { z } from "zod";
import type { LogLevel } from "./logger";

export const DEFAULT_DATA_DIR_NAME = "skiff_data";

const envSchema = z
  .object({
    SKIFF_DATA_DIR: z.string().min(1).optional(),
    SKIFF_LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).optional(),
    NODE_ENV: z.string().optional()
  })
  .passthrough();

export function parseConfig(source: Record<string, string | undefined>, cwd: string = process.cwd()) {
  const parsed = envSchema.parse(source);
  const nodeEnv = parsed.NODE_ENV ?? "development";
  const logLevel: LogLevel = parsed.SKIFF_LOG_LEVEL ?? (nodeEnv === "test" ? "silent" : "info");
  return {
    dataDir: path.resolve(cwd, parsed.SKIFF_DATA_DIR ?? DEFAULT_DATA_DIR_NAME),
    logLevel,
    nodeEnv,
    isDevelopment: nodeEnv === "development"
  };
}

export type StoreConfig = ReturnType<typeof parseConfig>;

export function loadConfig(): StoreConfig {
  loadEnv();
  return parseConfig(process.env);
}
