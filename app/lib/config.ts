/**
 * Environment configuration, validated with Zod at startup.
 */

import { z } from "zod";

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  DATABASE_PATH: z.string().min(1).default("data/bindery.db"),
  MEDIA_ROOT: z.string().min(1).default("data/media"),
  // Upload ceiling in megabytes
  MAX_UPLOAD_MB: z.coerce.number().positive().default(50),
  LOG_REQUESTS: z
    .string()
    .default("true")
    .transform((val) => val === "true"),
});

export interface AppConfig {
  port: number;
  databasePath: string;
  mediaRoot: string;
  maxUploadBytes: number;
  logRequests: boolean;
}

export const DEFAULT_MAX_UPLOAD_BYTES = 50 * 1024 * 1024;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse({
    PORT: env.PORT,
    DATABASE_PATH: env.DATABASE_PATH,
    MEDIA_ROOT: env.MEDIA_ROOT,
    MAX_UPLOAD_MB: env.MAX_UPLOAD_MB,
    LOG_REQUESTS: env.LOG_REQUESTS,
  });

  if (!parsed.success) {
    console.error("Invalid environment variables:", parsed.error.flatten().fieldErrors);
    throw new Error("Invalid environment variables");
  }

  return {
    port: parsed.data.PORT,
    databasePath: parsed.data.DATABASE_PATH,
    mediaRoot: parsed.data.MEDIA_ROOT,
    maxUploadBytes: Math.round(parsed.data.MAX_UPLOAD_MB * 1024 * 1024),
    logRequests: parsed.data.LOG_REQUESTS,
  };
}
