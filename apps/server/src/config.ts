import { z } from "zod";

export const configSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  HOST: z.string().min(1).default("0.0.0.0"),
  PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  MAX_CONCURRENT_CONNECTIONS: z.coerce.number().int().positive().default(4),
  MAX_WAITING_CONNECTIONS: z.coerce.number().int().min(0).default(64),
  MAX_REQUEST_HEAD_BYTES: z.coerce.number().int().positive().default(4096),
  HEAD_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(60_000),
  RATE_LIMIT_MAX_REQUESTS: z.coerce.number().int().positive().default(100),
  RATE_LIMIT_MAX_CLIENTS: z.coerce.number().int().positive().default(10_000),
  STATIC_ROOT: z.string().min(1).default("public_html"),
  INDEX_DOCUMENT: z.string().min(1).default("index.html"),
  NOT_FOUND_PAGE: z.string().min(1).default("server_assets/404.html"),
  REQUEST_LOG_PATH: z.string().min(1).default("server.log"),
  METRICS_PORT: z.coerce.number().int().min(0).max(65535).default(0),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info")
});

export type Config = z.infer<typeof configSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return configSchema.parse(env);
}
