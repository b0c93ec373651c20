import { z } from "zod";

const optionalUrl = z
  .string()
  .trim()
  .transform((value) => (value === "" ? undefined : value))
  .optional();

const envSchema = z.object({
  PORT: z.coerce.number().int().nonnegative().default(8080),
  DATABASE_URL: optionalUrl,
  DATABASE_POOL_MAX: z.coerce.number().int().positive().default(10),
  DATABASE_CONNECT_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  ATTEMPTS_DEFAULT_LIMIT: z.coerce.number().int().positive().default(100),
  ATTEMPTS_MAX_LIMIT: z.coerce.number().int().positive().default(1000),
});

export interface DatabaseConfig {
  url?: string;
  poolMax: number;
  connectTimeoutMs: number;
}

export interface AttemptsConfig {
  defaultLimit: number;
  maxLimit: number;
}

export interface AppConfig {
  port: number;
  database: DatabaseConfig;
  attempts: AttemptsConfig;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);
  if (parsed.ATTEMPTS_DEFAULT_LIMIT > parsed.ATTEMPTS_MAX_LIMIT) {
    throw new Error("ATTEMPTS_DEFAULT_LIMIT must not exceed ATTEMPTS_MAX_LIMIT");
  }
  return {
    port: parsed.PORT,
    database: {
      url: parsed.DATABASE_URL,
      poolMax: parsed.DATABASE_POOL_MAX,
      connectTimeoutMs: parsed.DATABASE_CONNECT_TIMEOUT_MS,
    },
    attempts: {
      defaultLimit: parsed.ATTEMPTS_DEFAULT_LIMIT,
      maxLimit: parsed.ATTEMPTS_MAX_LIMIT,
    },
  };
}
