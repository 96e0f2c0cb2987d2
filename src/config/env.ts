import { config as loadEnv } from "dotenv";
import { z } from "zod";

loadEnv();

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.coerce.number().int().positive().default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  DATABASE_PATH: z.string().min(1).default("data/engine.db"),
  REDIS_URL: z.string().min(1).default("redis://localhost:6379"),
  CORS_ORIGINS: z
    .string()
    .default("http://localhost:3000,http://localhost:5173,http://127.0.0.1:5173")
    .transform((value) => value.split(",").map((item) => item.trim()).filter(Boolean)),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(200),
  RULESET_ROOT: z.string().min(1).default("rulesets"),
  DEFAULT_RULESET_FEDERAL: z.string().default("IRS-2024.1"),
  DEFAULT_RULESET_SALES_TAX: z.string().default("SALES-2024.1"),
  RULESET_SIGNING_SECRET: z.string().min(8).default("local-dev-ruleset-secret"),
  NEXUS_STORE: z.enum(["sqlite", "memory"]).default("sqlite")
});

export type Env = z.infer<typeof envSchema>;

export const env: Env = envSchema.parse(process.env);
