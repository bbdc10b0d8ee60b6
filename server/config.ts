import { z } from "zod";

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  PORT: z.coerce.number().int().positive().default(5000),
  DATABASE_URL: z.string().trim().min(1).optional(),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  DEFAULT_PAGE_SIZE: z.coerce.number().int().positive().default(12),
  MAX_PAGE_SIZE: z.coerce.number().int().positive().default(100),
  RATING_SORT_STRATEGY: z.enum(["aggregate", "in-memory"]).default("aggregate"),
});

export type RatingSortStrategyName = z.infer<typeof envSchema>["RATING_SORT_STRATEGY"];

export interface AppConfig {
  env: "development" | "production" | "test";
  port: number;
  databaseUrl?: string;
  logLevel: z.infer<typeof envSchema>["LOG_LEVEL"];
  pagination: {
    defaultPageSize: number;
    maxPageSize: number;
  };
  ratingSortStrategy: RatingSortStrategyName;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`Invalid environment variable ${issue.path.join(".")}: ${issue.message}`);
  }

  const vars = parsed.data;
  if (vars.DEFAULT_PAGE_SIZE > vars.MAX_PAGE_SIZE) {
    throw new Error(
      `Invalid environment variable DEFAULT_PAGE_SIZE: ${vars.DEFAULT_PAGE_SIZE} exceeds MAX_PAGE_SIZE ${vars.MAX_PAGE_SIZE}`,
    );
  }

  return {
    env: vars.NODE_ENV,
    port: vars.PORT,
    databaseUrl: vars.DATABASE_URL,
    logLevel: vars.LOG_LEVEL,
    pagination: {
      defaultPageSize: vars.DEFAULT_PAGE_SIZE,
      maxPageSize: vars.MAX_PAGE_SIZE,
    },
    ratingSortStrategy: vars.RATING_SORT_STRATEGY,
  };
}
