import { z } from "zod";

const booleanFlag = z
  .enum(["true", "false"])
  .default("false")
  .transform((value) => value === "true");

const envSchema = z
  .object({
    NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
    PORT: z.coerce.number().int().positive().default(3000),
    HOST: z.string().default("0.0.0.0"),
    LOG_LEVEL: z
      .enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])
      .default("info"),
    REPO_PROVIDER: z.enum(["memory", "postgres"]).default("memory"),
    DATABASE_URL: z.string().optional(),
    DB_POOL_SIZE: z.coerce.number().int().positive().default(10),
    DB_QUERY_TIMEOUT_MS: z.coerce.number().int().positive().default(5_000),
    DB_LOCK_TIMEOUT_MS: z.coerce.number().int().positive().default(3_000),
    LOCK_TIMEOUT_MS: z.coerce.number().int().positive().default(5_000),
    RATE_LIMIT_MAX: z.coerce.number().int().positive().default(100),
    RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(60_000),
    BODY_LIMIT_BYTES: z.coerce.number().int().positive().default(16_384),
    MAX_PARAM_LENGTH: z.coerce.number().int().positive().default(100),
    REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
    INTEREST_DAILY_RATE: z
      .string()
      .regex(/^0(\.\d{1,6})?$/, "INTEREST_DAILY_RATE must be a decimal between 0 and 1")
      .default("0.0005"),
    INTEREST_SCHEDULE_ENABLED: booleanFlag,
    INTEREST_INTERVAL_MS: z.coerce.number().int().positive().default(86_400_000),
    SEED_FILE: z.string().default("data/seed-accounts.json")
  })
  .superRefine((value, ctx) => {
    if (value.REPO_PROVIDER === "postgres" && !value.DATABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "DATABASE_URL is required when REPO_PROVIDER=postgres",
        path: ["DATABASE_URL"]
      });
    }
  });

export type AppConfig = z.infer<typeof envSchema>;

export const config: AppConfig = envSchema.parse(process.env);
