import { config as loadEnv } from "dotenv";
import { z } from "zod";

loadEnv();

const DEFAULT_JWT_SECRET = "CHANGE_ME";
const MIN_PRODUCTION_SECRET_LENGTH = 32;

const optionalStringSchema = z
  .string()
  .optional()
  .transform((value) => (value === undefined || value.trim().length === 0 ? undefined : value));

const commaListSchema = z
  .string()
  .default("")
  .transform((value) =>
    value
      .split(",")
      .map((entry) => entry.trim())
      .filter((entry) => entry.length > 0)
  );

const envSchema = z
  .object({
    NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
    PORT: z.coerce.number().int().positive().default(8000),
    SERVICE_NAME: z.string().min(1).default("creator-portal-api"),
    CORS_ALLOWED_ORIGINS: commaListSchema,
    DATABASE_PATH: z.string().default("./data/creator-portal.db"),
    JWT_SECRET_KEY: z.string().min(1).default(DEFAULT_JWT_SECRET),
    ACCESS_TOKEN_HEADER: z.string().min(1).default("AccessToken"),
    ACCESS_TOKEN_TTL_DAYS: z.coerce.number().int().positive().default(14),
    MAX_SESSIONS_PER_USER: z.coerce.number().int().positive().default(5),
    SESSION_STORE_DRIVER: z.enum(["redis", "memory"]).default("redis"),
    SESSION_STORE_TIMEOUT_MS: z.coerce.number().int().positive().default(2_000),
    REDIS_HOST: z.string().min(1).default("localhost"),
    REDIS_PORT: z.coerce.number().int().positive().default(6379),
    REDIS_PASSWORD: optionalStringSchema,
    REDIS_DB: z.coerce.number().int().nonnegative().default(0),
    REDIS_PREFIX: z.string().min(1).default("infound"),
    RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(60_000),
    RATE_LIMIT_MAX_LOGIN: z.coerce.number().int().positive().default(20)
  })
  .superRefine((value, ctx) => {
    if (value.NODE_ENV !== "production") {
      return;
    }

    if (value.JWT_SECRET_KEY === DEFAULT_JWT_SECRET || value.JWT_SECRET_KEY.length < MIN_PRODUCTION_SECRET_LENGTH) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["JWT_SECRET_KEY"],
        message: `JWT_SECRET_KEY must be set to at least ${MIN_PRODUCTION_SECRET_LENGTH} characters in production`
      });
    }
  });

export type Env = z.infer<typeof envSchema>;

export const parseEnv = (source: NodeJS.ProcessEnv): Env => {
  const parsedEnv = envSchema.safeParse(source);

  if (!parsedEnv.success) {
    throw new Error(`Invalid environment: ${parsedEnv.error.message}`);
  }

  return parsedEnv.data;
};

export const env = parseEnv(process.env);
