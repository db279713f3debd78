import { z } from "zod";

export const JWT_ALGORITHMS = ["HS256", "HS384", "HS512"] as const;
export type JwtAlgorithm = (typeof JWT_ALGORITHMS)[number];

const booleanFlag = z
  .enum(["true", "false", "TRUE", "FALSE", "1", "0"])
  .optional()
  .transform((val) => val === "true" || val === "TRUE" || val === "1");

const envSchema = z
  .object({
    NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
    APP_NAME: z.string().min(1).default("gambit-server"),
    LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "fatal"]).optional(),

    // Optional outside production: without it the server runs on the in-process store
    DATABASE_URL: z.string().min(1).optional(),
    SQL_ECHO: booleanFlag,
    DB_POOL_MAX: z.coerce.number().int().positive().default(10),
    DB_POOL_IDLE_TIMEOUT_MS: z.coerce.number().int().nonnegative().default(30000),
    DB_POOL_CONNECTION_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),

    JWT_SECRET: z
      .string({
        required_error:
          "JWT_SECRET is required. Generate one with: node -e \"console.log(require('crypto').randomBytes(32).toString('hex'))\"",
      })
      .min(32, "JWT_SECRET must be at least 32 characters"),
    JWT_ALGORITHM: z.enum(JWT_ALGORITHMS).default("HS256"),
    TOKEN_TTL_DAYS: z.coerce.number().int().positive().max(365).default(7),
    BCRYPT_ROUNDS: z.coerce.number().int().min(4).max(15).default(12),

    // Chess workers service (move validation)
    WORKERS_URL: z.string().url().default("http://localhost:3000"),
    WORKERS_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),

    HOST: z.string().min(1).default("0.0.0.0"),
    PORT: z.coerce.number().int().min(1).max(65535).default(8000),

    // CORS allowed origins (comma-separated)
    ALLOWED_ORIGINS: z.string().optional(),
  })
  .refine((val) => !(val.NODE_ENV === "production" && !val.DATABASE_URL), {
    message: "DATABASE_URL is required in production",
    path: ["DATABASE_URL"],
  });

export interface AppConfig {
  readonly nodeEnv: "development" | "production" | "test";
  readonly appName: string;
  readonly logLevel: "debug" | "info" | "warn" | "error" | "fatal";
  readonly database: {
    readonly url?: string;
    readonly echo: boolean;
    readonly poolMax: number;
    readonly idleTimeoutMs: number;
    readonly connectionTimeoutMs: number;
  };
  readonly auth: {
    readonly jwtSecret: string;
    readonly jwtAlgorithm: JwtAlgorithm;
    readonly tokenTtlDays: number;
    readonly bcryptRounds: number;
  };
  readonly workers: {
    readonly baseUrl: string;
    readonly timeoutMs: number;
  };
  readonly server: {
    readonly host: string;
    readonly port: number;
    readonly allowedOrigins: readonly string[];
  };
}

/**
 * Parse and validate configuration once at startup.
 * The returned object is frozen and passed to every component that needs it.
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.errors.map((e) => `${e.path.join(".")}: ${e.message}`).join("\n");
    throw new Error(`Environment validation failed:\n${issues}`);
  }

  const env = parsed.data;
  return Object.freeze({
    nodeEnv: env.NODE_ENV,
    appName: env.APP_NAME,
    logLevel: env.LOG_LEVEL ?? (env.NODE_ENV === "production" ? "info" : "debug"),
    database: Object.freeze({
      url: env.DATABASE_URL,
      echo: env.SQL_ECHO,
      poolMax: env.DB_POOL_MAX,
      idleTimeoutMs: env.DB_POOL_IDLE_TIMEOUT_MS,
      connectionTimeoutMs: env.DB_POOL_CONNECTION_TIMEOUT_MS,
    }),
    auth: Object.freeze({
      jwtSecret: env.JWT_SECRET,
      jwtAlgorithm: env.JWT_ALGORITHM,
      tokenTtlDays: env.TOKEN_TTL_DAYS,
      bcryptRounds: env.BCRYPT_ROUNDS,
    }),
    workers: Object.freeze({
      baseUrl: env.WORKERS_URL.replace(/\/+$/, ""),
      timeoutMs: env.WORKERS_TIMEOUT_MS,
    }),
    server: Object.freeze({
      host: env.HOST,
      port: env.PORT,
      allowedOrigins: (env.ALLOWED_ORIGINS ?? "")
        .split(",")
        .map((origin) => origin.trim())
        .filter(Boolean),
    }),
  });
}
