import { z } from "zod";

const booleanFlag = (fallback: "true" | "false") =>
  z
    .string()
    .transform((val) => val === "true")
    .default(fallback);

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  PORT: z.coerce.number().min(1).max(65535).default(8080),

  // Storage
  DATABASE_PATH: z.string().min(1).default("data/pantry.sqlite"),

  // Listing
  SEARCH_CASE_SENSITIVE: booleanFlag("false"),

  // Rate limiting
  API_RATE_WINDOW_MS: z.coerce.number().default(60_000),
  API_RATE_MAX: z.coerce.number().default(300),

  // CORS
  CORS_ORIGIN: z.string().default("*"),

  // Logging
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).optional(),
  LOG_PRETTY: booleanFlag("false"),
});

export type Env = z.infer<typeof envSchema>;

let env: Env | undefined;

export function getEnv(): Env {
  if (env) {
    return env;
  }

  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    console.error("Invalid environment variables:");
    console.error(result.error.flatten().fieldErrors);
    throw new Error("Invalid environment configuration");
  }

  env = result.data;
  return env;
}

export function initEnv(): Env {
  const e = getEnv();

  if (e.NODE_ENV === "development") {
    console.log("Running in development mode");
    console.log("Port:", e.PORT);
    console.log("Database:", e.DATABASE_PATH);
  }

  return e;
}

export function resolveLogLevel(e: Env): NonNullable<Env["LOG_LEVEL"]> {
  if (e.LOG_LEVEL) {
    return e.LOG_LEVEL;
  }
  return e.NODE_ENV === "test" ? "silent" : "info";
}
