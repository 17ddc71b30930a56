import { z } from "zod";
import { INSECURE_DEFAULT_JWT_SECRET, type ExpiryPolicy } from "./lib/tokens.js";

const EnvSchema = z.object({
  // Either a full URL, or the POSTGRES_* pieces below (docker-compose style)
  DATABASE_URL: z.string().optional(),
  POSTGRES_USER: z.string().optional(),
  POSTGRES_PASSWORD: z.string().optional(),
  POSTGRES_HOST: z.string().optional(),
  POSTGRES_PORT: z.string().regex(/^\d+$/, "POSTGRES_PORT must be a number").optional(),
  POSTGRES_DB: z.string().optional(),
  DATA_STORE: z.enum(["postgres", "memory"]).optional(),
  PORT: z
    .string()
    .optional()
    .transform((s) => (s ? Number(s) : 3001))
    .pipe(z.number().int().min(0).max(65535)),
  HOST: z.string().optional(),
  JWT_SECRET: z.string().optional(),
  JWT_EXPIRY_POLICY: z.enum(["ignore", "enforce"]).optional(),
  APP_ORIGIN: z.string().url().optional().or(z.literal("")),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).optional(),
});

export type Config = {
  port: number;
  host: string;
  dataStore: "postgres" | "memory";
  databaseUrl: string;
  jwtSecret: string;
  jwtSecretIsDefault: boolean;
  jwtExpiryPolicy: ExpiryPolicy;
  appOrigin: string | null;
  logLevel: string;
};

export type ConfigResult =
  | { ok: true; config: Config; warnings: string[] }
  | { ok: false; issues: string[] };

function composeDatabaseUrl(env: z.infer<typeof EnvSchema>): string {
  if (env.DATABASE_URL?.trim()) return env.DATABASE_URL.trim();
  const user = encodeURIComponent(env.POSTGRES_USER || "postgres");
  const password = encodeURIComponent(env.POSTGRES_PASSWORD || "postgres");
  const host = env.POSTGRES_HOST || "localhost";
  const port = env.POSTGRES_PORT || "5432";
  const db = env.POSTGRES_DB || "postgres";
  return `postgres://${user}:${password}@${host}:${port}/${db}`;
}

export function loadConfig(source: Record<string, string | undefined>): ConfigResult {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    return {
      ok: false,
      issues: parsed.error.issues.map((i) => `${i.path.join(".") || "env"}: ${i.message}`),
    };
  }
  const env = parsed.data;
  const warnings: string[] = [];

  const secret = env.JWT_SECRET?.trim() ?? "";
  if (!secret) {
    warnings.push(
      "JWT_SECRET is not set; using the built-in insecure default. Anyone can forge tokens. Set JWT_SECRET before exposing this service.",
    );
  }
  const dataStore = env.DATA_STORE ?? "postgres";
  if (dataStore === "memory") {
    warnings.push("DATA_STORE=memory: all data is lost when the process exits.");
  }

  return {
    ok: true,
    warnings,
    config: {
      port: env.PORT,
      host: env.HOST || "0.0.0.0",
      dataStore,
      databaseUrl: composeDatabaseUrl(env),
      jwtSecret: secret || INSECURE_DEFAULT_JWT_SECRET,
      jwtSecretIsDefault: !secret,
      jwtExpiryPolicy: env.JWT_EXPIRY_POLICY ?? "ignore",
      appOrigin: env.APP_ORIGIN ? env.APP_ORIGIN.replace(/\/$/, "") : null,
      logLevel: env.LOG_LEVEL ?? "info",
    },
  };
}
