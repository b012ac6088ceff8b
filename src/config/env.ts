/**
 * Validates environment variables at boot.
 * Fails fast with clear error messages if any are missing or invalid.
 */

import { z } from "zod";
import type { TableConfig } from "../poker/types";

const intVar = (fallback: number) =>
  z
    .string()
    .regex(/^\d+$/, "must be a non-negative integer")
    .default(String(fallback))
    .transform(Number);

const envSchema = z
  .object({
    // Redis
    REDIS_URL: z.string().url("REDIS_URL must be a valid Redis connection string"),

    // JWT
    JWT_SECRET: z.string().min(32, "JWT_SECRET must be at least 32 characters for security"),

    // Server
    PORT: intVar(3001),
    CORS_ORIGIN: z.string().default("http://localhost:3000"),

    // Table
    SMALL_BLIND: intVar(5),
    BIG_BLIND: intVar(10),
    MIN_PLAYERS: intVar(2),
    MAX_PLAYERS: intVar(8),
    STARTING_STAKE: intVar(1000),
    MAX_TURN_MS: intVar(120_000),
    SETTLEMENT_MODE: z.enum(["SIDE_POTS", "PROPORTIONAL"]).default("SIDE_POTS"),

    LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).optional(),
    NODE_ENV: z.enum(["development", "production", "test"]).optional(),
  })
  .superRefine((env, ctx) => {
    if (env.SMALL_BLIND <= 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["SMALL_BLIND"], message: "SMALL_BLIND must be positive" });
    }
    if (env.BIG_BLIND <= env.SMALL_BLIND) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["BIG_BLIND"], message: "BIG_BLIND must be greater than SMALL_BLIND" });
    }
    if (env.MIN_PLAYERS < 2) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["MIN_PLAYERS"], message: "MIN_PLAYERS must be at least 2" });
    }
    if (env.MAX_PLAYERS < env.MIN_PLAYERS) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["MAX_PLAYERS"], message: "MAX_PLAYERS must not be below MIN_PLAYERS" });
    }
  });

export type Env = z.infer<typeof envSchema>;

export function parseEnv(source: Record<string, string | undefined>) {
  return envSchema.safeParse(source);
}

/**
 * Validates process.env and returns typed config.
 * Exits the process on validation failure.
 */
export function validateEnv(): Env {
  const result = parseEnv(process.env);

  if (!result.success) {
    console.error("❌ Environment validation failed:");
    console.error("");

    for (const issue of result.error.issues) {
      const path = issue.path.join(".");
      console.error(`  ${path}: ${issue.message}`);
    }

    console.error("");
    console.error("Please check your .env file and ensure all required variables are set.");
    process.exit(1);
  }

  return result.data;
}

export function tableConfigFromEnv(env: Env): TableConfig {
  return {
    smallBlind: env.SMALL_BLIND,
    bigBlind: env.BIG_BLIND,
    minPlayers: env.MIN_PLAYERS,
    maxPlayers: env.MAX_PLAYERS,
    maxTurnMs: env.MAX_TURN_MS,
    settlement: env.SETTLEMENT_MODE,
  };
}

/**
 * Logs validated config (safe: hides sensitive values).
 */
export function logEnvSummary(env: Env) {
  console.log("✅ Environment validated:");
  console.log(`  NODE_ENV: ${env.NODE_ENV ?? "development"}`);
  console.log(`  PORT: ${env.PORT}`);
  console.log(`  REDIS_URL: ${maskConnectionString(env.REDIS_URL)}`);
  console.log(`  JWT_SECRET: [SET]`);
  console.log(`  CORS_ORIGIN: ${env.CORS_ORIGIN}`);
  console.log(`  BLINDS: ${env.SMALL_BLIND}/${env.BIG_BLIND}`);
  console.log(`  PLAYERS: ${env.MIN_PLAYERS}-${env.MAX_PLAYERS}`);
  console.log(`  STARTING_STAKE: ${env.STARTING_STAKE}`);
  console.log(`  MAX_TURN_MS: ${env.MAX_TURN_MS}`);
  console.log(`  SETTLEMENT_MODE: ${env.SETTLEMENT_MODE}`);
}

export function maskConnectionString(url: string): string {
  try {
    const u = new URL(url);
    if (u.password) u.password = "***";
    return u.toString();
  } catch {
    return "[INVALID_URL]";
  }
}
