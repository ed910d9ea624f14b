import { z } from "zod";
import { ConfigurationError } from "@clauseproof/integrity";

const envSchema = z.object({
  // Logging
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),

  // Proof demonstration
  CLAUSEPROOF_PROOF_CLAUSE: z.coerce.number().int().positive().default(2), // 1-based
  CLAUSEPROOF_ROOT_PREFIX: z.coerce.number().int().positive().default(10),

  // Runtime
  NODE_ENV: z.enum(["development", "production", "test"]).default("production"),
});

export type Env = z.infer<typeof envSchema>;

export function loadEnv(source: Record<string, string | undefined> = process.env): Env {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    throw new ConfigurationError(
      "Invalid environment configuration",
      result.error.flatten().fieldErrors
    );
  }

  return result.data;
}

export const env = loadEnv();
