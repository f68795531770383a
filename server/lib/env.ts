import { z } from "zod";

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  DATABASE_PATH: z.string().min(1).default("data/reading-log.sqlite"),
  CACHE_DIR: z.string().min(1).default("cache"),
  SESSION_SECRET: z
    .string()
    .min(16, "SESSION_SECRET must be at least 16 characters"),
  SESSION_COOKIE: z.string().min(1).default("session"),
});

export type AppConfig = z.infer<typeof envSchema>;

/**
 * Reads the server configuration from environment variables.
 * Throws with every problem listed when a variable is missing or malformed.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  const result = envSchema.safeParse(env);

  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${problems}`);
  }

  return result.data;
}
