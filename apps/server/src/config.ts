import { DungeonError } from "@cryptforge/contracts";
import { z } from "zod";

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(8000),
  HOST: z.string().min(1).default("0.0.0.0"),
  /** "*" or a comma-separated list of origins */
  CORS_ORIGIN: z.string().min(1).default("*"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),
});

export type NodeEnv = z.output<typeof EnvSchema>["NODE_ENV"];

export interface ServerConfig {
  readonly port: number;
  readonly host: string;
  readonly corsOrigin: string;
  readonly nodeEnv: NodeEnv;
}

/**
 * Read server settings from the environment.
 *
 * @throws {DungeonError} CONFIG_INVALID listing every rejected variable
 */
export function loadConfig(
  env: Readonly<Record<string, string | undefined>> = process.env,
): ServerConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw DungeonError.configInvalid("Invalid server environment", {
      issues: parsed.error.issues.map((issue) => ({
        path: issue.path.join("."),
        message: issue.message,
      })),
    });
  }

  return {
    port: parsed.data.PORT,
    host: parsed.data.HOST,
    corsOrigin: parsed.data.CORS_ORIGIN,
    nodeEnv: parsed.data.NODE_ENV,
  };
}

/**
 * Value for the CORS plugin's `origin` option.
 */
export function corsOrigins(config: ServerConfig): true | string[] {
  if (config.corsOrigin.trim() === "*") return true;
  return config.corsOrigin
    .split(",")
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);
}
