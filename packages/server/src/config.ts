/**
 * Server configuration
 *
 * Read from the environment, with .env.local at the repo root loaded first.
 */

import { config as loadEnvFile } from "dotenv";
import { resolve, dirname } from "path";
import { fileURLToPath } from "url";
import { z } from "zod";
import { TIDEPOOL_BASE_URL } from "@glucose-report/tidepool";
import { ConfigError } from "./errors.js";

const __dirname = dirname(fileURLToPath(import.meta.url));

const ENV_FILE = resolve(__dirname, "../../../.env.local");
export const DEFAULT_STATIC_DIR = resolve(__dirname, "../static");

const EnvSchema = z.object({
  TIDEPOOL_API_URL: z.string().url().default(TIDEPOOL_BASE_URL),
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  STATIC_DIR: z.string().default(DEFAULT_STATIC_DIR),
});

export interface ServerConfig {
  /** Tidepool API root */
  apiUrl: string;
  port: number;
  /** Timeout for each Tidepool call */
  timeoutMs: number;
  /** Directory served under /static/ */
  staticDir: string;
}

/**
 * Validate configuration from an environment map. Empty values count as unset.
 */
export function parseConfig(env: Record<string, string | undefined>): ServerConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== "")
  );

  const result = EnvSchema.safeParse(present);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }

  return {
    apiUrl: result.data.TIDEPOOL_API_URL,
    port: result.data.PORT,
    timeoutMs: result.data.REQUEST_TIMEOUT_MS,
    staticDir: resolve(result.data.STATIC_DIR),
  };
}

/**
 * Load .env.local (if any) into process.env and parse it
 */
export function loadConfig(): ServerConfig {
  loadEnvFile({ path: ENV_FILE });
  return parseConfig(process.env);
}
