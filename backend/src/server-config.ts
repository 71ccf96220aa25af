/**
 * Server Configuration
 *
 * Resolves the server settings from environment variables, an optional
 * `deckbridge.yaml` in the data directory, and defaults (in that order of
 * precedence).
 */

import { readFile } from "node:fs/promises";
import { homedir } from "node:os";
import { join } from "node:path";
import yaml from "js-yaml";
import { z } from "zod";
import { formatZodError } from "./errors";
import { DEFAULT_PROFILE_NAME } from "./host/profile-manager";
import { createLogger, isLogLevel, levelFromEnv, LOG_LEVELS, type LogLevel } from "./logger";

const log = createLogger("Config");

/**
 * Configuration file name, looked up in the data directory.
 */
export const CONFIG_FILE_NAME = "deckbridge.yaml";

export const DEFAULT_HOST = "127.0.0.1";
export const DEFAULT_PORT = 8765;
export const DEFAULT_PROFILE = DEFAULT_PROFILE_NAME;

/**
 * Resolved server settings.
 */
export interface ServerConfig {
  host: string;
  port: number;
  /** Root directory holding profiles and the config file */
  dataDir: string;
  /** Allowed CORS origins; ["*"] allows any */
  corsOrigins: string[];
  /** When set, every action request must carry it as `key` */
  apiKey?: string;
  /** Profile opened at startup */
  defaultProfile: string;
  logLevel: LogLevel;
}

/**
 * Schema for the YAML config file. Every key is optional.
 */
const FileConfigSchema = z.object({
  host: z.string().min(1).optional(),
  port: z.number().int().min(1).max(65535).optional(),
  corsOrigins: z.array(z.string().min(1)).optional(),
  apiKey: z.string().min(1).optional(),
  defaultProfile: z.string().min(1).optional(),
  logLevel: z.enum(LOG_LEVELS).optional(),
});

export type FileConfig = z.infer<typeof FileConfigSchema>;

type Env = Record<string, string | undefined>;

/**
 * Get the data directory from environment variable or use ~/.deckbridge
 */
export function getDataDir(env: Env = process.env): string {
  const envDir = env.DECKBRIDGE_DATA_DIR;
  if (envDir) {
    return envDir;
  }
  return join(homedir(), ".deckbridge");
}

/**
 * Get the port from environment variable or use the fallback
 */
export function getPort(env: Env = process.env, fallback = DEFAULT_PORT): number {
  const envPort = env.PORT;
  if (envPort) {
    const parsed = parseInt(envPort, 10);
    if (!isNaN(parsed) && parsed > 0 && parsed <= 65535) {
      return parsed;
    }
    log.warn(`Invalid PORT "${envPort}", using default ${fallback}`);
  }
  return fallback;
}

/**
 * Parses a comma-separated origin list. Blank entries are dropped.
 */
export function parseOrigins(value: string): string[] {
  return value
    .split(",")
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);
}

/**
 * Loads deckbridge.yaml from the data directory if it exists.
 *
 * @returns Parsed configuration, or an empty object when the file is
 *   missing or invalid
 */
export async function loadFileConfig(dataDir: string): Promise<FileConfig> {
  const configPath = join(dataDir, CONFIG_FILE_NAME);

  let content: string;
  try {
    content = await readFile(configPath, "utf-8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return {};
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    log.warn(`Failed to parse ${configPath}: ${message}`);
    return {};
  }

  // An empty file parses to null
  if (parsed === null || parsed === undefined) {
    return {};
  }

  const result = FileConfigSchema.safeParse(parsed);
  if (!result.success) {
    log.warn(`Invalid config in ${configPath}: ${formatZodError(result.error)}`);
    return {};
  }

  return result.data;
}

/**
 * Resolves the full server configuration.
 */
export async function loadServerConfig(env: Env = process.env): Promise<ServerConfig> {
  const dataDir = getDataDir(env);
  const file = await loadFileConfig(dataDir);

  const envLevel = env.LOG_LEVEL?.trim().toLowerCase();
  const corsOrigins = env.DECKBRIDGE_CORS_ORIGINS
    ? parseOrigins(env.DECKBRIDGE_CORS_ORIGINS)
    : file.corsOrigins ?? ["*"];

  return {
    host: env.HOST || file.host || DEFAULT_HOST,
    port: getPort(env, file.port ?? DEFAULT_PORT),
    dataDir,
    corsOrigins: corsOrigins.length > 0 ? corsOrigins : ["*"],
    apiKey: env.DECKBRIDGE_API_KEY || file.apiKey,
    defaultProfile: env.DECKBRIDGE_PROFILE || file.defaultProfile || DEFAULT_PROFILE,
    logLevel: envLevel && isLogLevel(envLevel) ? envLevel : file.logLevel ?? levelFromEnv(env),
  };
}
