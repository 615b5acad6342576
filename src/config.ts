import * as dotenv from "dotenv";
import * as os from "os";
import * as path from "path";
import { ValidationError } from "./errors";
import { LogLevel, parseLogLevel } from "./logger";

export const DEFAULT_COOKIE_PATH = "~/.runalyze-export/cookies.json";
export const DEFAULT_SAVE_DIR = "~/.runalyze-export/activities";

// Options as commander hands them over
export interface CliFlags {
  username?: string;
  password?: string;
  cookiePath?: string;
  saveDir?: string;
  until?: string;
  since?: string;
  json?: boolean;
  logLevel?: string;
  config?: string;
}

export interface AppConfig {
  username: string;
  password: string;
  cookiePath: string;
  saveDir: string;
  until?: string;
  since?: string;
  jsonMode: boolean;
  logLevel: LogLevel;
}

export type Env = Record<string, string | undefined>;

/**
 * Load a dotenv file into process.env. Without an explicit path a missing
 * .env is fine; an explicit path that cannot be read is an error.
 */
export function loadEnvFile(filePath?: string): void {
  const result = dotenv.config(filePath ? { path: filePath } : undefined);
  if (filePath && result.error) {
    throw new ValidationError(`failed to load config file ${filePath}: ${result.error.message}`, {
      cause: result.error,
    });
  }
}

/**
 * Replace a leading ~ with the home directory
 */
export function expandHome(filePath: string, homeDir: string = os.homedir()): string {
  if (filePath === "~") return homeDir;
  if (filePath.startsWith("~/")) return path.join(homeDir, filePath.substring(2));
  return filePath;
}

function firstSet(...values: (string | undefined)[]): string | undefined {
  return values.find((value) => value !== undefined && value !== "");
}

/**
 * Merge command line flags over environment variables over defaults
 */
export function loadConfig(flags: CliFlags, env: Env = process.env): AppConfig {
  const until = firstSet(flags.until);
  const since = firstSet(flags.since);

  return {
    username: firstSet(flags.username, env.RUNALYZE_USERNAME) ?? "",
    password: firstSet(flags.password, env.RUNALYZE_PASSWORD) ?? "",
    cookiePath: firstSet(flags.cookiePath, env.RUNALYZE_COOKIE_PATH) ?? DEFAULT_COOKIE_PATH,
    saveDir: firstSet(flags.saveDir, env.RUNALYZE_SAVE_DIR) ?? DEFAULT_SAVE_DIR,
    ...(until ? { until } : {}),
    ...(since ? { since } : {}),
    jsonMode: flags.json ?? false,
    logLevel: parseLogLevel(firstSet(flags.logLevel, env.LOG_LEVEL)),
  };
}
