/**
 * Configuration loading and path expansion utilities
 */

import { config as loadEnv } from "dotenv";
import { existsSync, readFileSync } from "fs";
import { isAbsolute, join } from "path";
import { InputContractError } from "./errors";
import { isVerbosity, Verbosity } from "./logger";
import { isRetryMode, resolveRetryConfig } from "./retry";
import { RetryConfig } from "./types";
import { isPlainObject } from "./utils";

export const CONFIG_FILE_NAME = "reckon.config.json";
export const DEFAULT_ENV_SEARCH_PATHS = [".env"];
export const DEFAULT_TIMEOUT_MS = 10000;
export const CREDENTIAL_VARIABLES = ["OPENAI_API_KEY", "GEMINI_API_KEY"];
export const LOG_LEVEL_VARIABLE = "RECKON_LOG_LEVEL";

export interface ReckonConfigFile {
  envSearchPaths?: string[];
  numTries?: number;
  mode?: string;
  backoffBaseMs?: number;
  backoffMaxMs?: number;
  timeoutMs?: number;
  logLevel?: string;
}

function pickNumber(source: Record<string, unknown>, key: string): number | undefined {
  const value = source[key];
  return typeof value === "number" ? value : undefined;
}

function pickString(source: Record<string, unknown>, key: string): string | undefined {
  const value = source[key];
  return typeof value === "string" ? value : undefined;
}

export class ConfigManager {
  private config: ReckonConfigFile;
  private projectRoot: string;

  constructor(projectRoot: string, configPath: string = join(projectRoot, CONFIG_FILE_NAME)) {
    this.projectRoot = projectRoot;
    this.config = this.readConfig(configPath);
  }

  private readConfig(configPath: string): ReckonConfigFile {
    if (!existsSync(configPath)) {
      return { envSearchPaths: DEFAULT_ENV_SEARCH_PATHS };
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(configPath, "utf8"));
    } catch {
      return { envSearchPaths: DEFAULT_ENV_SEARCH_PATHS };
    }
    if (!isPlainObject(parsed)) {
      return { envSearchPaths: DEFAULT_ENV_SEARCH_PATHS };
    }

    const paths = parsed.envSearchPaths;
    return {
      envSearchPaths: Array.isArray(paths) ? paths.filter((p): p is string => typeof p === "string") : undefined,
      numTries: pickNumber(parsed, "numTries"),
      mode: pickString(parsed, "mode"),
      backoffBaseMs: pickNumber(parsed, "backoffBaseMs"),
      backoffMaxMs: pickNumber(parsed, "backoffMaxMs"),
      timeoutMs: pickNumber(parsed, "timeoutMs"),
      logLevel: pickString(parsed, "logLevel"),
    };
  }

  expandPath(rawPath: string): string {
    if (rawPath.startsWith("~/")) {
      const home = process.env.HOME;
      if (!home) {
        return rawPath.slice(2);
      }
      return join(home, rawPath.slice(2));
    }

    if (isAbsolute(rawPath)) {
      return rawPath;
    }

    return join(this.projectRoot, rawPath);
  }

  getEnvSearchPaths(): string[] {
    return this.config.envSearchPaths ?? DEFAULT_ENV_SEARCH_PATHS;
  }

  /**
   * Load .env files in search order until every variable in `required` is set.
   * Variables already in the environment are never overridden.
   * Returns the files that were loaded.
   */
  loadEnvironment(required: readonly string[] = CREDENTIAL_VARIABLES): string[] {
    const loaded: string[] = [];
    for (const candidate of this.getEnvSearchPaths()) {
      if (required.every((name) => process.env[name])) {
        break;
      }
      const expanded = this.expandPath(candidate);
      if (!existsSync(expanded)) {
        continue;
      }
      loadEnv({ path: expanded, override: false });
      loaded.push(expanded);
    }
    return loaded;
  }

  /**
   * Retry settings from the config file, validated and with defaults filled in
   */
  getRetryConfig(): RetryConfig {
    const { mode } = this.config;
    if (mode !== undefined && !isRetryMode(mode)) {
      throw new InputContractError(`Unknown mode "${mode}" in ${CONFIG_FILE_NAME}`);
    }
    return resolveRetryConfig({
      numTries: this.config.numTries,
      mode,
      backoffBaseMs: this.config.backoffBaseMs,
      backoffMaxMs: this.config.backoffMaxMs,
    });
  }

  getTimeoutMs(): number {
    return this.config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  /**
   * Verbosity from the environment first, then the config file. Unknown
   * values mean silent.
   */
  getLogLevel(env: NodeJS.ProcessEnv = process.env): Verbosity {
    const raw = env[LOG_LEVEL_VARIABLE] ?? this.config.logLevel;
    if (raw === undefined) {
      return "silent";
    }
    const level = raw.trim().toLowerCase();
    return isVerbosity(level) ? level : "silent";
  }

  getConfig(): ReckonConfigFile {
    return this.config;
  }
}
