/**
 * Configuration loading, environment overrides and path expansion
 */

import { existsSync, readFileSync } from "fs";
import { isAbsolute, join, relative, sep } from "path";
import { config as loadEnv } from "dotenv";
import { isLogLevel, LogLevel } from "./logger";
import { Config } from "./types";

export const CONFIG_FILE_NAME = "datacompat.config.json";
export const DEFAULT_ENV_SEARCH_PATHS = [".env"];
export const DEFAULT_TSCONFIG_PATH = "tsconfig.json";
export const DEFAULT_SOURCE_GLOBS = ["src/**/*.ts"];
export const DEFAULT_OUTPUT_DIR = "generated/datacompat";
export const DEFAULT_RUNTIME_MODULE = "ts-datacompat";
export const DEFAULT_MAX_ROUNDS = 10;
export const DEFAULT_LOG_LEVEL: LogLevel = "info";

export const ENV_LOG_LEVEL = "DATACOMPAT_LOG_LEVEL";
export const ENV_OUTPUT_DIR = "DATACOMPAT_OUTPUT_DIR";

export class ConfigManager {
  private config: Config;
  private projectRoot: string;

  constructor(projectRoot: string, configPath: string = join(projectRoot, CONFIG_FILE_NAME)) {
    this.projectRoot = projectRoot;
    this.config = this.readConfig(configPath);
  }

  private readConfig(configPath: string): Config {
    if (!existsSync(configPath)) {
      return {};
    }

    try {
      const raw = readFileSync(configPath, "utf8");
      const parsed: unknown = JSON.parse(raw);
      return typeof parsed === "object" && parsed !== null && !Array.isArray(parsed) ? (parsed as Config) : {};
    } catch {
      return {};
    }
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

  /**
   * Load the first-found values from every configured .env file.
   * Variables already present in the environment are never overridden.
   */
  loadEnvironment(): string[] {
    const loaded: string[] = [];
    for (const candidate of this.getEnvSearchPaths()) {
      const expanded = this.expandPath(candidate);
      if (!existsSync(expanded)) {
        continue;
      }
      loadEnv({ path: expanded, override: false });
      loaded.push(expanded);
    }
    return loaded;
  }

  getProjectRoot(): string {
    return this.projectRoot;
  }

  getEnvSearchPaths(): string[] {
    return this.config.envSearchPaths ?? DEFAULT_ENV_SEARCH_PATHS;
  }

  getTsConfigPath(): string {
    return this.expandPath(this.config.tsConfigPath ?? DEFAULT_TSCONFIG_PATH);
  }

  getSourceGlobs(): string[] {
    return this.config.sourceGlobs ?? DEFAULT_SOURCE_GLOBS;
  }

  /**
   * Output directory, relative to the project root with `/` separators.
   * Absolute and `~/` values are expanded first, so they may resolve to `../` paths.
   */
  getOutputDir(): string {
    const rawPath = process.env[ENV_OUTPUT_DIR] || this.config.outputDir || DEFAULT_OUTPUT_DIR;
    return relative(this.projectRoot, this.expandPath(rawPath)).split(sep).join("/");
  }

  getRuntimeModule(): string {
    return this.config.runtimeModule ?? DEFAULT_RUNTIME_MODULE;
  }

  getMaxRounds(): number {
    const rounds = this.config.maxRounds;
    return typeof rounds === "number" && Number.isInteger(rounds) && rounds > 0 ? rounds : DEFAULT_MAX_ROUNDS;
  }

  getLogLevel(): LogLevel {
    const fromEnv = process.env[ENV_LOG_LEVEL];
    if (isLogLevel(fromEnv)) {
      return fromEnv;
    }
    return isLogLevel(this.config.logLevel) ? this.config.logLevel : DEFAULT_LOG_LEVEL;
  }

  getConfig(): Config {
    return this.config;
  }
}
