/**
 * nstest runner configuration loader.
 * Precedence: ./.nstest.json > ~/.nstest/config.json > defaults
 */
import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import { z } from "zod";
import { createEnvironment } from "./env.js";
import type { RunEnvironment } from "./env.js";
import { ConfigurationError, errorMessage } from "./errors.js";
import { LOG_LEVELS, createLogger, isLogLevel } from "./logger.js";
import type { LogLevel, Logger } from "./logger.js";

export const PROJECT_CONFIG_FILE = ".nstest.json";

const patternSchema = z.string().refine(
  (src) => {
    try {
      new RegExp(src);
      return true;
    } catch {
      return false;
    }
  },
  { message: "must be a valid regular expression" }
);

const configSchema = z
  .object({
    version: z.literal(1).default(1),
    reporter: z.string().min(1).default("default"),
    include: patternSchema.optional(),
    exclude: patternSchema.optional(),
    logLevel: z
      .string()
      .refine(isLogLevel, { message: `must be one of ${LOG_LEVELS.join(", ")}` })
      .optional(),
  })
  .strict();

export interface RunnerConfig {
  version: 1;
  reporter: string;
  include?: string;
  exclude?: string;
  logLevel?: LogLevel;
}

export interface ResolvedConfig {
  config: RunnerConfig;
  source: "project" | "user" | "default";
  path: string | null;
}

export const DEFAULT_CONFIG: RunnerConfig = {
  version: 1,
  reporter: "default",
};

/** Validate parsed config JSON. `origin` names the file in error messages. */
export function parseConfig(data: unknown, origin: string): RunnerConfig {
  const parsed = configSchema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? `'${issue.path.join(".")}' ` : "";
    throw new ConfigurationError(
      "E_CONFIG",
      `Invalid config ${origin}: ${where}${issue?.message ?? "invalid"}`,
      { path: origin }
    );
  }
  const { version, reporter, include, exclude, logLevel } = parsed.data;
  const config: RunnerConfig = { version, reporter };
  if (include !== undefined) config.include = include;
  if (exclude !== undefined) config.exclude = exclude;
  if (isLogLevel(logLevel)) config.logLevel = logLevel;
  return config;
}

function tryLoadConfigFile(filePath: string): RunnerConfig | null {
  if (!fs.existsSync(filePath)) return null;
  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (e) {
    throw new ConfigurationError(
      "E_CONFIG",
      `Cannot read config ${filePath}: ${errorMessage(e)}`,
      { path: filePath }
    );
  }
  return parseConfig(data, filePath);
}

export function resolveConfig(cwd?: string, homeDir?: string): ResolvedConfig {
  const projectPath = path.join(cwd ?? process.cwd(), PROJECT_CONFIG_FILE);
  const userPath = path.join(homeDir ?? os.homedir(), ".nstest", "config.json");

  const projectConfig = tryLoadConfigFile(projectPath);
  if (projectConfig) {
    return { config: projectConfig, source: "project", path: projectPath };
  }

  const userConfig = tryLoadConfigFile(userPath);
  if (userConfig) {
    return { config: userConfig, source: "user", path: userPath };
  }

  return { config: DEFAULT_CONFIG, source: "default", path: null };
}

export function loadConfig(cwd?: string, homeDir?: string): RunnerConfig {
  return resolveConfig(cwd, homeDir).config;
}

/** Namespaces matching `include` (whole name) and not matching `exclude`. */
export function selectNamespaces(names: readonly string[], config: RunnerConfig): string[] {
  const include = config.include !== undefined ? new RegExp(`^(?:${config.include})$`) : null;
  const exclude = config.exclude !== undefined ? new RegExp(`^(?:${config.exclude})$`) : null;
  return names.filter((ns) => (!include || include.test(ns)) && !(exclude && exclude.test(ns)));
}

export function environmentFromConfig(config: RunnerConfig): RunEnvironment {
  return createEnvironment({ reporter: config.reporter });
}

export function loggerFromConfig(config: RunnerConfig): Logger {
  return createLogger(config.logLevel ?? "warn");
}
