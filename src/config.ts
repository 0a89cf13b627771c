import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import path from "node:path";
import { type } from "arktype";
import {
  DEFAULT_CONFIG_PATH,
  DEFAULT_FALLBACK_CONFIG_PATH,
  DEFAULT_SERVER_COMMAND,
  DEFAULT_SERVER_PROJECT,
} from "./shared/constants.js";
import { getEnv } from "./shared/env.js";
import { ConfigError } from "./shared/errors.js";
import { log } from "./shared/logging.js";

export interface LoadedConfig {
  /** The file the config was read from. */
  path: string;
  config: unknown;
}

/**
 * Read the first of `primaryPath` / `fallbackPath` that exists. Returns null when
 * neither does; callers then fall back to built-in values. No merging.
 */
export async function loadJsonConfig(
  primaryPath = DEFAULT_CONFIG_PATH,
  fallbackPath = DEFAULT_FALLBACK_CONFIG_PATH
): Promise<LoadedConfig | null> {
  const chosen = [primaryPath, fallbackPath].find((candidate) => existsSync(candidate));
  if (chosen === undefined) {
    log.info("No configuration files found. Using built-in values.");
    return null;
  }
  log.info(`Reading settings from ${chosen}`);
  const raw = await readFile(chosen, "utf8");
  try {
    return { path: chosen, config: JSON.parse(raw) as unknown };
  } catch (err) {
    throw new ConfigError(
      `Invalid JSON in ${chosen}: ${err instanceof Error ? err.message : String(err)}`,
      chosen,
      { cause: err }
    );
  }
}

/** Optional `mcpServer` section of the config file. */
export const McpServerSectionSchema = type({
  "command?": "string",
  "args?": "string[]",
  "project?": "string",
  "cwd?": "string",
  "requestTimeoutMs?": "number > 0",
});
export type McpServerSection = typeof McpServerSectionSchema.infer;

const ConfigFileSchema = type({
  "mcpServer?": McpServerSectionSchema,
});

export interface SettingsOverrides {
  command?: string;
  project?: string;
  timeoutMs?: number;
}

export interface ClientSettings {
  command: string;
  args: string[];
  cwd?: string;
  requestTimeoutMs?: number;
}

/** Parse a positive integer from a flag or env value; undefined for absent input. */
export function parseTimeoutMs(value: string | undefined, source: string): number | undefined {
  if (value === undefined) return undefined;
  const ms = Number(value);
  if (!Number.isInteger(ms) || ms <= 0) {
    throw new ConfigError(`${source} must be a positive integer (milliseconds), got "${value}"`, source);
  }
  return ms;
}

/**
 * Layer CLI overrides over environment variables over the config file over built-in defaults.
 * An explicit `args` list in the file wins over the project-derived `dotnet run` arguments.
 */
export function resolveClientSettings(
  loaded: LoadedConfig | null,
  overrides: SettingsOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): ClientSettings {
  let section: McpServerSection = {};
  if (loaded) {
    const parsed = ConfigFileSchema(loaded.config);
    if (parsed instanceof type.errors) {
      throw new ConfigError(`Invalid settings in ${loaded.path}: ${parsed.summary}`, loaded.path);
    }
    section = parsed.mcpServer ?? {};
  }

  const command = overrides.command ?? getEnv("COMMAND", env) ?? section.command ?? DEFAULT_SERVER_COMMAND;
  const project = overrides.project ?? getEnv("PROJECT", env) ?? section.project ?? DEFAULT_SERVER_PROJECT;
  const args =
    overrides.project === undefined && section.args !== undefined
      ? section.args
      : ["run", "--project", path.resolve(project), "--no-build"];
  const requestTimeoutMs =
    overrides.timeoutMs ??
    parseTimeoutMs(getEnv("TIMEOUT_MS", env), "EWS_MCP_TIMEOUT_MS") ??
    section.requestTimeoutMs;

  return {
    command,
    args,
    ...(section.cwd !== undefined && { cwd: section.cwd }),
    ...(requestTimeoutMs !== undefined && { requestTimeoutMs }),
  };
}
