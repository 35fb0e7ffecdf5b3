/**
 * Configuration loader with multi-path resolution and validation
 *
 * Config resolution order:
 * 1. Explicit path (if provided)
 * 2. Local directory (./tiered-search.config.json)
 * 3. XDG config ($XDG_CONFIG_HOME/tiered-search/config.json)
 *
 * With no file at any location, a default configuration is built from the
 * environment.
 */

import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { homedir } from "node:os";
import { join } from "node:path";
import { createLogger } from "../core/logger";
import type { TieredSearchConfig } from "./types";
import type { EngineConfigInput, TieredSearchConfigInput } from "./validation";
import { formatValidationErrors, validateConfigSafe } from "./validation";

const log = createLogger("Config");

/** Config file names */
const CONFIG_FILENAMES = {
  local: "tiered-search.config.json",
  xdgDir: "tiered-search",
  xdg: "config.json",
} as const;

export const DEFAULT_SEARXNG_URL = "http://localhost:8080";

/**
 * Get all possible config file paths in order of preference
 */
export function getConfigPaths(explicitPath?: string): string[] {
  const paths: string[] = [];

  if (explicitPath) {
    paths.push(explicitPath);
  }

  paths.push(join(process.cwd(), CONFIG_FILENAMES.local));

  const xdg = process.env.XDG_CONFIG_HOME;
  const baseDir = xdg || join(homedir(), ".config");
  paths.push(join(baseDir, CONFIG_FILENAMES.xdgDir, CONFIG_FILENAMES.xdg));

  return paths;
}

function readPositiveInt(name: string): number | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    log.warn(`Ignoring ${name}=${raw}: expected a positive integer`);
    return undefined;
  }
  return value;
}

/**
 * Build the default configuration from the environment
 *
 * SearXNG and DuckDuckGo serve the free tier; Exa and Tavily are added only
 * when their API keys are present.
 */
export function getDefaultConfig(): TieredSearchConfigInput {
  const searxngUrl = (process.env.SEARXNG_URL || DEFAULT_SEARXNG_URL).replace(/\/+$/, "");
  const engines: EngineConfigInput[] = [
    {
      id: "searxng",
      type: "searxng",
      displayName: "SearXNG",
      endpoint: `${searxngUrl}/search`,
    },
    {
      id: "duckduckgo",
      type: "duckduckgo",
      displayName: "DuckDuckGo",
    },
  ];

  if (process.env.EXA_API_KEY) {
    engines.push({ id: "exa", type: "exa", displayName: "Exa", apiKeyEnv: "EXA_API_KEY" });
  }

  if (process.env.TAVILY_API_KEY) {
    engines.push({
      id: "tavily",
      type: "tavily",
      displayName: "Tavily",
      apiKeyEnv: "TAVILY_API_KEY",
    });
  }

  const defaultLimit = readPositiveInt("DEFAULT_NUM_RESULTS");
  const timeoutSecs = readPositiveInt("REQUEST_TIMEOUT_SECS");

  return {
    engines,
    retrieval: {
      ...(defaultLimit !== undefined ? { defaultLimit: Math.min(defaultLimit, 50) } : {}),
      ...(timeoutSecs !== undefined ? { timeoutMs: timeoutSecs * 1000 } : {}),
    },
  };
}

function validateOrThrow(raw: unknown, source: string): TieredSearchConfig {
  const result = validateConfigSafe(raw);
  if (!result.success) {
    const errors = formatValidationErrors(result.error);
    throw new Error(
      `Invalid configuration in ${source}:\n${errors.map((e) => `  - ${e}`).join("\n")}`,
    );
  }
  return result.data;
}

/**
 * Load configuration from the first available config file
 *
 * @param explicitPath Optional explicit path to a JSON config file
 * @returns Validated configuration with every default filled in
 * @throws Error if a found file cannot be parsed or fails validation
 *
 * @example
 * ```typescript
 * // Load from default locations
 * const config = await loadConfig();
 *
 * // Load from specific path
 * const config = await loadConfig('./my-config.json');
 * ```
 */
export async function loadConfig(explicitPath?: string): Promise<TieredSearchConfig> {
  if (explicitPath && !existsSync(explicitPath)) {
    throw new Error(`Config file not found: ${explicitPath}`);
  }

  for (const path of getConfigPaths(explicitPath)) {
    if (!existsSync(path)) {
      continue;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(await readFile(path, "utf8"));
    } catch (error) {
      throw new Error(
        `Failed to load config file at ${path}: ${error instanceof Error ? error.message : String(error)}`,
      );
    }

    log.debug(`Loaded configuration from ${path}`);
    return validateOrThrow(raw, path);
  }

  log.debug("No config file found, using defaults from environment");
  return validateOrThrow(getDefaultConfig(), "default configuration");
}

/**
 * Validate an in-memory configuration, filling defaults
 *
 * @throws Error listing every validation issue
 */
export function resolveConfig(config: TieredSearchConfigInput): TieredSearchConfig {
  return validateOrThrow(config, "provided configuration");
}

/**
 * Check if a config file exists at any of the standard locations
 */
export function configExists(): boolean {
  return getConfigPaths().some((path) => existsSync(path));
}
