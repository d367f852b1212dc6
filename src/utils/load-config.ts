/**
 * Configuration Loader
 * Loads and merges configuration from defaults, user config and custom config
 */

import { readFile } from "fs/promises";
import { join } from "path";
import { existsSync } from "fs";
import envPaths from "env-paths";
import defaults from "../config/default.json";
import type { CheckConfig, PartialCheckConfig } from "../types/config";
import {
  CheckConfigSchema,
  PartialCheckConfigSchema,
} from "../types/config";

// Get OS-specific paths using env-paths (follows XDG spec on Linux)
const paths = envPaths("site-xref", { suffix: "" });

export interface ConfigError {
  path: string;
  error: unknown;
}

/**
 * Get the OS-specific config directory
 * - Linux: $XDG_CONFIG_HOME/site-xref or ~/.config/site-xref
 * - macOS: ~/Library/Preferences/site-xref
 * - Windows: %APPDATA%\site-xref
 */
function getConfigDirectory(): string {
  return paths.config;
}

/**
 * Get the path where user config should be stored
 */
export function getUserConfigPath(): string {
  return join(getConfigDirectory(), "config.json");
}

/**
 * Load default configuration with Zod validation
 */
export function loadDefaultConfig(): CheckConfig {
  return CheckConfigSchema.parse(defaults);
}

/**
 * Load a partial configuration file with Zod validation
 * Throws if the file is unreadable, not JSON, or fails the schema
 */
export async function loadPartialConfig(
  configPath: string,
): Promise<PartialCheckConfig> {
  const content = await readFile(configPath, "utf-8");
  const parsed: unknown = JSON.parse(content);
  return PartialCheckConfigSchema.parse(parsed);
}

/**
 * Deep merge a partial config over a complete one
 */
export function mergeConfig(
  base: CheckConfig,
  override: PartialCheckConfig,
): CheckConfig {
  return {
    input: {
      ...base.input,
      ...override.input,
      // Ignore globs accumulate instead of replacing
      ignore: [...base.input.ignore, ...(override.input?.ignore ?? [])],
    },
    scanner: { ...base.scanner, ...override.scanner },
    validate: { ...base.validate, ...override.validate },
    indexer: { ...base.indexer, ...override.indexer },
    logging: { ...base.logging, ...override.logging },
  };
}

interface LoadConfigResult {
  config: CheckConfig;
  errors: ConfigError[];
}

/**
 * Load and merge configuration
 * Priority: custom path > user config > default config
 * A config file that fails to load or validate is skipped and reported in errors
 */
export async function loadConfig(custom?: string): Promise<LoadConfigResult> {
  let config = loadDefaultConfig();
  const errors: ConfigError[] = [];

  const userConfigPath = getUserConfigPath();
  if (existsSync(userConfigPath)) {
    try {
      config = mergeConfig(config, await loadPartialConfig(userConfigPath));
    } catch (error) {
      errors.push({ path: userConfigPath, error });
    }
  }

  if (custom) {
    try {
      config = mergeConfig(config, await loadPartialConfig(custom));
    } catch (error) {
      errors.push({ path: custom, error });
    }
  }

  return { config, errors };
}
