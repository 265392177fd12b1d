/**
 * Configuration Loader
 * Loads and merges configuration from defaults and user config
 */

import { readFile } from "fs/promises";
import { join, dirname } from "path";
import { fileURLToPath } from "url";
import envPaths from "env-paths";
import { isFile } from "./is-file";
import type {
  ConversionConfig,
  PartialConversionConfig,
  ConfigError,
} from "../types";
import {
  ConversionConfigSchema,
  PartialConversionConfigSchema,
} from "../types";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Get OS-specific paths using env-paths (follows XDG spec on Linux)
const paths = envPaths("flare-to-asciidoc", { suffix: "" });

/**
 * Get the OS-specific config directory
 * - Linux: $XDG_CONFIG_HOME/flare-to-asciidoc or ~/.config/flare-to-asciidoc
 * - macOS: ~/Library/Preferences/flare-to-asciidoc
 * - Windows: %APPDATA%\flare-to-asciidoc
 */
function getConfigDirectory(): string {
  return paths.config;
}

/**
 * Load default configuration with Zod validation
 */
export async function loadDefaultConfig(): Promise<ConversionConfig> {
  const defaultConfigPath = join(__dirname, "..", "config", "default.json");
  const content = await readFile(defaultConfigPath, "utf-8");
  return ConversionConfigSchema.parse(JSON.parse(content));
}

/**
 * Load a partial configuration file with Zod validation
 * Throws error if config is invalid
 */
async function loadPartialConfig(
  configPath: string,
): Promise<PartialConversionConfig> {
  const content = await readFile(configPath, "utf-8");
  return PartialConversionConfigSchema.parse(JSON.parse(content));
}

/**
 * Load user configuration from OS-specific directory
 */
async function loadUserConfig(): Promise<PartialConversionConfig | null> {
  const userConfigPath = getUserConfigPath();

  if (!(await isFile(userConfigPath))) {
    return null;
  }

  return loadPartialConfig(userConfigPath);
}

/**
 * Deep merge a partial config over a complete one
 */
export function mergeConfig(
  base: ConversionConfig,
  override: PartialConversionConfig,
): ConversionConfig {
  return {
    input: override.input ?? base.input,
    output: override.output ?? base.output,
    files: { ...base.files, ...override.files },
    asciidoc: { ...base.asciidoc, ...override.asciidoc },
    snippets: {
      ...base.snippets,
      ...override.snippets,
      // Known names accumulate instead of replacing each other
      known: [...base.snippets.known, ...(override.snippets?.known ?? [])],
    },
    logging: { ...base.logging, ...override.logging },
  };
}

interface LoadConfigResult {
  config: ConversionConfig;
  errors: ConfigError[];
}

/**
 * Load and merge configuration
 * Priority: custom path > user config > default config
 * Files that fail to load or validate are skipped and reported
 */
export async function loadConfig(custom?: string): Promise<LoadConfigResult> {
  let config = await loadDefaultConfig();
  const errors: ConfigError[] = [];

  try {
    const userConfig = await loadUserConfig();
    if (userConfig) config = mergeConfig(config, userConfig);
  } catch (error) {
    errors.push({ path: getUserConfigPath(), error });
  }

  if (custom) {
    try {
      const customConfig = await loadPartialConfig(custom);
      config = mergeConfig(config, customConfig);
    } catch (error) {
      errors.push({ path: custom, error });
    }
  }

  return { config, errors };
}

/**
 * Get the path where user config should be stored
 */
export function getUserConfigPath(): string {
  return join(getConfigDirectory(), "config.json");
}
