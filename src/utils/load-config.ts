import { readFile } from "fs/promises";
import { join, dirname } from "path";
import { existsSync } from "fs";
import { fileURLToPath } from "url";
import envPaths from "env-paths";
import type {
  ConfigError,
  DiffpressConfig,
  PartialDiffpressConfig,
} from "../types";
import {
  DiffpressConfigSchema,
  PartialDiffpressConfigSchema,
} from "../types";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const paths = envPaths("diffpress", { suffix: "" });

function getConfigDirectory(): string {
  return paths.config;
}

/**
 * Load default configuration with Zod validation
 */
export async function loadDefaultConfig(): Promise<DiffpressConfig> {
  const defaultConfigPath = join(__dirname, "..", "config", "default.json");
  const content = await readFile(defaultConfigPath, "utf-8");
  return DiffpressConfigSchema.parse(JSON.parse(content));
}

async function loadPartialConfig(configPath: string): Promise<PartialDiffpressConfig> {
  const content = await readFile(configPath, "utf-8");
  return PartialDiffpressConfigSchema.parse(JSON.parse(content));
}

async function loadUserConfig(): Promise<PartialDiffpressConfig | null> {
  const userConfigPath = getUserConfigPath();

  if (!existsSync(userConfigPath)) {
    return null;
  }

  return loadPartialConfig(userConfigPath);
}

export function mergeConfig(
  base: DiffpressConfig,
  override: PartialDiffpressConfig,
): DiffpressConfig {
  return {
    confluence: { ...base.confluence, ...override.confluence },
    renderer: { ...base.renderer, ...override.renderer },
    batch: { ...base.batch, ...override.batch },
    logging: { ...base.logging, ...override.logging },
  };
}

interface LoadConfigResult {
  config: DiffpressConfig;
  errors: ConfigError[];
}

/**
 * Load and merge configuration
 * Priority: custom path > user config > default config
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
