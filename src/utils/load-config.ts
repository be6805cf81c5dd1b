import { readFile } from "fs/promises";
import { join, dirname } from "path";
import { existsSync } from "fs";
import { fileURLToPath } from "url";
import envPaths from "env-paths";
import type { ConfigError, FetchConfig, PartialFetchConfig } from "../types";
import { FetchConfigSchema, PartialFetchConfigSchema } from "../types";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const paths = envPaths("flaticon-fetch", { suffix: "" });

function getConfigDirectory(): string {
  return paths.config;
}

/**
 * Load default configuration with Zod validation
 */
export async function loadDefaultConfig(): Promise<FetchConfig> {
  const defaultConfigPath = join(__dirname, "..", "config", "default.json");
  const content = await readFile(defaultConfigPath, "utf-8");
  return FetchConfigSchema.parse(JSON.parse(content));
}

async function loadPartialConfig(
  configPath: string,
): Promise<PartialFetchConfig> {
  const content = await readFile(configPath, "utf-8");
  return PartialFetchConfigSchema.parse(JSON.parse(content));
}

async function loadUserConfig(): Promise<PartialFetchConfig | null> {
  const userConfigPath = getUserConfigPath();

  if (!existsSync(userConfigPath)) {
    return null;
  }

  return loadPartialConfig(userConfigPath);
}

export function mergeConfig(
  base: FetchConfig,
  override: PartialFetchConfig,
): FetchConfig {
  return {
    api: { ...base.api, ...override.api },
    search: { ...base.search, ...override.search },
    download: { ...base.download, ...override.download },
    batch: { ...base.batch, ...override.batch },
    // A custom rule table replaces the default one, order matters
    normalizer: {
      rules: override.normalizer?.rules ?? base.normalizer.rules,
    },
    logging: { ...base.logging, ...override.logging },
  };
}

interface LoadConfigResult {
  config: FetchConfig;
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
