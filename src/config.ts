import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { type Config, ConfigSchema, DEFAULT_CONFIG } from "./types";

const CONFIG_FILE = ".destinations/config.json";

/**
 * Load configuration from `.destinations/config.json`
 * Missing file falls back to DEFAULT_CONFIG; a file that fails to parse or
 * validate is an error.
 */
export function loadConfig(projectPath: string = process.cwd()): Config {
  const configPath = getConfigPath(projectPath);

  if (!existsSync(configPath)) {
    return DEFAULT_CONFIG;
  }

  try {
    const rawConfig: unknown = JSON.parse(readFileSync(configPath, "utf-8"));
    return ConfigSchema.parse(rawConfig);
  } catch (error) {
    if (error instanceof Error) {
      throw new Error(
        `Failed to load config from ${configPath}: ${error.message}`,
      );
    }
    throw error;
  }
}

export function getConfigPath(projectPath: string = process.cwd()): string {
  return join(projectPath, CONFIG_FILE);
}

export function getProjectPath(): string {
  return process.cwd();
}
