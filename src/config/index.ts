import { readFileSync, existsSync } from "fs";
import { homedir } from "os";
import { join, resolve } from "path";
import { ConverterConfigSchema, DEFAULT_CONFIG } from "./schema.js";
import type { ConverterConfig } from "./schema.js";

const CONFIG_FILENAME = ".agenda-stf.json";

export function getConfigPath(): string {
  return join(homedir(), CONFIG_FILENAME);
}

export function expandPath(path: string): string {
  if (path.startsWith("~/")) {
    return join(homedir(), path.slice(2));
  }
  if (path.startsWith("$HOME/")) {
    return join(homedir(), path.slice(6));
  }
  return resolve(path);
}

/**
 * Load the converter settings. Without an explicit path a missing file just
 * means defaults; an explicit path must exist.
 */
export function loadConfig(path?: string): ConverterConfig {
  const configPath = path ? expandPath(path) : getConfigPath();

  if (!existsSync(configPath)) {
    if (path) {
      throw new Error(`Config file not found: ${configPath}`);
    }
    return DEFAULT_CONFIG;
  }

  try {
    const raw = readFileSync(configPath, "utf-8");
    const parsed: unknown = JSON.parse(raw);
    return ConverterConfigSchema.parse(parsed);
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new Error(`Invalid JSON in config file: ${configPath}`);
    }
    throw error;
  }
}

/** Apply command line overrides on top of the loaded file. */
export function mergeConfig(base: ConverterConfig, overrides: Partial<ConverterConfig>): ConverterConfig {
  const defined = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined)
  );
  return ConverterConfigSchema.parse({ ...base, ...defined });
}

export * from "./schema.js";
