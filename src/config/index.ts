import { readFileSync } from "node:fs";
import { parse } from "yaml";
import { ConfigurationError, errorMessage } from "../errors";
import { appConfigSchema } from "./schema";
import type { AppConfig } from "./schema";

function validate(source: string, parsed: unknown): AppConfig {
  const result = appConfigSchema.safeParse(parsed ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `  - ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    throw new ConfigurationError(`invalid configuration in ${source}:\n${issues}`);
  }
  return result.data;
}

/**
 * Every setting at its default.
 */
export function defaultConfig(): AppConfig {
  return validate("defaults", {});
}

export function loadConfig(configPath: string): AppConfig {
  let raw: string;
  try {
    raw = readFileSync(configPath, "utf-8");
  } catch (err) {
    throw new ConfigurationError(`failed to read config file at ${configPath}: ${errorMessage(err)}`, {
      cause: err,
    });
  }

  let parsed: unknown;
  try {
    parsed = parse(raw);
  } catch (err) {
    throw new ConfigurationError(`failed to parse YAML in ${configPath}: ${errorMessage(err)}`, {
      cause: err,
    });
  }

  return validate(configPath, parsed);
}

export type EnvOverrides = {
  readonly DATABASE_URL?: string;
};

/**
 * Applies environment overrides on top of a loaded configuration.
 */
export function applyEnv(config: AppConfig, env: EnvOverrides): AppConfig {
  const databasePath = env.DATABASE_URL?.trim();
  if (!databasePath) return config;
  return { ...config, database: { ...config.database, path: databasePath } };
}

export type { AppConfig };
