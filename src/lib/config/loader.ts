import { readFileSync, existsSync } from "fs";
import { join } from "path";
import { parse as parseYaml } from "yaml";
import { InstallerConfigSchema, type InstallerSettings } from "./schema.js";
import { deepMerge, isPlainObject, type JsonValue } from "./merge.js";
import { getConfigDir } from "./path.js";
import { errorMessage } from "../errors.js";

export interface LoadConfigResult {
  config: InstallerSettings;
  configPath: string;
  errors: ConfigLoadError[];
}

export interface ConfigLoadError {
  source: string;
  message: string;
  path?: string[];
}

export function getConfigPath(): string {
  return join(getConfigDir(), "config.yaml");
}

function parseYamlFile(filePath: string): { data: Record<string, JsonValue>; errors: ConfigLoadError[] } {
  const errors: ConfigLoadError[] = [];
  try {
    const data: unknown = parseYaml(readFileSync(filePath, "utf-8"));
    if (data === null || data === undefined) {
      return { data: {}, errors };
    }
    if (!isPlainObject(data)) {
      errors.push({
        source: filePath,
        message: "Config must be a YAML mapping (object), not a scalar or sequence",
      });
      return { data: {}, errors };
    }
    return { data, errors };
  } catch (error) {
    errors.push({ source: filePath, message: errorMessage(error) });
    return { data: {}, errors };
  }
}

/**
 * Load installer settings.
 * 1. Parse config.yaml (or the provided path)
 * 2. If config.local.yaml exists beside it, deep-merge it on top
 * 3. Validate with zod; on failure fall back to defaults and report errors
 */
export function loadConfig(configPath?: string): LoadConfigResult {
  const path = configPath || getConfigPath();
  const defaults = InstallerConfigSchema.parse({});

  if (!existsSync(path)) {
    return { config: defaults, configPath: path, errors: [] };
  }

  const file = parseYamlFile(path);
  const errors = [...file.errors];
  let merged = file.data;

  if (!configPath) {
    const localPath = join(getConfigDir(), "config.local.yaml");
    if (existsSync(localPath)) {
      const local = parseYamlFile(localPath);
      errors.push(...local.errors);
      merged = deepMerge(merged, local.data);
    }
  }

  if (errors.length > 0) {
    return { config: defaults, configPath: path, errors };
  }

  const result = InstallerConfigSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      source: path,
      message: issue.message,
      path: issue.path.map(String),
    }));
    return { config: defaults, configPath: path, errors: issues };
  }

  return { config: result.data, configPath: path, errors: [] };
}

export function formatConfigError(error: ConfigLoadError): string {
  return error.path && error.path.length > 0
    ? `${error.source}: ${error.path.join(".")}: ${error.message}`
    : `${error.source}: ${error.message}`;
}
