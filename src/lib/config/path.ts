import { homedir } from "os";
import { isAbsolute, join, resolve } from "path";
import type { InstallPaths } from "../types.js";
import type { InstallerSettings } from "./schema.js";

export const APP_NAME = "claude-mem-installer";

export function expandPath(pathValue: string, home: string = homedir()): string {
  if (pathValue === "~") return home;
  if (pathValue.startsWith("~/")) return join(home, pathValue.slice(2));
  return pathValue;
}

export function getConfigDir(): string {
  const xdgConfig = process.env.XDG_CONFIG_HOME;
  const base = xdgConfig || join(homedir(), ".config");
  return join(base, APP_NAME);
}

/**
 * Derive every persisted location from the home directory.
 * Relative `project_dir` values resolve against `cwd`.
 */
export function resolveInstallPaths(
  settings: InstallerSettings,
  home: string = homedir(),
  cwd: string = process.cwd()
): InstallPaths {
  const { plugin } = settings;
  const projectSetting = plugin.project_dir ? expandPath(plugin.project_dir, home) : cwd;
  const projectDir = isAbsolute(projectSetting) ? projectSetting : resolve(cwd, projectSetting);

  const pluginsDir = join(home, ".claude", "plugins");
  const dataDir = join(home, ".claude-mem");

  return {
    home,
    projectDir,
    pluginsDir,
    registryFile: join(pluginsDir, "known_marketplaces.json"),
    marketplaceDir: join(pluginsDir, "marketplaces", plugin.marketplace_id),
    pluginCacheDir: join(pluginsDir, "cache", plugin.vendor, plugin.name),
    dataDir,
    logsDir: join(dataDir, "logs"),
    vectorDbDir: join(dataDir, "vector-db"),
    databaseFile: join(dataDir, "claude-mem.db"),
  };
}
