export { InstallerConfigSchema, PluginSettingsSchema, WorkerSettingsSchema, PrewarmSettingsSchema, ShellSettingsSchema } from "./schema.js";
export type { InstallerSettings, WorkerSettings, PrewarmSettings } from "./schema.js";
export { loadConfig, getConfigPath, formatConfigError } from "./loader.js";
export type { LoadConfigResult, ConfigLoadError } from "./loader.js";
export { deepMerge } from "./merge.js";
export { APP_NAME, expandPath, getConfigDir, resolveInstallPaths } from "./path.js";
