import { z } from "zod";

const NAME_PATTERN = /^[a-zA-Z0-9._-]+$/;

const SafeName = z
  .string()
  .min(1)
  .regex(NAME_PATTERN, "must contain only letters, digits, '.', '_' or '-'")
  .refine((value) => value !== "." && !value.includes(".."), "must not be a relative path segment");

// ─────────────────────────────────────────────────────────────────────────────
// Plugin identity
// ─────────────────────────────────────────────────────────────────────────────

export const PluginSettingsSchema = z.object({
  marketplace_id: SafeName.default("thedotmack"),
  vendor: SafeName.default("thedotmack"),
  name: SafeName.default("claude-mem"),
  /** Plugin checkout to build. Defaults to the working directory. */
  project_dir: z.string().min(1).optional(),
  manifest: z.string().min(1).default("plugin/.claude-plugin/plugin.json"),
  output_dir: z.string().min(1).default("plugin"),
});

// ─────────────────────────────────────────────────────────────────────────────
// Worker service
// ─────────────────────────────────────────────────────────────────────────────

export const WorkerSettingsSchema = z.object({
  host: z.string().min(1).default("127.0.0.1"),
  port: z.number().int().min(1).max(65535).default(37777),
  health_path: z.string().startsWith("/").default("/api/health"),
  script: z.string().min(1).default("plugin/scripts/worker-service.cjs"),
  poll_interval_ms: z.number().int().min(50).default(500),
  startup_timeout_ms: z.number().int().min(0).default(15000),
});

// ─────────────────────────────────────────────────────────────────────────────
// Vector database prewarm
// ─────────────────────────────────────────────────────────────────────────────

export const PrewarmSettingsSchema = z.object({
  enabled: z.boolean().default(true),
  grace_ms: z.number().int().min(0).default(10000),
  timeout_seconds: z.number().int().min(1).default(30),
  python: z.string().min(1).default("3.13"),
  package: z.string().min(1).default("chroma-mcp"),
});

// ─────────────────────────────────────────────────────────────────────────────
// Shell environment
// ─────────────────────────────────────────────────────────────────────────────

export const ShellSettingsSchema = z.object({
  profiles: z.array(z.string().min(1)).default([".bashrc", ".profile", ".zshrc"]),
});

// ─────────────────────────────────────────────────────────────────────────────
// Top-level config schema
// ─────────────────────────────────────────────────────────────────────────────

// Parsed defaults so nested .default() values are applied to omitted sections
const PLUGIN_DEFAULT = PluginSettingsSchema.parse({});
const WORKER_DEFAULT = WorkerSettingsSchema.parse({});
const PREWARM_DEFAULT = PrewarmSettingsSchema.parse({});
const SHELL_DEFAULT = ShellSettingsSchema.parse({});

export const InstallerConfigSchema = z.object({
  plugin: PluginSettingsSchema.default(PLUGIN_DEFAULT),
  worker: WorkerSettingsSchema.default(WORKER_DEFAULT),
  prewarm: PrewarmSettingsSchema.default(PREWARM_DEFAULT),
  shell: ShellSettingsSchema.default(SHELL_DEFAULT),
});

export type InstallerSettings = z.infer<typeof InstallerConfigSchema>;
export type WorkerSettings = z.infer<typeof WorkerSettingsSchema>;
export type PrewarmSettings = z.infer<typeof PrewarmSettingsSchema>;
