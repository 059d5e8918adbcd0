import type { InstallError } from "./errors.js";
import type { CommandRunner } from "./command.js";
import type { ProcessLauncher } from "./process.js";
import type { InstallLogger } from "./logger.js";
import type { InstallerSettings } from "./config/schema.js";

// ─────────────────────────────────────────────────────────────────────────────
// Step outcomes
// ─────────────────────────────────────────────────────────────────────────────

export type FailurePolicy = "fatal" | "advisory";

export type StepOutcome =
  | { kind: "ok"; message: string }
  | { kind: "already-satisfied"; message: string }
  | { kind: "skipped"; message: string }
  | { kind: "warning"; message: string; error?: InstallError }
  | { kind: "failed"; error: InstallError };

export type OutcomeKind = StepOutcome["kind"];

export interface StepResult {
  outcome: StepOutcome;
  /** PATH segments this step made resolvable for the rest of the run. */
  exposes?: readonly string[];
}

export interface InstallStep {
  readonly name: string;
  readonly policy: FailurePolicy;
  run(ctx: InstallContext): Promise<StepResult>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Paths
// ─────────────────────────────────────────────────────────────────────────────

export interface InstallPaths {
  home: string;
  projectDir: string;
  pluginsDir: string;
  registryFile: string;
  marketplaceDir: string;
  /** cache/<vendor>/<plugin>; versioned trees live below it. */
  pluginCacheDir: string;
  dataDir: string;
  logsDir: string;
  vectorDbDir: string;
  databaseFile: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Execution context
// ─────────────────────────────────────────────────────────────────────────────

/** PATH segments prepended to the inherited PATH for every external command. */
export type ToolLocations = readonly string[];

export interface InstallContext {
  settings: InstallerSettings;
  paths: InstallPaths;
  toolPath: ToolLocations;
  /** PATH inherited from the invoking shell. */
  basePath: string;
  commands: CommandRunner;
  processes: ProcessLauncher;
  fetch: typeof fetch;
  /** Resolves after `ms`, or early once `signal` aborts. */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
  now(): Date;
  logger: InstallLogger;
}

// ─────────────────────────────────────────────────────────────────────────────
// Report
// ─────────────────────────────────────────────────────────────────────────────

export interface ReportEntry {
  ordinal: number;
  name: string;
  policy: FailurePolicy;
  outcome: StepOutcome;
}

export type RunStatus = "pending" | "running" | "completed" | "aborted";

export interface InstallationReport {
  status: "completed" | "aborted";
  entries: ReportEntry[];
  /** Errors counted by the final verification, when it ran. */
  errorCount: number;
  toolPath: ToolLocations;
}

export type OrchestratorEvent =
  | { type: "step-start"; ordinal: number; name: string; policy: FailurePolicy }
  | { type: "step-finish"; entry: ReportEntry }
  | { type: "completed"; report: InstallationReport }
  | { type: "aborted"; report: InstallationReport; error: InstallError };

// ─────────────────────────────────────────────────────────────────────────────
// Registry
// ─────────────────────────────────────────────────────────────────────────────

export interface MarketplaceSource {
  source: "directory";
  path: string;
}

export interface RegistryEntry {
  source: MarketplaceSource;
  installLocation: string;
  lastUpdated: string;
}
