import { runInstallation } from "./orchestrator.js";
import { InstallAbortedError } from "./errors.js";
import { exitCodeFor } from "./report.js";
import type { InstallContext, InstallStep, InstallationReport, OrchestratorEvent } from "./types.js";

export interface InstallerOutcome {
  report: InstallationReport;
  exitCode: number;
}

/**
 * Run the installation and map the result to a process exit code.
 * Only an abort is converted; anything else is a bug and propagates.
 */
export async function runInstaller(
  steps: readonly InstallStep[],
  ctx: InstallContext,
  onEvent?: (event: OrchestratorEvent) => void
): Promise<InstallerOutcome> {
  try {
    const report = await runInstallation(steps, ctx, { onEvent });
    return { report, exitCode: exitCodeFor(report) };
  } catch (error) {
    if (error instanceof InstallAbortedError) {
      return { report: error.report, exitCode: 1 };
    }
    throw error;
  }
}
