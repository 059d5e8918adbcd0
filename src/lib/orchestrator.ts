import { InstallAbortedError, VerificationError, toInstallError, type InstallError } from "./errors.js";
import type {
  InstallContext,
  InstallStep,
  InstallationReport,
  OrchestratorEvent,
  ReportEntry,
  StepOutcome,
  StepResult,
  ToolLocations,
} from "./types.js";

export interface RunInstallationOptions {
  onEvent?: (event: OrchestratorEvent) => void;
}

async function runStep(step: InstallStep, ctx: InstallContext): Promise<StepResult> {
  try {
    return await step.run(ctx);
  } catch (error) {
    return { outcome: { kind: "failed", error: toInstallError(step.name, error) } };
  }
}

/** Advisory steps never fail the run; their failures are downgraded to warnings. */
function applyPolicy(step: InstallStep, outcome: StepOutcome): StepOutcome {
  if (outcome.kind !== "failed" || step.policy === "fatal") return outcome;
  return { kind: "warning", message: outcome.error.message, error: outcome.error };
}

function mergeToolPath(current: ToolLocations, exposed: readonly string[] | undefined): ToolLocations {
  if (!exposed || exposed.length === 0) return current;
  return [...exposed, ...current.filter((entry) => !exposed.includes(entry))];
}

function errorCountOf(error: InstallError): number {
  return error instanceof VerificationError ? error.errorCount : 0;
}

/**
 * Run steps strictly in order. The first fatal failure stops the run and is
 * thrown as InstallAbortedError carrying the report so far.
 */
export async function runInstallation(
  steps: readonly InstallStep[],
  ctx: InstallContext,
  options: RunInstallationOptions = {}
): Promise<InstallationReport> {
  const emit = options.onEvent ?? (() => undefined);
  const entries: ReportEntry[] = [];
  let toolPath = ctx.toolPath;

  for (const [index, step] of steps.entries()) {
    const ordinal = index + 1;
    emit({ type: "step-start", ordinal, name: step.name, policy: step.policy });

    const result = await runStep(step, { ...ctx, toolPath });
    const outcome = applyPolicy(step, result.outcome);
    toolPath = mergeToolPath(toolPath, result.exposes);

    const entry: ReportEntry = { ordinal, name: step.name, policy: step.policy, outcome };
    entries.push(entry);
    emit({ type: "step-finish", entry });

    if (outcome.kind === "failed") {
      const report: InstallationReport = {
        status: "aborted",
        entries,
        errorCount: errorCountOf(outcome.error),
        toolPath,
      };
      emit({ type: "aborted", report, error: outcome.error });
      throw new InstallAbortedError(step.name, report, outcome.error);
    }
  }

  const report: InstallationReport = { status: "completed", entries, errorCount: 0, toolPath };
  emit({ type: "completed", report });
  return report;
}
