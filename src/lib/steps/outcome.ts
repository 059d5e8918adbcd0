import type { ModuleRun } from "../modules/types.js";
import type { InstallError } from "../errors.js";
import type { StepResult } from "../types.js";

export const ok = (message: string): StepResult => ({ outcome: { kind: "ok", message } });
export const satisfied = (message: string): StepResult => ({ outcome: { kind: "already-satisfied", message } });
export const skipped = (message: string): StepResult => ({ outcome: { kind: "skipped", message } });
export const warning = (message: string, error?: InstallError): StepResult => ({
  outcome: error ? { kind: "warning", message, error } : { kind: "warning", message },
});
export const failed = (error: InstallError): StepResult => ({ outcome: { kind: "failed", error } });

/**
 * Map a check/apply pair onto a step outcome. `onError` decides whether a
 * module error is fatal for this step or only worth a warning.
 */
export function fromModuleRun(run: ModuleRun, onError: (message: string) => StepResult): StepResult {
  if (run.check.status === "failed") {
    return onError(run.check.error ?? run.check.message);
  }
  if (!run.apply) {
    return satisfied(run.check.message);
  }
  if (run.apply.error) {
    return onError(run.apply.error);
  }
  if (run.apply.warnings && run.apply.warnings.length > 0) {
    return warning(`${run.apply.message}; ${run.apply.warnings.join("; ")}`);
  }
  return run.apply.changed ? ok(run.apply.message) : satisfied(run.apply.message);
}
