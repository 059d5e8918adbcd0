export type ModuleStatus = "ok" | "missing" | "drifted" | "failed";

export interface CheckResult {
  status: ModuleStatus;
  message: string;
  error?: string;
}

export interface ApplyResult {
  changed: boolean;
  message: string;
  error?: string;
  /** Non-fatal problems met while applying. */
  warnings?: string[];
}

/**
 * A unit of idempotent filesystem work. check() never mutates; apply()
 * converges the target to the desired state and is safe to repeat.
 */
export interface Module<P> {
  readonly name: string;
  check(params: P): Promise<CheckResult>;
  apply(params: P): Promise<ApplyResult>;
}

export interface ModuleRun {
  check: CheckResult;
  apply?: ApplyResult;
}

/**
 * Run check() then apply() when the target is missing or drifted.
 * A failed check is returned as-is without applying.
 */
export async function checkThenApply<P>(module: Module<P>, params: P): Promise<ModuleRun> {
  const check = await module.check(params);
  if (check.status === "ok" || check.status === "failed") {
    return { check };
  }
  const apply = await module.apply(params);
  return { check, apply };
}
