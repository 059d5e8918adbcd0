import type { InstallationReport } from "./types.js";

export type InstallErrorCode =
  | "missing-tool"
  | "filesystem"
  | "registry-write"
  | "build-failure"
  | "service-unreachable"
  | "prewarm-failure"
  | "verification"
  | "aborted"
  | "unexpected";

export class InstallError extends Error {
  readonly code: InstallErrorCode;
  readonly step: string;

  constructor(code: InstallErrorCode, step: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "InstallError";
    this.code = code;
    this.step = step;
  }
}

export class MissingToolError extends InstallError {
  readonly tool: string;

  constructor(step: string, tool: string, message: string, options?: { cause?: unknown }) {
    super("missing-tool", step, message, options);
    this.name = "MissingToolError";
    this.tool = tool;
  }
}

export class FilesystemError extends InstallError {
  readonly path: string;

  constructor(step: string, path: string, message: string, options?: { cause?: unknown }) {
    super("filesystem", step, message, options);
    this.name = "FilesystemError";
    this.path = path;
  }
}

export class RegistryWriteError extends InstallError {
  readonly registryFile: string;

  constructor(step: string, registryFile: string, message: string, options?: { cause?: unknown }) {
    super("registry-write", step, message, options);
    this.name = "RegistryWriteError";
    this.registryFile = registryFile;
  }
}

export class BuildFailureError extends InstallError {
  readonly command: string;

  constructor(step: string, command: string, message: string, options?: { cause?: unknown }) {
    super("build-failure", step, message, options);
    this.name = "BuildFailureError";
    this.command = command;
  }
}

export class ServiceUnreachableError extends InstallError {
  readonly healthUrl: string;

  constructor(step: string, healthUrl: string, message: string, options?: { cause?: unknown }) {
    super("service-unreachable", step, message, options);
    this.name = "ServiceUnreachableError";
    this.healthUrl = healthUrl;
  }
}

export class PrewarmFailureError extends InstallError {
  constructor(step: string, message: string, options?: { cause?: unknown }) {
    super("prewarm-failure", step, message, options);
    this.name = "PrewarmFailureError";
  }
}

export class VerificationError extends InstallError {
  readonly errorCount: number;

  constructor(step: string, errorCount: number, message: string) {
    super("verification", step, message);
    this.name = "VerificationError";
    this.errorCount = errorCount;
  }
}

/** Raised by the orchestrator when a fatal step fails; carries the report so far. */
export class InstallAbortedError extends InstallError {
  readonly report: InstallationReport;

  constructor(step: string, report: InstallationReport, cause: InstallError) {
    super("aborted", step, `${step}: ${cause.message}`, { cause });
    this.name = "InstallAbortedError";
    this.report = report;
  }
}

/** Wrap anything a step threw so the report always carries an InstallError. */
export function toInstallError(step: string, error: unknown): InstallError {
  if (error instanceof InstallError) return error;
  return new InstallError("unexpected", step, errorMessage(error), { cause: error });
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}
