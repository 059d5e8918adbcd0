import type { InstallerSettings } from "./config/schema.js";
import type { InstallationReport, OutcomeKind, ReportEntry, StepOutcome } from "./types.js";

export function outcomeMessage(outcome: StepOutcome): string {
  return outcome.kind === "failed" ? outcome.error.message : outcome.message;
}

/** A run succeeds iff it completed and no fatal step failed. */
export function isSuccessful(report: InstallationReport): boolean {
  return (
    report.status === "completed" &&
    report.errorCount === 0 &&
    !report.entries.some((entry) => entry.policy === "fatal" && entry.outcome.kind === "failed")
  );
}

export function exitCodeFor(report: InstallationReport): number {
  return isSuccessful(report) ? 0 : 1;
}

export function warningsOf(report: InstallationReport): ReportEntry[] {
  return report.entries.filter((entry) => entry.outcome.kind === "warning");
}

export function buildGuidance(settings: InstallerSettings): string[] {
  const { plugin, worker } = settings;
  return [
    "Next steps:",
    "  1. Restart your terminal (or: source ~/.bashrc)",
    `  2. Run: claude /plugin install ${plugin.vendor}/${plugin.name}`,
    "  3. Restart Claude",
    "",
    `Web viewer: http://localhost:${worker.port}`,
  ];
}

export const STATUS_GLYPHS: Record<OutcomeKind, string> = {
  ok: "✓",
  "already-satisfied": "✓",
  skipped: "-",
  warning: "!",
  failed: "✗",
};

export function formatEntry(entry: ReportEntry): string {
  return `${STATUS_GLYPHS[entry.outcome.kind]} ${entry.ordinal}. ${entry.name} [${entry.outcome.kind}] ${outcomeMessage(entry.outcome)}`;
}

/** Plain-text report for non-interactive output. */
export function formatReport(report: InstallationReport, settings: InstallerSettings): string[] {
  const lines = report.entries.map(formatEntry);
  if (report.status === "aborted") {
    const summary = report.errorCount > 0 ? `${report.errorCount} errors found` : "Installation aborted.";
    return [...lines, "", summary];
  }
  return [...lines, "", "Installation complete!", "", ...buildGuidance(settings)];
}
