import { appendFileSync, existsSync, readFileSync } from "fs";
import { basename } from "path";
import type { Module, CheckResult, ApplyResult } from "./types.js";
import { errorMessage } from "../errors.js";

export interface ShellProfileParams {
  /** Absolute profile paths. Files that do not exist are skipped, never created. */
  profiles: string[];
  /** A profile containing this substring anywhere counts as configured. */
  marker: string;
  line: string;
}

function existingProfiles(profiles: string[]): string[] {
  return profiles.filter((profile) => existsSync(profile));
}

function profilesNeedingLine(params: ShellProfileParams): string[] {
  return existingProfiles(params.profiles).filter(
    (profile) => !readFileSync(profile, "utf-8").includes(params.marker)
  );
}

export const shellProfileModule: Module<ShellProfileParams> = {
  name: "shell-profile",

  async check(params): Promise<CheckResult> {
    try {
      const pending = profilesNeedingLine(params);
      if (pending.length === 0) {
        const found = existingProfiles(params.profiles).length;
        return { status: "ok", message: found > 0 ? "PATH already configured" : "No shell profiles found" };
      }
      return { status: "missing", message: `PATH missing from ${pending.map((p) => basename(p)).join(", ")}` };
    } catch (error) {
      const message = `Failed to read shell profiles: ${errorMessage(error)}`;
      return { status: "failed", message, error: message };
    }
  },

  async apply(params): Promise<ApplyResult> {
    const updated: string[] = [];
    const warnings: string[] = [];

    for (const profile of params.profiles) {
      try {
        if (!existsSync(profile)) continue;
        const content = readFileSync(profile, "utf-8");
        if (content.includes(params.marker)) continue;

        // Start on a fresh line when the file lacks a trailing newline
        const prefix = content.length > 0 && !content.endsWith("\n") ? "\n" : "";
        appendFileSync(profile, `${prefix}${params.line}\n`);
        updated.push(basename(profile));
      } catch (error) {
        warnings.push(`${profile}: ${errorMessage(error)}`);
      }
    }

    if (warnings.length > 0 && updated.length === 0) {
      return { changed: false, message: "Could not update shell profiles", error: warnings.join("; "), warnings };
    }

    return {
      changed: updated.length > 0,
      message: updated.length > 0 ? `PATH added to shell profiles (${updated.join(", ")})` : "PATH already configured",
      warnings: warnings.length > 0 ? warnings : undefined,
    };
  },
};
