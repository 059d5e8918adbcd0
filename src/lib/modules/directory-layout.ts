import { existsSync, mkdirSync, statSync } from "fs";
import type { Module, CheckResult, ApplyResult } from "./types.js";
import { errorMessage } from "../errors.js";

export interface DirectoryLayoutParams {
  directories: string[];
}

export const directoryLayoutModule: Module<DirectoryLayoutParams> = {
  name: "directory-layout",

  async check(params): Promise<CheckResult> {
    const missing: string[] = [];
    for (const dir of params.directories) {
      if (!existsSync(dir)) {
        missing.push(dir);
        continue;
      }
      if (!statSync(dir).isDirectory()) {
        const message = `Not a directory: ${dir}`;
        return { status: "failed", message, error: message };
      }
    }

    if (missing.length === 0) {
      return { status: "ok", message: "Directories already exist" };
    }
    return { status: "missing", message: `${missing.length} directories missing` };
  },

  async apply(params): Promise<ApplyResult> {
    let created = 0;
    for (const dir of params.directories) {
      if (existsSync(dir)) continue;
      try {
        mkdirSync(dir, { recursive: true });
        created++;
      } catch (error) {
        return { changed: created > 0, message: `Failed to create ${dir}`, error: `${dir}: ${errorMessage(error)}` };
      }
    }
    return { changed: created > 0, message: created > 0 ? "Directories created" : "Directories already exist" };
  },
};
