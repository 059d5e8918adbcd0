import {
  chmodSync,
  copyFileSync,
  existsSync,
  lstatSync,
  mkdirSync,
  readlinkSync,
  renameSync,
  rmSync,
  statSync,
  symlinkSync,
  utimesSync,
} from "fs";
import { basename, dirname, join } from "path";
import fg from "fast-glob";
import type { Module, CheckResult, ApplyResult } from "./types.js";
import { filesEqual } from "./hash.js";
import { errorMessage } from "../errors.js";

export interface MirrorSyncParams {
  sourcePath: string;
  targetPath: string;
  /** Entry names excluded at any depth. Excluded target entries are left alone. */
  exclude?: string[];
  /** Target-relative paths kept even though the source lacks them. */
  preserve?: string[];
}

type EntryKind = "dir" | "file" | "symlink";

export interface MirrorPlan {
  /** Target entries to delete, topmost only. */
  remove: string[];
  createDirs: string[];
  copyFiles: string[];
  links: string[];
}

export const DEFAULT_MIRROR_EXCLUDES = [".git"];

function listEntries(root: string, exclude: string[]): Map<string, EntryKind> {
  const entries = fg.sync("**", {
    cwd: root,
    dot: true,
    onlyFiles: false,
    followSymbolicLinks: false,
    objectMode: true,
    ignore: exclude.flatMap((name) => [`**/${name}`, `**/${name}/**`]),
  });

  const result = new Map<string, EntryKind>();
  for (const entry of entries) {
    if (entry.dirent.isSymbolicLink()) {
      result.set(entry.path, "symlink");
    } else if (entry.dirent.isDirectory()) {
      result.set(entry.path, "dir");
    } else if (entry.dirent.isFile()) {
      result.set(entry.path, "file");
    }
  }
  return result;
}

function isUnder(relPath: string, parents: string[]): boolean {
  return parents.some((parent) => relPath.startsWith(`${parent}/`));
}

function isPreserved(relPath: string, preserve: string[]): boolean {
  return preserve.includes(relPath) || isUnder(relPath, preserve);
}

async function fileMatches(sourceFile: string, targetFile: string): Promise<boolean> {
  const source = statSync(sourceFile);
  const target = statSync(targetFile);
  if (source.size !== target.size) return false;
  if (source.mtimeMs === target.mtimeMs) return true;
  return await filesEqual(sourceFile, targetFile);
}

/**
 * Compute what it takes to make `targetPath` an exact copy of `sourcePath`:
 * entries only in the target are removed unless preserved, entries whose
 * kind differs are replaced, and files are copied when their content differs.
 */
export async function planMirror(params: MirrorSyncParams): Promise<MirrorPlan> {
  const exclude = params.exclude ?? DEFAULT_MIRROR_EXCLUDES;
  const source = listEntries(params.sourcePath, exclude);
  const target = existsSync(params.targetPath) ? listEntries(params.targetPath, exclude) : new Map<string, EntryKind>();

  const preserve = params.preserve ?? [];
  const remove: string[] = [];
  for (const relPath of [...target.keys()].sort()) {
    if (isUnder(relPath, remove)) continue;
    if (!source.has(relPath) && isPreserved(relPath, preserve)) continue;
    if (source.get(relPath) !== target.get(relPath)) {
      remove.push(relPath);
    }
  }

  const kept = (relPath: string) => target.has(relPath) && !remove.includes(relPath) && !isUnder(relPath, remove);

  const createDirs: string[] = [];
  const copyFiles: string[] = [];
  const links: string[] = [];

  for (const relPath of [...source.keys()].sort()) {
    const kind = source.get(relPath);
    const present = kept(relPath);

    if (kind === "dir") {
      if (!present) createDirs.push(relPath);
      continue;
    }

    if (kind === "symlink") {
      const sourceLink = readlinkSync(join(params.sourcePath, relPath));
      if (!present || readlinkSync(join(params.targetPath, relPath)) !== sourceLink) {
        links.push(relPath);
      }
      continue;
    }

    if (!present || !(await fileMatches(join(params.sourcePath, relPath), join(params.targetPath, relPath)))) {
      copyFiles.push(relPath);
    }
  }

  return { remove, createDirs, copyFiles, links };
}

export function isPlanEmpty(plan: MirrorPlan): boolean {
  return plan.remove.length + plan.createDirs.length + plan.copyFiles.length + plan.links.length === 0;
}

/** Copy beside the destination and rename over it, so read-only targets are replaced too. */
function replaceFile(from: string, to: string): void {
  const temp = join(dirname(to), `.${basename(to)}.${process.pid}.tmp`);
  try {
    copyFileSync(from, temp);
    const { atime, mtime } = statSync(from);
    utimesSync(temp, atime, mtime);
    renameSync(temp, to);
  } catch (error) {
    rmSync(temp, { force: true });
    throw error;
  }
}

export function applyMirrorPlan(plan: MirrorPlan, sourcePath: string, targetPath: string): void {
  mkdirSync(targetPath, { recursive: true });

  for (const relPath of plan.remove) {
    rmSync(join(targetPath, relPath), { recursive: true, force: true });
  }

  for (const relPath of plan.createDirs) {
    mkdirSync(join(targetPath, relPath), { recursive: true });
  }

  for (const relPath of plan.copyFiles) {
    replaceFile(join(sourcePath, relPath), join(targetPath, relPath));
  }

  for (const relPath of plan.links) {
    const to = join(targetPath, relPath);
    if (lstatSync(to, { throwIfNoEntry: false })) {
      rmSync(to, { force: true });
    }
    symlinkSync(readlinkSync(join(sourcePath, relPath)), to);
  }

  // Modes last, deepest first, so read-only dirs still receive their entries.
  for (const relPath of [...plan.createDirs].reverse()) {
    chmodSync(join(targetPath, relPath), statSync(join(sourcePath, relPath)).mode & 0o777);
  }
}

function describePlan(plan: MirrorPlan): string {
  const copied = plan.copyFiles.length + plan.links.length;
  return `${copied} copied, ${plan.createDirs.length} dirs created, ${plan.remove.length} removed`;
}

export const mirrorSyncModule: Module<MirrorSyncParams> = {
  name: "mirror-sync",

  async check(params): Promise<CheckResult> {
    const { sourcePath, targetPath } = params;

    if (!existsSync(sourcePath)) {
      const message = `Source directory not found: ${sourcePath}`;
      return { status: "failed", message, error: message };
    }

    if (!existsSync(targetPath)) {
      return { status: "missing", message: `Target directory does not exist: ${targetPath}` };
    }

    try {
      const plan = await planMirror(params);
      return isPlanEmpty(plan)
        ? { status: "ok", message: "Target mirrors source" }
        : { status: "drifted", message: describePlan(plan) };
    } catch (error) {
      const message = `Failed to compare ${sourcePath} with ${targetPath}: ${errorMessage(error)}`;
      return { status: "failed", message, error: message };
    }
  },

  async apply(params): Promise<ApplyResult> {
    const { sourcePath, targetPath } = params;

    if (!existsSync(sourcePath)) {
      const message = `Source directory not found: ${sourcePath}`;
      return { changed: false, message, error: message };
    }

    try {
      const plan = await planMirror(params);
      if (isPlanEmpty(plan)) {
        return { changed: false, message: "Target mirrors source" };
      }
      applyMirrorPlan(plan, sourcePath, targetPath);
      return { changed: true, message: `Synced ${sourcePath} → ${targetPath} (${describePlan(plan)})` };
    } catch (error) {
      const message = `Failed to sync ${sourcePath} → ${targetPath}: ${errorMessage(error)}`;
      return { changed: false, message, error: message };
    }
  },
};
