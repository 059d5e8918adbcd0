import {
  closeSync,
  fsyncSync,
  mkdirSync,
  openSync,
  renameSync,
  rmSync,
  statSync,
  writeFileSync,
} from "fs";
import { basename, dirname, join } from "path";
import { isErrnoException } from "./errors.js";

const LOCK_RETRY_COUNT = 5;
const LOCK_RETRY_DELAY_MS = 50;
const LOCK_STALE_MS = 30_000;

function sleepSync(ms: number): void {
  const buffer = new SharedArrayBuffer(4);
  const view = new Int32Array(buffer);
  Atomics.wait(view, 0, 0, ms);
}

/**
 * Write through a temp file in the same directory, then rename over `path`.
 * Readers see either the old content or the new, never a partial file.
 */
export function atomicWriteFileSync(path: string, content: string): void {
  const dir = dirname(path);
  mkdirSync(dir, { recursive: true });
  const tempPath = join(dir, `.${basename(path)}.${process.pid}.${Date.now()}.tmp`);
  const fd = openSync(tempPath, "w");
  try {
    writeFileSync(fd, content);
    fsyncSync(fd);
  } finally {
    closeSync(fd);
  }

  try {
    renameSync(tempPath, path);
  } catch (error) {
    rmSync(tempPath, { force: true });
    throw error;
  }
}

export function atomicWriteJsonSync(path: string, value: unknown): void {
  atomicWriteFileSync(path, `${JSON.stringify(value, null, 2)}\n`);
}

export function withFileLockSync<T>(path: string, fn: () => T): T {
  mkdirSync(dirname(path), { recursive: true });
  const lockPath = `${path}.lock`;
  let fd: number | null = null;

  for (let attempt = 0; attempt <= LOCK_RETRY_COUNT; attempt += 1) {
    try {
      fd = openSync(lockPath, "wx");
      writeFileSync(fd, String(process.pid));
      break;
    } catch (error) {
      if (!isErrnoException(error) || error.code !== "EEXIST") {
        throw error;
      }

      if (isStale(lockPath)) {
        rmSync(lockPath, { force: true });
        continue;
      }

      if (attempt === LOCK_RETRY_COUNT) {
        throw new Error(`Timed out waiting for lock on ${path}`);
      }

      sleepSync(LOCK_RETRY_DELAY_MS * (attempt + 1));
    }
  }

  try {
    return fn();
  } finally {
    if (fd !== null) closeSync(fd);
    rmSync(lockPath, { force: true });
  }
}

function isStale(lockPath: string): boolean {
  try {
    return Date.now() - statSync(lockPath).mtimeMs > LOCK_STALE_MS;
  } catch (error) {
    // Lock released between the failed open and the stat
    if (isErrnoException(error) && error.code === "ENOENT") return true;
    throw error;
  }
}
