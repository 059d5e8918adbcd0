import { homedir } from "os";
import { setTimeout as delay } from "timers/promises";
import { createCommandRunner } from "./command.js";
import { createProcessLauncher } from "./process.js";
import { resolveInstallPaths } from "./config/path.js";
import type { InstallerSettings } from "./config/schema.js";
import type { InstallLogger } from "./logger.js";
import type { InstallContext } from "./types.js";

export interface ContextOptions {
  logger: InstallLogger;
  home?: string;
  cwd?: string;
  basePath?: string;
}

/** Timer-backed wait that releases its timer as soon as `signal` aborts. */
export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  try {
    await delay(ms, undefined, { signal });
  } catch (error) {
    // an aborted wait simply ends early
    if (!signal?.aborted) throw error;
  }
}

/** Context wired to the real system: child processes, network and clock. */
export function createInstallContext(settings: InstallerSettings, options: ContextOptions): InstallContext {
  const basePath = options.basePath ?? process.env.PATH ?? "";
  return {
    settings,
    paths: resolveInstallPaths(settings, options.home ?? homedir(), options.cwd ?? process.cwd()),
    toolPath: [],
    basePath,
    commands: createCommandRunner(basePath),
    processes: createProcessLauncher(basePath),
    fetch: (input, init) => fetch(input, init),
    sleep,
    now: () => new Date(),
    logger: options.logger,
  };
}
