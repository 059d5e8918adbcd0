import { spawn } from "child_process";
import type { CommandSpec } from "./command.js";
import { buildEnv } from "./command.js";
import type { ToolLocations } from "./types.js";

export type SpawnStatus = { ok: true } | { ok: false; error: string };

export interface BackgroundProcess {
  readonly pid: number | undefined;
  /** Settles once the OS has started the process (or failed to). */
  readonly started: Promise<SpawnStatus>;
  /** Settles with the exit code, or null when killed by a signal or never started. */
  readonly exited: Promise<number | null>;
  kill(signal?: NodeJS.Signals): boolean;
}

export interface LaunchOptions {
  cwd?: string;
  toolPath?: ToolLocations;
}

/**
 * Starts children the installer does not own past launch. They are detached
 * into their own process group with stdio ignored and unref'd, so the
 * installer can exit while they keep running.
 */
export interface ProcessLauncher {
  start(command: CommandSpec, options?: LaunchOptions): BackgroundProcess;
}

export function createProcessLauncher(basePath: string = process.env.PATH ?? ""): ProcessLauncher {
  return {
    start(command, options = {}) {
      const child = spawn(command.cmd, command.args, {
        cwd: options.cwd,
        env: buildEnv(options.toolPath ?? [], basePath),
        detached: true,
        stdio: "ignore",
      });
      child.unref();

      const started = new Promise<SpawnStatus>((resolve) => {
        child.once("spawn", () => resolve({ ok: true }));
        child.once("error", (error) => resolve({ ok: false, error: error.message }));
      });

      const exited = new Promise<number | null>((resolve) => {
        child.once("exit", (code) => resolve(code));
        child.once("error", () => resolve(null));
      });

      return {
        pid: child.pid,
        started,
        exited,
        kill(signal = "SIGTERM") {
          if (child.exitCode !== null || child.signalCode !== null) return false;
          return child.kill(signal);
        },
      };
    },
  };
}
