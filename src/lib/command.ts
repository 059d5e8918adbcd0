import { spawn } from "child_process";
import { accessSync, constants, statSync } from "fs";
import { delimiter, isAbsolute, join } from "path";
import type { ToolLocations } from "./types.js";

const DEFAULT_TIMEOUT_MS = 600_000;
const KILL_GRACE_MS = 1500;
const OUTPUT_TAIL_CHARS = 4000;

export interface CommandSpec {
  cmd: string;
  args: string[];
}

export interface RunOptions {
  cwd?: string;
  toolPath?: ToolLocations;
  timeoutMs?: number;
  onOutput?: (chunk: string) => void;
}

export interface CommandResult {
  exitCode: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  /** Spawn failure (e.g. ENOENT), when the process never ran. */
  error?: string;
}

export interface CommandRunner {
  run(command: CommandSpec, options?: RunOptions): Promise<CommandResult>;
  /** Absolute path of `binary` on the effective PATH, or null. */
  which(binary: string, toolPath?: ToolLocations): Promise<string | null>;
}

export function formatCommand(command: CommandSpec): string {
  return [command.cmd, ...command.args].join(" ");
}

export function buildPathValue(toolPath: ToolLocations, basePath: string): string {
  const segments = [...toolPath, ...basePath.split(delimiter)].filter((s) => s.length > 0);
  return segments.filter((s, i) => segments.indexOf(s) === i).join(delimiter);
}

export function buildEnv(toolPath: ToolLocations, basePath: string): NodeJS.ProcessEnv {
  return { ...process.env, PATH: buildPathValue(toolPath, basePath) };
}

function isExecutableFile(path: string): boolean {
  try {
    if (!statSync(path).isFile()) return false;
    accessSync(path, constants.X_OK);
    return true;
  } catch {
    // missing or not executable
    return false;
  }
}

/** First executable `binary` on the effective PATH, the way `command -v` resolves it. */
export function resolveOnPath(binary: string, toolPath: ToolLocations, basePath: string): string | null {
  for (const dir of buildPathValue(toolPath, basePath).split(delimiter)) {
    if (!isAbsolute(dir)) continue;
    const candidate = join(dir, binary);
    if (isExecutableFile(candidate)) return candidate;
  }
  return null;
}

export function isSuccess(result: CommandResult): boolean {
  return result.exitCode === 0 && !result.timedOut && result.error === undefined;
}

/** Human-readable failure text, ending with the command's own stderr when it produced any. */
export function describeFailure(command: CommandSpec, result: CommandResult): string {
  const label = formatCommand(command);
  if (result.error) return `${label}: ${result.error}`;
  const detail = (result.stderr.trim() || result.stdout.trim()).slice(-OUTPUT_TAIL_CHARS);
  const reason = result.timedOut ? "timed out" : `exited with code ${result.exitCode ?? "unknown"}`;
  return detail ? `${label} ${reason}:\n${detail}` : `${label} ${reason}`;
}

export function createCommandRunner(basePath: string = process.env.PATH ?? ""): CommandRunner {
  return {
    async run(command, options = {}) {
      const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
      const env = buildEnv(options.toolPath ?? [], basePath);

      return await new Promise<CommandResult>((resolve) => {
        const child = spawn(command.cmd, command.args, {
          cwd: options.cwd,
          env,
          stdio: ["ignore", "pipe", "pipe"],
        });
        let stdout = "";
        let stderr = "";
        let finished = false;
        let timedOut = false;
        let killId: NodeJS.Timeout | undefined;

        const timeoutId = setTimeout(() => {
          if (finished) return;
          timedOut = true;
          child.kill("SIGTERM");
          killId = setTimeout(() => {
            if (!finished) child.kill("SIGKILL");
          }, KILL_GRACE_MS);
        }, timeoutMs);

        const settle = (result: CommandResult) => {
          if (finished) return;
          finished = true;
          clearTimeout(timeoutId);
          clearTimeout(killId);
          resolve(result);
        };

        child.stdout.on("data", (chunk) => {
          const text = String(chunk);
          stdout += text;
          options.onOutput?.(text);
        });

        child.stderr.on("data", (chunk) => {
          const text = String(chunk);
          stderr += text;
          options.onOutput?.(text);
        });

        child.on("error", (error) => {
          settle({ exitCode: null, stdout, stderr, timedOut, error: error.message });
        });

        child.on("close", (code) => {
          settle({ exitCode: code, stdout, stderr, timedOut });
        });
      });
    },

    async which(binary, toolPath = []) {
      return resolveOnPath(binary, toolPath, basePath);
    },
  };
}
