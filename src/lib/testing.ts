import { delimiter, dirname } from "path";
import type { CommandResult, CommandRunner, CommandSpec, RunOptions } from "./command.js";
import type { BackgroundProcess, LaunchOptions, ProcessLauncher, SpawnStatus } from "./process.js";
import { createLogger, type LogLevel } from "./logger.js";
import { InstallerConfigSchema, type InstallerSettings } from "./config/schema.js";
import { resolveInstallPaths } from "./config/path.js";
import type { InstallContext, ToolLocations } from "./types.js";

// In-process stand-ins for the external world, shared by the test suites.

export interface FakeCommandResponse {
  exitCode?: number | null;
  stdout?: string;
  stderr?: string;
  timedOut?: boolean;
  error?: string;
}

export interface FakeCommandRunnerOptions {
  /** Binary name → absolute path. Resolvable when its directory is on the effective PATH. */
  binaries?: Record<string, string>;
  basePath?: string;
  /** Return undefined for a silent success. */
  handler?: (command: CommandSpec, options: RunOptions) => FakeCommandResponse | undefined;
}

export interface FakeCommandRunner extends CommandRunner {
  binaries: Record<string, string>;
  calls: Array<{ command: CommandSpec; options: RunOptions }>;
  whichCalls: Array<{ binary: string; toolPath: ToolLocations }>;
}

export const FAKE_BASE_PATH = ["/usr/local/bin", "/usr/bin", "/bin"].join(delimiter);

export function createFakeCommandRunner(options: FakeCommandRunnerOptions): FakeCommandRunner {
  const basePath = options.basePath ?? FAKE_BASE_PATH;
  const runner: FakeCommandRunner = {
    binaries: { ...options.binaries },
    calls: [],
    whichCalls: [],

    async run(command, runOptions = {}): Promise<CommandResult> {
      runner.calls.push({ command, options: runOptions });
      const response = options.handler?.(command, runOptions) ?? {};
      return {
        exitCode: response.exitCode === undefined ? 0 : response.exitCode,
        stdout: response.stdout ?? "",
        stderr: response.stderr ?? "",
        timedOut: response.timedOut ?? false,
        ...(response.error === undefined ? {} : { error: response.error }),
      };
    },

    async which(binary, toolPath = []) {
      runner.whichCalls.push({ binary, toolPath });
      const location = runner.binaries[binary];
      if (!location) return null;
      const searchPath = [...toolPath, ...basePath.split(delimiter)];
      return searchPath.includes(dirname(location)) ? location : null;
    },
  };
  return runner;
}

export interface FakeProcess extends BackgroundProcess {
  readonly command: CommandSpec;
  readonly options: LaunchOptions;
  readonly signals: NodeJS.Signals[];
  exit(code: number | null): void;
}

export interface FakeProcessLauncher extends ProcessLauncher {
  started: FakeProcess[];
}

export function createFakeProcessLauncher(
  options: { spawnError?: (command: CommandSpec) => string | undefined; onStart?: (proc: FakeProcess) => void } = {}
): FakeProcessLauncher {
  let nextPid = 4000;
  const launcher: FakeProcessLauncher = {
    started: [],
    start(command, launchOptions = {}) {
      const spawnError = options.spawnError?.(command);
      let running = spawnError === undefined;
      let resolveExit: (code: number | null) => void = () => undefined;
      const exited = new Promise<number | null>((resolve) => {
        resolveExit = resolve;
      });
      if (!running) resolveExit(null);

      const status: SpawnStatus = spawnError === undefined ? { ok: true } : { ok: false, error: spawnError };
      const signals: NodeJS.Signals[] = [];
      const proc: FakeProcess = {
        pid: spawnError === undefined ? nextPid++ : undefined,
        command,
        options: launchOptions,
        signals,
        started: Promise.resolve(status),
        exited,
        kill(signal = "SIGTERM") {
          if (!running) return false;
          signals.push(signal);
          running = false;
          resolveExit(null);
          return true;
        },
        exit(code) {
          if (!running) return;
          running = false;
          resolveExit(code);
        },
      };
      launcher.started.push(proc);
      options.onStart?.(proc);
      return proc;
    },
  };
  return launcher;
}

export interface TestClock {
  now(): Date;
  sleep(ms: number): Promise<void>;
  elapsed(): number;
}

/** Virtual clock: sleep() advances time instantly. */
export function createTestClock(start = Date.parse("2026-01-02T03:04:05.000Z")): TestClock {
  let current = start;
  return {
    now: () => new Date(current),
    sleep: async (ms) => {
      current += ms;
    },
    elapsed: () => current - start,
  };
}

export interface TestLog {
  lines: Array<{ level: LogLevel; message: string }>;
}

export function createTestContext(
  home: string,
  projectDir: string,
  overrides: Partial<InstallContext> & { settings?: InstallerSettings } = {}
): InstallContext & TestLog {
  const settings = overrides.settings ?? InstallerConfigSchema.parse({});
  const lines: TestLog["lines"] = [];
  const clock = createTestClock();
  const commands = overrides.commands ?? createFakeCommandRunner({});

  return {
    settings,
    paths: resolveInstallPaths(settings, home, projectDir),
    toolPath: [],
    basePath: FAKE_BASE_PATH,
    commands,
    processes: createFakeProcessLauncher(),
    fetch: async () => new Response("connection refused", { status: 503 }),
    sleep: clock.sleep,
    now: clock.now,
    logger: createLogger((level, message) => lines.push({ level, message })),
    ...overrides,
    lines,
  };
}
