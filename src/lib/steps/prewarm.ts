import { PrewarmFailureError } from "../errors.js";
import type { CommandSpec } from "../command.js";
import type { InstallContext, InstallStep } from "../types.js";
import { ok, skipped, warning } from "./outcome.js";

const STEP = "prewarm-vector-db";

/**
 * uvx invocation that downloads the vector store and its embedding models,
 * bounded by `timeout` when the host provides it.
 */
export async function prewarmCommand(ctx: InstallContext): Promise<CommandSpec> {
  const { prewarm } = ctx.settings;
  const uvx: CommandSpec = {
    cmd: "uvx",
    args: [
      "--python",
      prewarm.python,
      prewarm.package,
      "--client-type",
      "persistent",
      "--data-dir",
      ctx.paths.vectorDbDir,
    ],
  };

  const guard = await ctx.commands.which("timeout", ctx.toolPath);
  if (!guard) return uvx;
  return { cmd: guard, args: [String(prewarm.timeout_seconds), uvx.cmd, ...uvx.args] };
}

export const prewarmStep: InstallStep = {
  name: STEP,
  policy: "advisory",

  async run(ctx) {
    if (!ctx.settings.prewarm.enabled) {
      return skipped("Prewarm disabled");
    }

    ctx.logger.log("Pre-warming vector database (downloads models)...");
    const command = await prewarmCommand(ctx);
    const proc = ctx.processes.start(command, { cwd: ctx.paths.dataDir, toolPath: ctx.toolPath });

    const status = await proc.started;
    if (!status.ok) {
      const message = `Could not start ${command.cmd}: ${status.error}`;
      ctx.logger.warn(message);
      return warning(message, new PrewarmFailureError(STEP, message));
    }

    const grace = new AbortController();
    const exit = await Promise.race([
      proc.exited.then((code) => ({ code })),
      ctx.sleep(ctx.settings.prewarm.grace_ms, grace.signal).then(() => null),
    ]);
    grace.abort();
    if (exit === null) {
      proc.kill("SIGTERM");
    } else if (exit.code !== 0) {
      // Best effort: the worker downloads missing models on first use
      const message = `Prewarm exited with code ${exit.code ?? "unknown"}; models download on first use`;
      ctx.logger.info(message);
      return ok(message);
    }

    ctx.logger.ok("Chroma models cached");
    return ok("Chroma models cached");
  },
};
