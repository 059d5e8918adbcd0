import { join } from "path";
import { ServiceUnreachableError } from "../errors.js";
import { healthUrl, checkHealth, waitForHealthy } from "../health.js";
import type { InstallStep } from "../types.js";
import { ok, satisfied, warning } from "./outcome.js";

const STEP = "start-worker";

export const startWorkerStep: InstallStep = {
  name: STEP,
  policy: "advisory",

  async run(ctx) {
    const { worker } = ctx.settings;
    const url = healthUrl(worker);
    const check = () => checkHealth(ctx.fetch, url);

    if ((await check()).healthy) {
      const message = `Worker already running on port ${worker.port}`;
      ctx.logger.ok(message);
      return satisfied(message);
    }

    ctx.logger.log("Starting worker service...");
    const script = join(ctx.paths.marketplaceDir, worker.script);
    const proc = ctx.processes.start(
      { cmd: "bun", args: [script, "start"] },
      { cwd: ctx.paths.marketplaceDir, toolPath: ctx.toolPath }
    );

    const status = await proc.started;
    if (!status.ok) {
      const message = `Could not start worker: ${status.error} - check logs at ${ctx.paths.logsDir}/`;
      ctx.logger.warn(message);
      return warning(message, new ServiceUnreachableError(STEP, url, message));
    }

    const result = await waitForHealthy({
      check,
      sleep: ctx.sleep,
      now: ctx.now,
      intervalMs: worker.poll_interval_ms,
      timeoutMs: worker.startup_timeout_ms,
    });

    if (result.healthy) {
      const message = `Worker running on port ${worker.port}`;
      ctx.logger.ok(message);
      return ok(message);
    }

    const message = `Worker may not have started (${result.detail}) - check logs at ${ctx.paths.logsDir}/`;
    ctx.logger.warn(message);
    return warning(message, new ServiceUnreachableError(STEP, url, message));
  },
};
