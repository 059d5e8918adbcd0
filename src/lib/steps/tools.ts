import { MissingToolError } from "../errors.js";
import { describeFailure, isSuccess } from "../command.js";
import { detectTool } from "../tool-detect.js";
import { toolPathSegment, type ToolDependency } from "../tool-registry.js";
import type { InstallStep, StepResult } from "../types.js";
import { failed, satisfied } from "./outcome.js";

const INSTALL_TIMEOUT_MS = 300_000;

/**
 * Make one tool resolvable. A fresh install exposes the tool's directory to
 * later steps through the returned PATH segments; the process environment
 * is never touched.
 */
export function ensureToolStep(tool: ToolDependency): InstallStep {
  const name = `ensure-${tool.id}`;

  return {
    name,
    policy: "fatal",

    async run(ctx): Promise<StepResult> {
      const detected = await detectTool(tool, ctx.commands, ctx.toolPath);
      if (detected.installed) {
        const message = `${tool.displayName} already installed: ${detected.version ?? "unknown version"}`;
        ctx.logger.ok(message);
        return satisfied(message);
      }

      ctx.logger.log(`Installing ${tool.displayName}...`);
      const result = await ctx.commands.run(tool.install, {
        cwd: ctx.paths.home,
        toolPath: ctx.toolPath,
        timeoutMs: INSTALL_TIMEOUT_MS,
      });
      if (!isSuccess(result)) {
        return failed(new MissingToolError(name, tool.id, describeFailure(tool.install, result)));
      }

      const segment = toolPathSegment(tool, ctx.paths.home);
      const toolPath = [segment, ...ctx.toolPath.filter((entry) => entry !== segment)];
      const installed = await detectTool(tool, ctx.commands, toolPath);
      if (!installed.installed) {
        return failed(
          new MissingToolError(name, tool.id, `${tool.displayName} installed but ${tool.binaryName} was not found in ${segment}`)
        );
      }

      const message = `${tool.displayName} installed: ${installed.version ?? "unknown version"}`;
      ctx.logger.ok(message);
      return { outcome: { kind: "ok", message }, exposes: [segment] };
    },
  };
}
