import { existsSync } from "fs";
import { join } from "path";
import { VerificationError } from "../errors.js";
import { TOOL_DEPENDENCIES } from "../tool-registry.js";
import type { InstallStep } from "../types.js";
import { failed, ok } from "./outcome.js";

export const verifyStep: InstallStep = {
  name: "verify",
  policy: "fatal",

  async run(ctx) {
    ctx.logger.log("Verifying installation...");
    const errors: string[] = [];

    for (const tool of TOOL_DEPENDENCIES) {
      if (!(await ctx.commands.which(tool.binaryName, ctx.toolPath))) {
        errors.push(`${tool.binaryName} not in PATH`);
      }
    }

    if (!existsSync(join(ctx.paths.marketplaceDir, ctx.settings.plugin.output_dir))) {
      errors.push("Plugin not synced");
    }

    if (!existsSync(ctx.paths.databaseFile)) {
      ctx.logger.info("Database not yet created (will be on first use)");
    }

    if (errors.length > 0) {
      errors.forEach((line) => ctx.logger.err(line));
      const noun = errors.length === 1 ? "error" : "errors";
      return failed(new VerificationError("verify", errors.length, `${errors.length} ${noun} found: ${errors.join(", ")}`));
    }

    ctx.logger.ok("Installation verified");
    return ok("Installation verified");
  },
};
