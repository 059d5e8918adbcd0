import { RegistryWriteError } from "../errors.js";
import { checkThenApply } from "../modules/types.js";
import { registryEntryModule } from "../modules/registry-entry.js";
import type { InstallStep, RegistryEntry } from "../types.js";
import { fromModuleRun, warning } from "./outcome.js";

export const registerMarketplaceStep: InstallStep = {
  name: "register-marketplace",
  policy: "advisory",

  async run(ctx) {
    const { registryFile, marketplaceDir } = ctx.paths;
    const key = ctx.settings.plugin.marketplace_id;

    const entry = (): RegistryEntry => ({
      source: { source: "directory", path: marketplaceDir },
      installLocation: marketplaceDir,
      lastUpdated: ctx.now().toISOString(),
    });

    const run = await checkThenApply(registryEntryModule, { registryFile, key, entry });
    const result = fromModuleRun(run, (message) => {
      const error = new RegistryWriteError("register-marketplace", registryFile, message);
      return warning(`${message} - manually add ${key} to ${registryFile}`, error);
    });

    if (result.outcome.kind === "ok" || result.outcome.kind === "already-satisfied") {
      ctx.logger.ok(result.outcome.message);
    } else if (result.outcome.kind === "warning") {
      ctx.logger.warn(result.outcome.message);
    }
    return result;
  },
};
