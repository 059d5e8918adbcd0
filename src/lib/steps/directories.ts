import { FilesystemError } from "../errors.js";
import { checkThenApply } from "../modules/types.js";
import { directoryLayoutModule } from "../modules/directory-layout.js";
import type { InstallPaths, InstallStep } from "../types.js";
import { failed, fromModuleRun } from "./outcome.js";

export function layoutDirectories(paths: InstallPaths): string[] {
  return [paths.pluginCacheDir, paths.marketplaceDir, paths.logsDir, paths.vectorDbDir];
}

export const createDirectoriesStep: InstallStep = {
  name: "create-directories",
  policy: "fatal",

  async run(ctx) {
    ctx.logger.log("Creating directories...");
    const directories = layoutDirectories(ctx.paths);
    const run = await checkThenApply(directoryLayoutModule, { directories });
    return fromModuleRun(run, (message) =>
      failed(new FilesystemError("create-directories", ctx.paths.pluginsDir, message))
    );
  },
};
