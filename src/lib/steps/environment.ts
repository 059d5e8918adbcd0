import { join } from "path";
import { checkThenApply } from "../modules/types.js";
import { shellProfileModule } from "../modules/shell-profile.js";
import { buildPathLine, pathMarker, TOOL_DEPENDENCIES } from "../tool-registry.js";
import type { InstallStep } from "../types.js";
import { fromModuleRun, warning } from "./outcome.js";

export const configurePathStep: InstallStep = {
  name: "configure-path",
  policy: "advisory",

  async run(ctx) {
    const params = {
      profiles: ctx.settings.shell.profiles.map((profile) => join(ctx.paths.home, profile)),
      marker: pathMarker(TOOL_DEPENDENCIES),
      line: buildPathLine(TOOL_DEPENDENCIES),
    };

    const result = fromModuleRun(await checkThenApply(shellProfileModule, params), (message) => warning(message));
    if (result.outcome.kind === "ok" || result.outcome.kind === "already-satisfied") {
      ctx.logger.ok(result.outcome.message);
    }
    return result;
  },
};
