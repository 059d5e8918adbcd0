import { TOOL_DEPENDENCIES, type ToolDependency } from "../tool-registry.js";
import type { InstallStep } from "../types.js";
import { buildPluginStep } from "./build.js";
import { createDirectoriesStep } from "./directories.js";
import { configurePathStep } from "./environment.js";
import { prewarmStep } from "./prewarm.js";
import { registerMarketplaceStep } from "./registry.js";
import { ensureToolStep } from "./tools.js";
import { verifyStep } from "./verify.js";
import { startWorkerStep } from "./worker.js";

/** The installation sequence, in execution order. */
export function buildInstallSteps(tools: readonly ToolDependency[] = TOOL_DEPENDENCIES): InstallStep[] {
  return [
    ...tools.map(ensureToolStep),
    configurePathStep,
    createDirectoriesStep,
    registerMarketplaceStep,
    buildPluginStep,
    prewarmStep,
    startWorkerStep,
    verifyStep,
  ];
}

export { ensureToolStep } from "./tools.js";
export { configurePathStep } from "./environment.js";
export { createDirectoriesStep, layoutDirectories } from "./directories.js";
export { registerMarketplaceStep } from "./registry.js";
export { buildPluginStep, readPluginVersion } from "./build.js";
export { prewarmStep, prewarmCommand } from "./prewarm.js";
export { startWorkerStep } from "./worker.js";
export { verifyStep } from "./verify.js";
