import { copyFileSync, existsSync, readFileSync, statSync, utimesSync } from "fs";
import { join } from "path";
import { z } from "zod";
import { BuildFailureError, FilesystemError, errorMessage } from "../errors.js";
import { describeFailure, formatCommand, isSuccess, type CommandSpec } from "../command.js";
import { checkThenApply } from "../modules/types.js";
import { DEFAULT_MIRROR_EXCLUDES, mirrorSyncModule } from "../modules/mirror-sync.js";
import { filesEqual } from "../modules/hash.js";
import type { InstallContext, InstallStep, StepResult } from "../types.js";
import { failed, fromModuleRun, ok, warning } from "./outcome.js";

const STEP = "build-plugin";

const NPM_INSTALL: CommandSpec = { cmd: "npm", args: ["install", "--silent"] };
const NPM_BUILD: CommandSpec = { cmd: "npm", args: ["run", "build", "--silent"] };

/** Marketplace descriptor, copied to the marketplace root when the checkout ships one. */
const MARKETPLACE_DESCRIPTOR = join(".claude-plugin", "marketplace.json");
const ROOT_DESCRIPTOR = "marketplace.json";

// The version becomes a directory name under the plugin cache
const PluginManifestSchema = z.object({
  version: z
    .string()
    .regex(/^[a-zA-Z0-9._+-]+$/, "must be a plain version string")
    .refine((value) => value !== "." && value !== "..", "must not be a relative path segment"),
});

export function readPluginVersion(manifestPath: string): string {
  const raw: unknown = JSON.parse(readFileSync(manifestPath, "utf-8"));
  const parsed = PluginManifestSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? issue.path.join(".") : "manifest";
    throw new Error(`${manifestPath}: ${where} ${issue?.message ?? "is invalid"}`);
  }
  return parsed.data.version;
}

async function npm(ctx: InstallContext, command: CommandSpec, cwd: string): Promise<BuildFailureError | null> {
  const result = await ctx.commands.run(command, { cwd, toolPath: ctx.toolPath });
  return isSuccess(result) ? null : new BuildFailureError(STEP, formatCommand(command), describeFailure(command, result));
}

async function mirror(sourcePath: string, targetPath: string, preserve: string[] = []): Promise<StepResult> {
  const run = await checkThenApply(mirrorSyncModule, {
    sourcePath,
    targetPath,
    exclude: DEFAULT_MIRROR_EXCLUDES,
    preserve,
  });
  return fromModuleRun(run, (message) => failed(new FilesystemError(STEP, targetPath, message)));
}

/** Returns false when the destination already holds the same bytes. */
async function copyDescriptor(from: string, to: string): Promise<boolean> {
  if (existsSync(to) && (await filesEqual(from, to))) return false;
  copyFileSync(from, to);
  const { atime, mtime } = statSync(from);
  utimesSync(to, atime, mtime);
  return true;
}

export const buildPluginStep: InstallStep = {
  name: STEP,
  policy: "fatal",

  async run(ctx) {
    const { projectDir, marketplaceDir, pluginCacheDir } = ctx.paths;
    const { plugin } = ctx.settings;

    ctx.logger.log("Installing dependencies...");
    const installError = await npm(ctx, NPM_INSTALL, projectDir);
    if (installError) return failed(installError);
    ctx.logger.ok("Dependencies installed");

    ctx.logger.log("Building plugin...");
    const buildError = await npm(ctx, NPM_BUILD, projectDir);
    if (buildError) return failed(buildError);

    const manifestPath = join(projectDir, plugin.manifest);
    if (!existsSync(manifestPath)) {
      return failed(new BuildFailureError(STEP, formatCommand(NPM_BUILD), `Build produced no plugin manifest at ${manifestPath}`));
    }
    let version: string;
    try {
      version = readPluginVersion(manifestPath);
    } catch (error) {
      return failed(new BuildFailureError(STEP, formatCommand(NPM_BUILD), errorMessage(error), { cause: error }));
    }
    ctx.logger.ok(`Plugin built (v${version})`);

    ctx.logger.log("Syncing to marketplace...");
    // The root descriptor exists only in the marketplace; the mirror must not delete it.
    const marketplace = await mirror(projectDir, marketplaceDir, [ROOT_DESCRIPTOR]);
    if (marketplace.outcome.kind === "failed") return marketplace;

    const cache = await mirror(join(projectDir, plugin.output_dir), join(pluginCacheDir, version));
    if (cache.outcome.kind === "failed") return cache;

    const warnings: string[] = [];
    const descriptor = join(marketplaceDir, MARKETPLACE_DESCRIPTOR);
    let descriptorCopied = false;
    if (existsSync(descriptor)) {
      try {
        descriptorCopied = await copyDescriptor(descriptor, join(marketplaceDir, ROOT_DESCRIPTOR));
      } catch (error) {
        warnings.push(`Could not copy marketplace descriptor: ${errorMessage(error)}`);
      }
    }

    ctx.logger.log("Installing marketplace dependencies...");
    const marketplaceError = await npm(ctx, NPM_INSTALL, marketplaceDir);
    if (marketplaceError) return failed(marketplaceError);

    const unchanged =
      !descriptorCopied &&
      marketplace.outcome.kind === "already-satisfied" &&
      cache.outcome.kind === "already-satisfied";
    const message = unchanged ? `Plugin v${version} already synced` : `Plugin v${version} synced`;
    ctx.logger.ok(message);

    if (warnings.length > 0) {
      warnings.forEach((line) => ctx.logger.warn(line));
      return warning(`${message}; ${warnings.join("; ")}`);
    }
    return ok(message);
  },
};
