import type { CommandRunner } from "./command.js";
import { isSuccess } from "./command.js";
import type { ToolDependency } from "./tool-registry.js";
import type { ToolLocations } from "./types.js";

export interface ToolDetectionResult {
  toolId: string;
  installed: boolean;
  binaryPath: string | null;
  version: string | null;
}

export function parseVersion(raw: string): string | null {
  const match = raw.match(/v?(\d+\.\d+(?:\.\d+)?(?:[-+][0-9A-Za-z.-]+)?)/);
  return match ? match[1] : null;
}

export async function detectTool(
  tool: ToolDependency,
  runner: CommandRunner,
  toolPath: ToolLocations
): Promise<ToolDetectionResult> {
  const binaryPath = await runner.which(tool.binaryName, toolPath);
  if (!binaryPath) {
    return { toolId: tool.id, installed: false, binaryPath: null, version: null };
  }

  const result = await runner.run(tool.versionCommand, { toolPath, timeoutMs: 20000 });
  const version = isSuccess(result) ? parseVersion(`${result.stdout} ${result.stderr}`) : null;
  return { toolId: tool.id, installed: true, binaryPath, version };
}
