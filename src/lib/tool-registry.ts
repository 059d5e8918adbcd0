import type { CommandSpec } from "./command.js";
import { expandPath } from "./config/path.js";

export interface ToolDependency {
  id: string;
  displayName: string;
  /** Binary whose presence on PATH means the tool is installed. */
  binaryName: string;
  versionCommand: CommandSpec;
  install: CommandSpec;
  /** Home-relative directory the installer puts the binary in. */
  pathSegment: string;
}

export const TOOL_DEPENDENCIES: readonly ToolDependency[] = [
  {
    id: "bun",
    displayName: "bun",
    binaryName: "bun",
    versionCommand: { cmd: "bun", args: ["--version"] },
    install: { cmd: "bash", args: ["-c", "curl -fsSL https://bun.sh/install | bash"] },
    pathSegment: "~/.bun/bin",
  },
  {
    id: "uv",
    displayName: "uv",
    binaryName: "uvx",
    versionCommand: { cmd: "uv", args: ["--version"] },
    install: { cmd: "sh", args: ["-c", "curl -LsSf https://astral.sh/uv/install.sh | sh"] },
    pathSegment: "~/.local/bin",
  },
];

export function toolPathSegment(tool: ToolDependency, home: string): string {
  return expandPath(tool.pathSegment, home);
}

/** Shell-profile form of a home-relative segment: "~/.bun/bin" → "$HOME/.bun/bin". */
function shellSegment(segment: string): string {
  return segment.startsWith("~/") ? `$HOME/${segment.slice(2)}` : segment;
}

export function buildPathLine(tools: readonly ToolDependency[] = TOOL_DEPENDENCIES): string {
  const segments = tools.map((tool) => shellSegment(tool.pathSegment));
  return `export PATH="${[...segments, "$PATH"].join(":")}"`;
}

/** The first tool's install directory, e.g. ".bun/bin". */
export function pathMarker(tools: readonly ToolDependency[] = TOOL_DEPENDENCIES): string {
  const first = tools[0];
  if (!first) throw new Error("No tool dependencies configured");
  return first.pathSegment.replace(/^~\//, "");
}
