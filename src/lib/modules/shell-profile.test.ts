import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { writeFileSync, mkdirSync, rmSync, existsSync, readFileSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import { shellProfileModule, type ShellProfileParams } from "./shell-profile.js";

const TMP = join(tmpdir(), `mem-profile-test-${Date.now()}`);
const LINE = 'export PATH="$HOME/.bun/bin:$HOME/.local/bin:$PATH"';

function params(): ShellProfileParams {
  return {
    profiles: [join(TMP, ".bashrc"), join(TMP, ".profile"), join(TMP, ".zshrc")],
    marker: ".bun/bin",
    line: LINE,
  };
}

beforeEach(() => {
  mkdirSync(TMP, { recursive: true });
});

afterEach(() => {
  rmSync(TMP, { recursive: true, force: true });
});

describe("shellProfileModule.check", () => {
  it("reports profiles without the marker", async () => {
    writeFileSync(join(TMP, ".bashrc"), "alias ll='ls -l'\n");
    writeFileSync(join(TMP, ".zshrc"), 'export PATH="$HOME/.bun/bin:$PATH"\n');
    const result = await shellProfileModule.check(params());
    expect(result.status).toBe("missing");
    expect(result.message).toBe("PATH missing from .bashrc");
  });

  it("is ok when no profile exists", async () => {
    const result = await shellProfileModule.check(params());
    expect(result).toEqual({ status: "ok", message: "No shell profiles found" });
  });
});

describe("shellProfileModule.apply", () => {
  it("appends the line to existing profiles only", async () => {
    writeFileSync(join(TMP, ".bashrc"), "alias ll='ls -l'\n");

    const result = await shellProfileModule.apply(params());
    expect(result.changed).toBe(true);
    expect(result.message).toBe("PATH added to shell profiles (.bashrc)");
    expect(readFileSync(join(TMP, ".bashrc"), "utf-8")).toBe(`alias ll='ls -l'\n${LINE}\n`);
    expect(existsSync(join(TMP, ".profile"))).toBe(false);
    expect(existsSync(join(TMP, ".zshrc"))).toBe(false);
  });

  it("starts a new line when the profile lacks a trailing newline", async () => {
    writeFileSync(join(TMP, ".profile"), "umask 022");
    await shellProfileModule.apply(params());
    expect(readFileSync(join(TMP, ".profile"), "utf-8")).toBe(`umask 022\n${LINE}\n`);
  });

  it("leaves a profile containing the marker byte-identical", async () => {
    // Malformed but marked lines are never rewritten
    const original = "export PATH=~/.bun/bin:$PATH   # custom\n";
    writeFileSync(join(TMP, ".zshrc"), original);

    const first = await shellProfileModule.apply(params());
    const second = await shellProfileModule.apply(params());
    expect(first.changed).toBe(false);
    expect(second.changed).toBe(false);
    expect(readFileSync(join(TMP, ".zshrc"), "utf-8")).toBe(original);
  });

  it("does not append twice across runs", async () => {
    writeFileSync(join(TMP, ".bashrc"), "");
    await shellProfileModule.apply(params());
    const after = readFileSync(join(TMP, ".bashrc"), "utf-8");

    const second = await shellProfileModule.apply(params());
    expect(second).toEqual({ changed: false, message: "PATH already configured", warnings: undefined });
    expect(readFileSync(join(TMP, ".bashrc"), "utf-8")).toBe(after);
    expect(after).toBe(`${LINE}\n`);
  });
});
