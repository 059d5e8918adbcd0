import { describe, it, expect, beforeEach, afterEach } from "vitest";
import {
  writeFileSync,
  mkdirSync,
  rmSync,
  existsSync,
  readFileSync,
  symlinkSync,
  readlinkSync,
  chmodSync,
  readdirSync,
  statSync,
} from "fs";
import { join } from "path";
import { tmpdir } from "os";
import { mirrorSyncModule, planMirror } from "./mirror-sync.js";

const TMP = join(tmpdir(), `mem-mirror-test-${Date.now()}`);
const SRC = join(TMP, "source");
const TGT = join(TMP, "target");

function write(root: string, relPath: string, content: string): void {
  const full = join(root, relPath);
  mkdirSync(join(full, ".."), { recursive: true });
  writeFileSync(full, content);
}

beforeEach(() => {
  mkdirSync(SRC, { recursive: true });
});

afterEach(() => {
  rmSync(TMP, { recursive: true, force: true });
});

describe("mirrorSyncModule.check", () => {
  it("returns 'missing' when target dir does not exist", async () => {
    write(SRC, "a.txt", "hello");
    const result = await mirrorSyncModule.check({ sourcePath: SRC, targetPath: TGT });
    expect(result.status).toBe("missing");
  });

  it("returns 'ok' when directories match", async () => {
    write(SRC, "dir/a.txt", "content");
    write(TGT, "dir/a.txt", "content");
    const result = await mirrorSyncModule.check({ sourcePath: SRC, targetPath: TGT });
    expect(result.status).toBe("ok");
  });

  it("returns 'drifted' when files differ", async () => {
    write(SRC, "a.txt", "new content");
    write(TGT, "a.txt", "old");
    const result = await mirrorSyncModule.check({ sourcePath: SRC, targetPath: TGT });
    expect(result.status).toBe("drifted");
    expect(result.message).toBe("1 copied, 0 dirs created, 0 removed");
  });

  it("returns 'drifted' when the target has extra files", async () => {
    write(SRC, "a.txt", "content");
    write(TGT, "a.txt", "content");
    write(TGT, "stale.txt", "old");
    const result = await mirrorSyncModule.check({ sourcePath: SRC, targetPath: TGT });
    expect(result.status).toBe("drifted");
    expect(result.message).toBe("0 copied, 0 dirs created, 1 removed");
  });

  it("returns 'failed' when source does not exist", async () => {
    const result = await mirrorSyncModule.check({ sourcePath: join(SRC, "nonexistent"), targetPath: TGT });
    expect(result.status).toBe("failed");
  });
});

describe("planMirror", () => {
  it("removes only the topmost stale directory", async () => {
    write(SRC, "keep.txt", "x");
    write(TGT, "keep.txt", "x");
    write(TGT, "old/deep/a.txt", "stale");
    write(TGT, "old/b.txt", "stale");

    const plan = await planMirror({ sourcePath: SRC, targetPath: TGT });
    expect(plan.remove).toEqual(["old"]);
    expect(plan.copyFiles).toEqual([]);
  });

  it("replaces entries whose kind changed", async () => {
    write(SRC, "thing/inner.txt", "now a dir");
    write(TGT, "thing", "was a file");

    const plan = await planMirror({ sourcePath: SRC, targetPath: TGT });
    expect(plan.remove).toEqual(["thing"]);
    expect(plan.createDirs).toEqual(["thing"]);
    expect(plan.copyFiles).toEqual(["thing/inner.txt"]);
  });

  it("ignores .git on both sides", async () => {
    write(SRC, ".git/HEAD", "ref: refs/heads/main");
    write(SRC, "a.txt", "x");
    write(TGT, "a.txt", "x");
    write(TGT, ".git/config", "[core]");
    write(TGT, "nested/.git/HEAD", "detached");
    mkdirSync(join(SRC, "nested"), { recursive: true });

    const plan = await planMirror({ sourcePath: SRC, targetPath: TGT });
    expect(plan).toEqual({ remove: [], createDirs: [], copyFiles: [], links: [] });
  });
});

describe("planMirror preserve", () => {
  it("keeps preserved target-only paths", async () => {
    write(SRC, "a.txt", "x");
    write(TGT, "a.txt", "x");
    write(TGT, "marketplace.json", "{}");
    write(TGT, "stale.txt", "old");

    const plan = await planMirror({ sourcePath: SRC, targetPath: TGT, preserve: ["marketplace.json"] });
    expect(plan.remove).toEqual(["stale.txt"]);
  });

  it("still replaces a preserved path the source provides", async () => {
    write(SRC, "marketplace.json", "{ }");
    write(TGT, "marketplace.json", "{}");

    const plan = await planMirror({ sourcePath: SRC, targetPath: TGT, preserve: ["marketplace.json"] });
    expect(plan.copyFiles).toEqual(["marketplace.json"]);
  });
});

describe("mirrorSyncModule.apply", () => {
  it("copies a tree into a missing target", async () => {
    write(SRC, "a.txt", "hello");
    write(SRC, "dir/b.txt", "world");
    write(SRC, ".claude-plugin/plugin.json", "{}");

    const result = await mirrorSyncModule.apply({ sourcePath: SRC, targetPath: TGT });
    expect(result.changed).toBe(true);
    expect(readFileSync(join(TGT, "a.txt"), "utf-8")).toBe("hello");
    expect(readFileSync(join(TGT, "dir", "b.txt"), "utf-8")).toBe("world");
    expect(existsSync(join(TGT, ".claude-plugin", "plugin.json"))).toBe(true);
  });

  it("deletes destination files absent from the source", async () => {
    write(SRC, "a.txt", "hello");
    write(TGT, "a.txt", "hello");
    write(TGT, "removed.txt", "stale");
    write(TGT, "old-version/index.js", "stale");

    await mirrorSyncModule.apply({ sourcePath: SRC, targetPath: TGT });
    expect(existsSync(join(TGT, "removed.txt"))).toBe(false);
    expect(existsSync(join(TGT, "old-version"))).toBe(false);
    expect(readFileSync(join(TGT, "a.txt"), "utf-8")).toBe("hello");
  });

  it("never copies or deletes .git entries", async () => {
    write(SRC, ".git/HEAD", "source head");
    write(SRC, "a.txt", "x");
    write(TGT, ".git/HEAD", "target head");

    await mirrorSyncModule.apply({ sourcePath: SRC, targetPath: TGT });
    expect(readFileSync(join(TGT, ".git", "HEAD"), "utf-8")).toBe("target head");
    expect(readFileSync(join(TGT, "a.txt"), "utf-8")).toBe("x");
  });

  it("recreates symlinks as links", async () => {
    write(SRC, "real.txt", "target");
    symlinkSync("real.txt", join(SRC, "link.txt"));

    await mirrorSyncModule.apply({ sourcePath: SRC, targetPath: TGT });
    expect(readlinkSync(join(TGT, "link.txt"))).toBe("real.txt");
  });

  it("is a no-op on a second run", async () => {
    write(SRC, "a.txt", "hello");
    write(SRC, "dir/b.txt", "world");

    await mirrorSyncModule.apply({ sourcePath: SRC, targetPath: TGT });
    const second = await mirrorSyncModule.apply({ sourcePath: SRC, targetPath: TGT });
    expect(second.changed).toBe(false);
    expect((await mirrorSyncModule.check({ sourcePath: SRC, targetPath: TGT })).status).toBe("ok");
  });

  it("keeps empty source directories", async () => {
    mkdirSync(join(SRC, "empty"), { recursive: true });
    const result = await mirrorSyncModule.apply({ sourcePath: SRC, targetPath: TGT });
    expect(result.changed).toBe(true);
    expect(existsSync(join(TGT, "empty"))).toBe(true);
  });

  it("replaces read-only destination files", async () => {
    write(SRC, "a.txt", "new content");
    write(TGT, "a.txt", "old");
    chmodSync(join(TGT, "a.txt"), 0o444);

    const result = await mirrorSyncModule.apply({ sourcePath: SRC, targetPath: TGT });
    expect(result.changed).toBe(true);
    expect(readFileSync(join(TGT, "a.txt"), "utf-8")).toBe("new content");
    expect(readdirSync(TGT)).toEqual(["a.txt"]);
  });

  it("gives created directories the source directory's mode", async () => {
    write(SRC, "private/key.txt", "k");
    chmodSync(join(SRC, "private"), 0o750);

    await mirrorSyncModule.apply({ sourcePath: SRC, targetPath: TGT });
    expect(statSync(join(TGT, "private")).mode & 0o777).toBe(0o750);
    expect(readFileSync(join(TGT, "private", "key.txt"), "utf-8")).toBe("k");
  });
});
