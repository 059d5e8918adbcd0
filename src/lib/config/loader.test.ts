import { describe, it, expect, afterEach } from "vitest";
import { writeFileSync, rmSync, mkdirSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import { loadConfig, formatConfigError } from "./loader.js";

const TMP_DIR = join(tmpdir(), `mem-installer-loader-test-${Date.now()}`);
const TMP_YAML = join(TMP_DIR, "config.yaml");

mkdirSync(TMP_DIR, { recursive: true });

afterEach(() => {
  rmSync(TMP_YAML, { force: true });
});

describe("loadConfig (YAML)", () => {
  it("returns defaults for missing file", () => {
    const result = loadConfig(join(TMP_DIR, "nonexistent.yaml"));
    expect(result.errors).toHaveLength(0);
    expect(result.config.worker.port).toBe(37777);
  });

  it("parses a valid YAML config", () => {
    writeFileSync(TMP_YAML, `
plugin:
  project_dir: ~/src/claude-mem
worker:
  port: 38000
  startup_timeout_ms: 5000
prewarm:
  enabled: false
shell:
  profiles: [.zshrc]
`.trim());

    const result = loadConfig(TMP_YAML);
    expect(result.errors).toHaveLength(0);
    expect(result.config.plugin.project_dir).toBe("~/src/claude-mem");
    expect(result.config.plugin.marketplace_id).toBe("thedotmack");
    expect(result.config.worker.port).toBe(38000);
    expect(result.config.worker.startup_timeout_ms).toBe(5000);
    expect(result.config.prewarm.enabled).toBe(false);
    expect(result.config.shell.profiles).toEqual([".zshrc"]);
  });

  it("treats an empty file as defaults", () => {
    writeFileSync(TMP_YAML, "");
    const result = loadConfig(TMP_YAML);
    expect(result.errors).toHaveLength(0);
    expect(result.config.worker.host).toBe("127.0.0.1");
  });

  it("reports a scalar document and falls back to defaults", () => {
    writeFileSync(TMP_YAML, "just a string");
    const result = loadConfig(TMP_YAML);
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0].message).toContain("YAML mapping");
    expect(result.config.worker.port).toBe(37777);
  });

  it("reports schema violations with their path", () => {
    writeFileSync(TMP_YAML, "worker:\n  port: not-a-number\n");
    const result = loadConfig(TMP_YAML);
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0].path).toEqual(["worker", "port"]);
    expect(formatConfigError(result.errors[0])).toMatch(/^.*config\.yaml: worker\.port: /);
    expect(result.config.worker.port).toBe(37777);
  });
});
