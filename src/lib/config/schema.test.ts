import { describe, it, expect } from "vitest";
import { InstallerConfigSchema, WorkerSettingsSchema, PluginSettingsSchema } from "./schema.js";

describe("InstallerConfigSchema", () => {
  it("accepts empty object and fills defaults", () => {
    const result = InstallerConfigSchema.parse({});
    expect(result.plugin.marketplace_id).toBe("thedotmack");
    expect(result.plugin.name).toBe("claude-mem");
    expect(result.plugin.project_dir).toBeUndefined();
    expect(result.worker.port).toBe(37777);
    expect(result.worker.health_path).toBe("/api/health");
    expect(result.prewarm.grace_ms).toBe(10000);
    expect(result.prewarm.timeout_seconds).toBe(30);
    expect(result.shell.profiles).toEqual([".bashrc", ".profile", ".zshrc"]);
  });

  it("fills nested defaults for partially specified sections", () => {
    const result = InstallerConfigSchema.parse({ worker: { port: 40000 } });
    expect(result.worker.port).toBe(40000);
    expect(result.worker.host).toBe("127.0.0.1");
    expect(result.worker.poll_interval_ms).toBe(500);
  });
});

describe("WorkerSettingsSchema", () => {
  it("rejects out-of-range ports", () => {
    expect(WorkerSettingsSchema.safeParse({ port: 70000 }).success).toBe(false);
  });

  it("requires an absolute health path", () => {
    expect(WorkerSettingsSchema.safeParse({ health_path: "api/health" }).success).toBe(false);
  });
});

describe("PluginSettingsSchema", () => {
  it("rejects marketplace ids that could escape the plugins dir", () => {
    expect(PluginSettingsSchema.safeParse({ marketplace_id: "../evil" }).success).toBe(false);
    expect(PluginSettingsSchema.safeParse({ marketplace_id: "a/b" }).success).toBe(false);
    expect(PluginSettingsSchema.safeParse({ marketplace_id: "team.tools-2" }).success).toBe(true);
  });
});
