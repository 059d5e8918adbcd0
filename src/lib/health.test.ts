import { describe, it, expect } from "vitest";
import { healthUrl, checkHealth, waitForHealthy, type HealthCheck } from "./health.js";
import { WorkerSettingsSchema } from "./config/schema.js";
import { createTestClock } from "./testing.js";

const HEALTH_URL = "http://127.0.0.1:37777/api/health";

describe("healthUrl", () => {
  it("joins host, port and path", () => {
    expect(healthUrl(WorkerSettingsSchema.parse({}))).toBe(HEALTH_URL);
    expect(healthUrl(WorkerSettingsSchema.parse({ port: 4000, health_path: "/healthz" }))).toBe(
      "http://127.0.0.1:4000/healthz"
    );
  });
});

describe("checkHealth", () => {
  it("is healthy when the body reports status ok", async () => {
    const result = await checkHealth(async () => new Response('{"status":"ok","uptime":12}'), HEALTH_URL);
    expect(result).toEqual({ healthy: true, detail: "status ok" });
  });

  it("reports why the endpoint is not healthy", async () => {
    expect(await checkHealth(async () => new Response("", { status: 500 }), HEALTH_URL)).toEqual({
      healthy: false,
      detail: "HTTP 500",
    });
    expect(await checkHealth(async () => new Response("<html>"), HEALTH_URL)).toEqual({
      healthy: false,
      detail: "response is not JSON",
    });
    expect(await checkHealth(async () => new Response('{"ok":true}'), HEALTH_URL)).toEqual({
      healthy: false,
      detail: "response has no status field",
    });
    expect(await checkHealth(async () => new Response('{"status":"degraded"}'), HEALTH_URL)).toEqual({
      healthy: false,
      detail: "status degraded",
    });
  });

  it("treats a connection error as unhealthy", async () => {
    const result = await checkHealth(async () => {
      throw new TypeError("fetch failed");
    }, HEALTH_URL);
    expect(result).toEqual({ healthy: false, detail: "fetch failed" });
  });
});

describe("waitForHealthy", () => {
  it("returns as soon as a check succeeds", async () => {
    const clock = createTestClock();
    const answers: HealthCheck[] = [
      { healthy: false, detail: "HTTP 503" },
      { healthy: true, detail: "status ok" },
    ];
    let index = 0;

    const result = await waitForHealthy({
      check: async () => answers[index++],
      sleep: clock.sleep,
      now: clock.now,
      intervalMs: 500,
      timeoutMs: 15000,
    });

    expect(result).toEqual({ healthy: true, detail: "status ok", attempts: 2 });
    expect(clock.elapsed()).toBe(500);
  });

  it("checks once even with a zero deadline", async () => {
    const clock = createTestClock();
    const result = await waitForHealthy({
      check: async () => ({ healthy: false, detail: "connection refused" }),
      sleep: clock.sleep,
      now: clock.now,
      intervalMs: 500,
      timeoutMs: 0,
    });

    expect(result).toEqual({ healthy: false, detail: "connection refused", attempts: 1 });
    expect(clock.elapsed()).toBe(0);
  });
});
