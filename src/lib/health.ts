import { z } from "zod";
import { errorMessage } from "./errors.js";
import type { WorkerSettings } from "./config/schema.js";

const CHECK_TIMEOUT_MS = 2000;

const HealthResponseSchema = z.object({ status: z.string() });

export interface HealthCheck {
  healthy: boolean;
  detail: string;
}

export function healthUrl(worker: WorkerSettings): string {
  return `http://${worker.host}:${worker.port}${worker.health_path}`;
}

/** One GET against the health endpoint. Healthy iff the body reports status "ok". */
export async function checkHealth(
  fetchImpl: typeof fetch,
  url: string,
  timeoutMs: number = CHECK_TIMEOUT_MS
): Promise<HealthCheck> {
  try {
    const response = await fetchImpl(url, { signal: AbortSignal.timeout(timeoutMs) });
    if (!response.ok) {
      return { healthy: false, detail: `HTTP ${response.status}` };
    }
    const text = await response.text();
    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch {
      return { healthy: false, detail: "response is not JSON" };
    }
    const parsed = HealthResponseSchema.safeParse(body);
    if (!parsed.success) {
      return { healthy: false, detail: "response has no status field" };
    }
    return parsed.data.status === "ok"
      ? { healthy: true, detail: "status ok" }
      : { healthy: false, detail: `status ${parsed.data.status}` };
  } catch (error) {
    return { healthy: false, detail: errorMessage(error) };
  }
}

export interface WaitOptions {
  check: () => Promise<HealthCheck>;
  sleep: (ms: number) => Promise<void>;
  now: () => Date;
  intervalMs: number;
  timeoutMs: number;
}

export interface WaitResult extends HealthCheck {
  attempts: number;
}

/**
 * Poll until healthy or until the next attempt would start past the
 * deadline. Always checks at least once.
 */
export async function waitForHealthy(options: WaitOptions): Promise<WaitResult> {
  const deadline = options.now().getTime() + options.timeoutMs;
  let attempts = 0;

  for (;;) {
    attempts++;
    const result = await options.check();
    if (result.healthy || options.now().getTime() + options.intervalMs > deadline) {
      return { ...result, attempts };
    }
    await options.sleep(options.intervalMs);
  }
}
