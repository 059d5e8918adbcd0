#!/usr/bin/env node
import React from "react";
import { render } from "ink";
import { App } from "./App.js";
import { useStore } from "./lib/store.js";
import { formatConfigError, loadConfig } from "./lib/config/index.js";
import { createConsoleLogger, createLogger, logError } from "./lib/logger.js";
import { createInstallContext } from "./lib/context.js";
import { buildInstallSteps } from "./lib/steps/index.js";
import { runInstaller } from "./lib/run.js";
import { formatReport } from "./lib/report.js";

async function main(): Promise<number> {
  const { config, errors } = loadConfig();
  const interactive = Boolean(process.stdout.isTTY);
  const logger = interactive
    ? createLogger((level, message) => useStore.getState().appendLog(level, message))
    : createConsoleLogger();

  for (const error of errors) {
    logger.warn(`Using defaults: ${formatConfigError(error)}`);
  }

  const steps = buildInstallSteps();
  const ctx = createInstallContext(config, { logger });

  if (!interactive) {
    const { report, exitCode } = await runInstaller(steps, ctx);
    console.log(["", ...formatReport(report, config)].join("\n"));
    return exitCode;
  }

  useStore.getState().setPlan(steps);
  const app = render(<App settings={config} />);
  try {
    const { exitCode } = await runInstaller(steps, ctx, useStore.getState().applyEvent);
    await app.waitUntilExit();
    return exitCode;
  } catch (error) {
    app.unmount();
    throw error;
  }
}

void main().then(
  (exitCode) => {
    process.exitCode = exitCode;
  },
  (error: unknown) => {
    logError("claude-mem-install", error);
    process.exitCode = 1;
  }
);
