import React, { useEffect } from "react";
import { Box, Text, useApp } from "ink";
import { useStore } from "./lib/store.js";
import type { InstallerSettings } from "./lib/config/schema.js";
import { StepList } from "./components/StepList.js";
import { LogPanel } from "./components/LogPanel.js";
import { StatusBar } from "./components/StatusBar.js";
import { PostInstallGuide } from "./components/PostInstallGuide.js";

interface AppProps {
  settings: InstallerSettings;
}

/** Renders installer progress from the store; exits once the run reaches a terminal phase. */
export function App({ settings }: AppProps) {
  const { exit } = useApp();
  const phase = useStore((state) => state.phase);
  const steps = useStore((state) => state.steps);
  const logs = useStore((state) => state.logs);
  const report = useStore((state) => state.report);
  const failure = useStore((state) => state.failure);

  useEffect(() => {
    if (phase === "completed" || phase === "aborted") exit();
  }, [phase, exit]);

  const current = steps.find((step) => step.status === "running");
  const finished = steps.filter((step) => step.status !== "pending" && step.status !== "running").length;

  return (
    <Box flexDirection="column">
      <Text bold color="cyan">
        {settings.plugin.name} installer
      </Text>
      <StepList steps={steps} />
      <LogPanel logs={logs} />
      {report ? (
        <PostInstallGuide report={report} settings={settings} failure={failure} />
      ) : (
        <StatusBar phase={phase} current={current?.name} completed={finished} total={steps.length} />
      )}
    </Box>
  );
}
