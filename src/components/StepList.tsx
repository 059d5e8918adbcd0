import React from "react";
import { Box, Text } from "ink";
import Spinner from "ink-spinner";
import type { StepStatus, StepView } from "../lib/store.js";
import { STATUS_GLYPHS } from "../lib/report.js";

interface StepListProps {
  steps: StepView[];
}

const COLORS: Record<StepStatus, string> = {
  pending: "gray",
  running: "cyan",
  ok: "green",
  "already-satisfied": "green",
  skipped: "gray",
  warning: "yellow",
  failed: "red",
};

function glyph(status: StepStatus): string {
  if (status === "pending" || status === "running") return "○";
  return STATUS_GLYPHS[status];
}

export function StepList({ steps }: StepListProps) {
  return (
    <Box flexDirection="column" marginY={1}>
      {steps.map((step) => (
        <Box key={step.ordinal}>
          {step.status === "running" ? (
            <Text color={COLORS.running}>
              <Spinner type="dots" />
            </Text>
          ) : (
            <Text color={COLORS[step.status]}>{glyph(step.status)}</Text>
          )}
          <Text> </Text>
          <Text bold={step.status === "running"} color={step.status === "pending" ? "gray" : "white"}>
            {step.name}
          </Text>
          {step.policy === "advisory" && step.status === "pending" && <Text color="gray"> (optional)</Text>}
          {step.message && <Text color="gray"> · {step.message}</Text>}
        </Box>
      ))}
    </Box>
  );
}
