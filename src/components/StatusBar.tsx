import React from "react";
import { Box, Text } from "ink";
import Spinner from "ink-spinner";
import type { RunStatus } from "../lib/types.js";

interface StatusBarProps {
  phase: RunStatus;
  current?: string;
  completed: number;
  total: number;
}

export function StatusBar({ phase, current, completed, total }: StatusBarProps) {
  const progress = `${completed}/${total}`;
  const message = phase === "pending" ? "Preparing..." : current ? `Running ${current}` : "Working...";

  return (
    <Box marginTop={1}>
      <Text color="cyan">
        <Spinner type="dots" />
      </Text>
      <Text> </Text>
      <Text color="gray">
        {message} · {progress}
      </Text>
    </Box>
  );
}
