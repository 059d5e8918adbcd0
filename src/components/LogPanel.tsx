import React from "react";
import { Box, Text } from "ink";
import type { LogLine } from "../lib/store.js";
import { LOG_GLYPHS, type LogLevel } from "../lib/logger.js";

interface LogPanelProps {
  logs: LogLine[];
  maxLines?: number;
}

const COLORS: Record<LogLevel, string> = {
  log: "blue",
  info: "gray",
  ok: "green",
  warn: "yellow",
  err: "red",
};

export function LogPanel({ logs, maxLines = 8 }: LogPanelProps) {
  if (logs.length === 0) return null;

  const visible = logs.slice(-maxLines);
  const hidden = logs.length - visible.length;

  return (
    <Box flexDirection="column" borderStyle="single" borderTop borderBottom={false} borderLeft={false} borderRight={false}>
      {hidden > 0 && <Text color="gray">  ↑ {hidden} earlier lines</Text>}
      {visible.map((line) => (
        <Box key={line.id}>
          <Text color={COLORS[line.level]}>{LOG_GLYPHS[line.level]}</Text>
          <Text> {line.message}</Text>
        </Box>
      ))}
    </Box>
  );
}
