import React from "react";
import { Box, Text } from "ink";
import type { InstallerSettings } from "../lib/config/schema.js";
import type { InstallationReport } from "../lib/types.js";
import { buildGuidance, warningsOf } from "../lib/report.js";

interface PostInstallGuideProps {
  report: InstallationReport;
  settings: InstallerSettings;
  failure: string | null;
}

export function PostInstallGuide({ report, settings, failure }: PostInstallGuideProps) {
  if (report.status === "aborted") {
    const summary = report.errorCount > 0 ? `${report.errorCount} errors found` : "Installation aborted.";
    return (
      <Box flexDirection="column" marginTop={1}>
        <Text color="red" bold>
          ✗ {summary}
        </Text>
        {failure && <Text color="red">{failure}</Text>}
      </Box>
    );
  }

  const warnings = warningsOf(report);

  return (
    <Box flexDirection="column" marginTop={1}>
      <Text color="green" bold>
        ✓ Installation complete!
      </Text>
      {warnings.length > 0 && (
        <Text color="yellow">
          {warnings.length} {warnings.length === 1 ? "step" : "steps"} finished with warnings
        </Text>
      )}
      <Box flexDirection="column" marginTop={1}>
        {buildGuidance(settings).map((line, index) => (
          <Text key={index} color={index === 0 ? "white" : "gray"}>
            {line}
          </Text>
        ))}
      </Box>
    </Box>
  );
}
