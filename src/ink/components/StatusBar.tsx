import React from "react";
import { Box, Text } from "ink";
import type { PageStatus } from "../../playback/types.js";
import { ProgressBar } from "./ProgressBar.js";

interface StatusBarProps {
  status: PageStatus;
  notice?: string | null;
}

export function formatSlideNumber(status: PageStatus): string {
  return `[slide ${status.page}/${status.total}]`;
}

export function StatusBar({ status, notice }: StatusBarProps): React.ReactElement {
  return (
    <Box>
      <Text bold>{formatSlideNumber(status)}</Text>
      <Text> {status.name}</Text>
      <Box marginLeft={2}>
        <ProgressBar value={status.page} total={status.total} />
      </Box>
      {notice && <Text color="yellow"> {notice}</Text>}
    </Box>
  );
}
