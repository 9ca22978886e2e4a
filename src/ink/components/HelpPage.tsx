import React from "react";
import { Box, Text } from "ink";
import { HELP_ENTRIES } from "../keymap.js";
import { KeyHints } from "./primitives/KeyHints.js";

export function HelpPage(): React.ReactElement {
  return (
    <Box flexDirection="column" paddingX={3} paddingY={1}>
      <Box marginBottom={1}>
        <Text bold>termdeck help</Text>
      </Box>
      <KeyHints hints={HELP_ENTRIES} vertical />
      <Box marginTop={1}>
        <Text dimColor>press any key to return</Text>
      </Box>
    </Box>
  );
}
