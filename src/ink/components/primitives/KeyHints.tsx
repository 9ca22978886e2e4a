import React from "react";
import { Box, Text } from "ink";

export interface KeyHint {
  key: string;
  label: string;
}

interface KeyHintsProps {
  hints: readonly KeyHint[];
  /** One hint per row instead of a single line */
  vertical?: boolean;
}

export function KeyHints({ hints, vertical = false }: KeyHintsProps): React.ReactElement {
  if (vertical) {
    const keyWidth = Math.max(...hints.map((hint) => hint.key.length)) + 2;
    return (
      <Box flexDirection="column">
        {hints.map((hint) => (
          <Box key={hint.key}>
            <Box width={keyWidth}>
              <Text color="yellow">{hint.key}</Text>
            </Box>
            <Text>{hint.label}</Text>
          </Box>
        ))}
      </Box>
    );
  }

  return (
    <Box>
      {hints.map((hint, index) => (
        <Box key={hint.key} marginRight={index < hints.length - 1 ? 2 : 0}>
          <Text color="yellow">{hint.key}</Text>
          <Text color="gray"> {hint.label}</Text>
        </Box>
      ))}
    </Box>
  );
}
