import React from "react";
import { Box, Text, useInput } from "ink";
import TextInput from "ink-text-input";

interface JumpPromptProps {
  value: string;
  totalPages: number;
  onChange: (value: string) => void;
  onSubmit: (value: string) => void;
  onCancel: () => void;
}

export function JumpPrompt({ value, totalPages, onChange, onSubmit, onCancel }: JumpPromptProps): React.ReactElement {
  useInput((_input, key) => {
    if (key.escape) onCancel();
  });

  return (
    <Box>
      <Text color="cyan">jump to slide (1-{totalPages}): </Text>
      <TextInput value={value} onChange={onChange} onSubmit={onSubmit} />
    </Box>
  );
}
