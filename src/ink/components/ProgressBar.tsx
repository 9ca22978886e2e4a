import React from "react";
import { Text } from "ink";

interface ProgressBarProps {
  value: number;
  total: number;
  width?: number;
}

export function progressCells(value: number, total: number, width: number): { filled: number; empty: number } {
  const filled = total > 0 ? Math.round((Math.min(value, total) / total) * width) : 0;
  return { filled, empty: width - filled };
}

export function ProgressBar({ value, total, width = 20 }: ProgressBarProps): React.ReactElement {
  const { filled, empty } = progressCells(value, total, width);

  return (
    <Text>
      <Text color="cyan">{"█".repeat(filled)}</Text>
      <Text dimColor>{"░".repeat(empty)}</Text>
    </Text>
  );
}
