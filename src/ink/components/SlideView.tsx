import React from "react";
import { Box, Text } from "ink";
import type { StyleSet } from "../../markup/types.js";
import type { Frame, FrameLine } from "../../playback/frame-sink.js";

export interface TextStyleProps {
  bold: boolean;
  underline: boolean;
  inverse: boolean;
  color?: string;
}

/** Map a StyleSet onto Ink's <Text> attributes; "default" leaves the color unset */
export function textStyleProps(style: StyleSet): TextStyleProps {
  const props: TextStyleProps = {
    bold: style.bold,
    underline: style.underline,
    inverse: style.reverse,
  };
  if (style.color && style.color !== "default") {
    props.color = style.color;
  }
  return props;
}

export function FrameLineView({ line }: { line: FrameLine }): React.ReactElement {
  if (line.length === 0) {
    return <Text> </Text>;
  }

  return (
    <Text wrap="truncate-end">
      {line.map((segment, index) => (
        <Text key={index} {...textStyleProps(segment.style)}>
          {segment.text}
        </Text>
      ))}
    </Text>
  );
}

// Same corners and edges as output boxes
export const FRAME_BORDER = {
  topLeft: ".",
  top: "-",
  topRight: ".",
  left: "|",
  right: "|",
  bottomLeft: "`",
  bottom: "-",
  bottomRight: "'",
};

interface SlideViewProps {
  frame: Frame | null;
}

export function SlideView({ frame }: SlideViewProps): React.ReactElement {
  if (!frame) {
    return <Text dimColor>loading…</Text>;
  }

  const header = frame.status?.header;
  const footer = frame.status?.footer;
  const border = frame.status?.border === true;

  return (
    <Box flexDirection="column" width={frame.columns}>
      <Box justifyContent="center" height={1}>
        {header ? <Text>{header}</Text> : null}
      </Box>
      <Box flexDirection="column" marginTop={1} borderStyle={border ? FRAME_BORDER : undefined}>
        {frame.lines.map((line, index) => (
          <FrameLineView key={index} line={line} />
        ))}
      </Box>
      {footer ? (
        <Box justifyContent="center" marginTop={1}>
          <Text>{footer}</Text>
        </Box>
      ) : null}
    </Box>
  );
}
