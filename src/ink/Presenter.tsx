import React, { useCallback, useEffect, useReducer } from "react";
import { Box, Text, useApp, useInput, useStdout } from "ink";
import type { Config } from "../config.js";
import type { Document } from "../markup/types.js";
import type { Frame } from "../playback/frame-sink.js";
import type { PlaybackEventCallback, PlaybackResult } from "../playback/types.js";
import { HelpPage } from "./components/HelpPage.js";
import { JumpPrompt } from "./components/JumpPrompt.js";
import { KeyHints } from "./components/primitives/KeyHints.js";
import { SlideView } from "./components/SlideView.js";
import { StatusBar } from "./components/StatusBar.js";
import { usePlayback } from "./hooks/usePlayback.js";
import { PRESENTER_HINTS, mapKey, parseJumpInput } from "./keymap.js";
import { presenterReducer } from "./state/presenter-state.js";
import { initialPresenterState } from "./types.js";
import type { PresenterState } from "./types.js";

export type PresenterConfig = Pick<Config, "autoplaySeconds" | "indent" | "showStatus">;

interface PresenterProps {
  document: Document;
  config: PresenterConfig;
  onEvent?: PlaybackEventCallback;
  onFinished?: (result: PlaybackResult) => void;
}

interface PresenterViewProps {
  state: PresenterState;
  totalPages: number;
  showStatus: boolean;
  onJumpChange: (value: string) => void;
  onJumpSubmit: (value: string) => void;
  onJumpCancel: () => void;
}

export function PresenterView({
  state,
  totalPages,
  showStatus,
  onJumpChange,
  onJumpSubmit,
  onJumpCancel,
}: PresenterViewProps): React.ReactElement {
  if (state.mode === "help") {
    return <HelpPage />;
  }

  const status = state.frame?.status;

  return (
    <Box flexDirection="column">
      <SlideView frame={state.frame} />
      {state.mode === "jump" && (
        <Box marginTop={1}>
          <JumpPrompt
            value={state.jumpInput}
            totalPages={totalPages}
            onChange={onJumpChange}
            onSubmit={onJumpSubmit}
            onCancel={onJumpCancel}
          />
        </Box>
      )}
      {showStatus && status && (
        <Box flexDirection="column" marginTop={1}>
          <StatusBar status={status} notice={state.notice} />
          <KeyHints hints={PRESENTER_HINTS} />
        </Box>
      )}
      {state.mode === "finished" && <Text dimColor>end of presentation</Text>}
    </Box>
  );
}

export function Presenter({ document, config, onEvent, onFinished }: PresenterProps): React.ReactElement {
  const { exit } = useApp();
  const { stdout } = useStdout();
  const [state, dispatch] = useReducer(presenterReducer, initialPresenterState);

  const handleFrame = useCallback((frame: Frame) => {
    dispatch({ type: "SHOW_FRAME", frame });
  }, []);

  const handleFinished = useCallback(
    (result: PlaybackResult) => {
      dispatch({ type: "FINISHED", reason: result.reason });
      onFinished?.(result);
      exit();
    },
    [exit, onFinished]
  );

  const handleError = useCallback(
    (error: Error) => {
      exit(error);
    },
    [exit]
  );

  const { send, resize } = usePlayback({
    document,
    columns: stdout.columns || 80,
    indent: config.indent,
    autoplaySeconds: config.autoplaySeconds,
    onFrame: handleFrame,
    onFinished: handleFinished,
    onError: handleError,
    onEvent,
  });

  useEffect(() => {
    const handleResize = () => {
      resize(stdout.columns || 80);
    };
    stdout.on("resize", handleResize);
    return () => {
      stdout.off("resize", handleResize);
    };
  }, [stdout, resize]);

  useInput(
    (input, key) => {
      if (state.mode === "help") {
        dispatch({ type: "TOGGLE_HELP" });
        return;
      }

      const command = mapKey(input, key);
      switch (command.type) {
        case "signal":
          send(command.signal);
          return;
        case "open_jump":
          dispatch({ type: "OPEN_JUMP" });
          return;
        case "toggle_help":
          dispatch({ type: "TOGGLE_HELP" });
          return;
        case "none":
          return;
      }
    },
    { isActive: state.mode === "presenting" || state.mode === "help" }
  );

  const handleJumpSubmit = useCallback(
    (value: string) => {
      const page = parseJumpInput(value, document.pages.length);
      if (page === null) {
        dispatch({ type: "CLOSE_JUMP", notice: `no slide "${value}"` });
        return;
      }
      dispatch({ type: "CLOSE_JUMP" });
      send({ type: "jump", page });
    },
    [document.pages.length, send]
  );

  return (
    <PresenterView
      state={state}
      totalPages={document.pages.length}
      showStatus={config.showStatus}
      onJumpChange={(value) => dispatch({ type: "SET_JUMP_INPUT", value })}
      onJumpSubmit={handleJumpSubmit}
      onJumpCancel={() => dispatch({ type: "CLOSE_JUMP" })}
    />
  );
}
