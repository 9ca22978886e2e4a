import { useCallback, useEffect, useRef } from "react";
import type { Document } from "../../markup/types.js";
import type { Frame } from "../../playback/frame-sink.js";
import { PlaybackSession } from "../../playback/session.js";
import type { PlaybackEventCallback, PlaybackResult, PlaybackSignal } from "../../playback/types.js";

interface UsePlaybackOptions {
  document: Document;
  columns: number;
  indent: number;
  autoplaySeconds: number | null;
  onFrame: (frame: Frame) => void;
  onFinished: (result: PlaybackResult) => void;
  onError: (error: Error) => void;
  onEvent?: PlaybackEventCallback;
}

interface UsePlaybackResult {
  send: (signal: PlaybackSignal) => void;
  resize: (columns: number) => void;
}

/**
 * Start the playback engine once on mount. Key presses reach it through the
 * session's signal queue; unmounting closes the queue, which the engine sees
 * as quit.
 */
export function usePlayback(options: UsePlaybackOptions): UsePlaybackResult {
  const sessionRef = useRef<PlaybackSession | null>(null);
  const optionsRef = useRef(options);
  optionsRef.current = options;

  const getSession = useCallback((): PlaybackSession => {
    if (!sessionRef.current) {
      const initial = optionsRef.current;
      sessionRef.current = new PlaybackSession({
        document: initial.document,
        columns: initial.columns,
        indent: initial.indent,
        autoplaySeconds: initial.autoplaySeconds,
        onFrame: (frame) => optionsRef.current.onFrame(frame),
        onEvent: initial.onEvent,
      });
    }
    return sessionRef.current;
  }, []);

  useEffect(() => {
    const session = getSession();

    let active = true;
    session.start().then(
      (result) => {
        if (active) optionsRef.current.onFinished(result);
      },
      (error: unknown) => {
        if (active) optionsRef.current.onError(error instanceof Error ? error : new Error(String(error)));
      }
    );

    return () => {
      active = false;
      session.close();
    };
  }, [getSession]);

  const send = useCallback(
    (signal: PlaybackSignal) => {
      getSession().send(signal);
    },
    [getSession]
  );

  const resize = useCallback(
    (columns: number) => {
      getSession().resize(columns);
    },
    [getSession]
  );

  return { send, resize };
}
