import { useCallback, useEffect, useMemo, useRef, useState } from "react";

import { blobToBase64 } from "../audio/encoding";
import { AudioClipPlayer, isAbortError } from "../audio/player";
import { PttRecorder } from "../audio/recorder";
import type { TutorSettings } from "../tutorOptions";

const WS_URL = import.meta.env.VITE_WS_URL ?? defaultWsUrl();

export type TutorState = "idle" | "connecting" | "recording" | "thinking" | "speaking" | "error";

export type TranscriptItem = {
  id: string;
  createdAt: string;
  role: "user" | "assistant" | "system";
  text: string;
  /** English original of a translated tutor reply. */
  original?: string;
};

export type UseTutorSocketResult = {
  state: TutorState;
  turns: TranscriptItem[];
  error: string | null;
  beginPress: () => Promise<void>;
  endPress: () => Promise<void>;
  sendText: (text: string) => Promise<void>;
  resetSession: () => Promise<void>;
};

type ServerMessage =
  | { type: "transcription"; text: string }
  | { type: "audio_response"; audio_data: string; translated_text: string; original_english: string }
  | { type: "backend_message"; message: string; error: string };

type ClientMessage =
  | ({ type: "final_audio_blob"; audio_data: string; mime_type: string } & TurnFields)
  | ({ type: "text_message"; text: string } & TurnFields);

type TurnFields = {
  mode: string;
  scenario: string;
  language: string;
};

export function useTutorSocket(settings: TutorSettings): UseTutorSocketResult {
  const recorderRef = useRef<PttRecorder>();
  const playerRef = useRef<AudioClipPlayer>();
  const wsRef = useRef<WebSocket | null>(null);
  const settingsRef = useRef(settings);
  const pressingRef = useRef(false);
  const stateRef = useRef<TutorState>("idle");

  const [state, setState] = useState<TutorState>("idle");
  const [turns, setTurns] = useState<TranscriptItem[]>([]);
  const [error, setError] = useState<string | null>(null);

  if (!recorderRef.current) {
    recorderRef.current = new PttRecorder();
  }

  if (!playerRef.current) {
    playerRef.current = new AudioClipPlayer();
  }

  useEffect(() => {
    stateRef.current = state;
  }, [state]);

  useEffect(() => {
    settingsRef.current = settings;
  }, [settings]);

  const appendTranscript = useCallback((item: Omit<TranscriptItem, "id" | "createdAt">) => {
    setTurns((current) => [
      ...current,
      {
        ...item,
        id: crypto.randomUUID(),
        createdAt: new Date().toISOString()
      }
    ]);
  }, []);

  const handleServerMessage = useCallback(
    async (message: ServerMessage) => {
      switch (message.type) {
        case "transcription":
          appendTranscript({ role: "user", text: message.text || "(nothing heard)" });
          return;
        case "audio_response":
          appendTranscript({
            role: "assistant",
            text: message.translated_text,
            original: message.translated_text === message.original_english ? undefined : message.original_english
          });
          setState("speaking");
          try {
            await playerRef.current?.playBase64(message.audio_data);
            setState("idle");
          } catch (cause) {
            if (isAbortError(cause)) {
              return;
            }
            setState("error");
            setError(toErrorMessage(cause, "Audio playback failed"));
          }
          return;
        case "backend_message":
          setState("error");
          setError(message.error || message.message);
          appendTranscript({ role: "system", text: message.message });
          return;
        default:
          return;
      }
    },
    [appendTranscript]
  );

  const connectIfNeeded = useCallback(async (): Promise<WebSocket> => {
    const current = wsRef.current;
    if (current && current.readyState === WebSocket.OPEN) {
      return current;
    }

    setState("connecting");

    const ws = new WebSocket(WS_URL);
    wsRef.current = ws;

    ws.onmessage = (event) => {
      try {
        const data = JSON.parse(String(event.data)) as ServerMessage;
        void handleServerMessage(data);
      } catch {
        setError("Received an unreadable message from the server");
      }
    };

    ws.onclose = () => {
      if (wsRef.current === ws) {
        wsRef.current = null;
      }
    };

    await new Promise<void>((resolve, reject) => {
      const handleOpen = () => {
        ws.removeEventListener("error", handleError);
        resolve();
      };

      const handleError = () => {
        ws.removeEventListener("open", handleOpen);
        reject(new Error("Could not reach the tutor server"));
      };

      ws.addEventListener("open", handleOpen, { once: true });
      ws.addEventListener("error", handleError, { once: true });
    });

    ws.onerror = () => {
      setState("error");
      setError("Connection to the tutor server failed");
    };

    setState("idle");
    return ws;
  }, [handleServerMessage]);

  const send = useCallback(
    async (message: ClientMessage) => {
      const ws = await connectIfNeeded();
      ws.send(JSON.stringify(message));
      setState("thinking");
    },
    [connectIfNeeded]
  );

  const beginPress = useCallback(async () => {
    if (pressingRef.current) {
      return;
    }
    pressingRef.current = true;

    try {
      setError(null);

      if (stateRef.current === "speaking") {
        await playerRef.current?.stop();
      }

      await recorderRef.current?.start();
      setState("recording");
    } catch (cause) {
      pressingRef.current = false;
      setState("error");
      setError(toErrorMessage(cause, "Could not start recording, check microphone permissions"));
    }
  }, []);

  const endPress = useCallback(async () => {
    if (!pressingRef.current) {
      return;
    }
    pressingRef.current = false;

    if (stateRef.current !== "recording") {
      return;
    }

    try {
      const clip = await recorderRef.current?.stop();
      if (!clip) {
        setState("idle");
        return;
      }

      await send({
        type: "final_audio_blob",
        audio_data: await blobToBase64(clip.blob),
        mime_type: clip.mimeType,
        ...settingsRef.current
      });
    } catch (cause) {
      setState("error");
      setError(toErrorMessage(cause, "Could not send the recording"));
    }
  }, [send]);

  const sendText = useCallback(
    async (text: string) => {
      const trimmed = text.trim();
      if (!trimmed) {
        return;
      }

      try {
        setError(null);
        appendTranscript({ role: "user", text: trimmed });
        await send({ type: "text_message", text: trimmed, ...settingsRef.current });
      } catch (cause) {
        setState("error");
        setError(toErrorMessage(cause, "Could not send the message"));
      }
    },
    [appendTranscript, send]
  );

  // Closing the socket ends the server-side roleplay session as well.
  const resetSession = useCallback(async () => {
    pressingRef.current = false;
    wsRef.current?.close();
    wsRef.current = null;

    await playerRef.current?.stop();

    setTurns([]);
    setError(null);
    setState("idle");
  }, []);

  useEffect(() => {
    return () => {
      wsRef.current?.close();
      void recorderRef.current?.dispose();
      void playerRef.current?.dispose();
    };
  }, []);

  return useMemo(
    () => ({
      state,
      turns,
      error,
      beginPress,
      endPress,
      sendText,
      resetSession
    }),
    [state, turns, error, beginPress, endPress, sendText, resetSession]
  );
}

function defaultWsUrl(): string {
  const protocol = window.location.protocol === "https:" ? "wss:" : "ws:";
  return `${protocol}//${window.location.host}/ws`;
}

function toErrorMessage(cause: unknown, fallback: string): string {
  if (cause instanceof Error && cause.message.trim().length > 0) {
    return cause.message;
  }

  return fallback;
}
