import type OpenAI from "openai";
import { toFile } from "openai/uploads";

import type { TranscribeParams, Transcriber } from "./capabilities.js";

const MIME_TO_EXTENSION: Record<string, string> = {
  "audio/webm": "webm",
  "audio/webm;codecs=opus": "webm",
  "audio/ogg": "ogg",
  "audio/ogg;codecs=opus": "ogg",
  "audio/mp4": "mp4",
  "audio/mpeg": "mp3",
  "audio/wav": "wav",
  "audio/x-wav": "wav"
};

/** Recognition is English-only: the tutor always listens to the child in English. */
const RECOGNITION_LANGUAGE = "en";

export function createOpenAiTranscriber(client: OpenAI, model: string): Transcriber {
  return {
    available: true,
    async transcribe({ audio, mimeType }: TranscribeParams): Promise<string> {
      const extension = MIME_TO_EXTENSION[mimeType] ?? "webm";
      const file = await toFile(audio, `turn.${extension}`, {
        type: mimeType || "audio/webm"
      });

      const response = await client.audio.transcriptions.create({
        model,
        file,
        language: RECOGNITION_LANGUAGE
      });

      return response.text?.trim() ?? "";
    }
  };
}
