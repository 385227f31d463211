import type OpenAI from "openai";

import type { SynthesizeParams, SynthesizedAudio, Synthesizer } from "./capabilities.js";

export function createOpenAiSynthesizer(client: OpenAI, model: string): Synthesizer {
  return {
    available: true,
    async synthesize({ text, voice }: SynthesizeParams): Promise<SynthesizedAudio> {
      const response = await client.audio.speech.create({
        model,
        voice,
        input: text,
        response_format: "mp3"
      });

      const audio = Buffer.from(await response.arrayBuffer());
      if (audio.length === 0) {
        throw new Error("TTS returned empty audio");
      }

      return {
        audio,
        contentType: response.headers.get("content-type") ?? "audio/mpeg"
      };
    }
  };
}
