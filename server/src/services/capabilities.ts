import type { Turn } from "../types.js";

export type TranscribeParams = {
  audio: Buffer;
  mimeType: string;
};

export type SynthesizeParams = {
  text: string;
  languageCode: string;
  voice: string;
};

export type SynthesizedAudio = {
  audio: Buffer;
  contentType: string;
};

export interface Transcriber {
  readonly available: boolean;
  transcribe(params: TranscribeParams): Promise<string>;
}

export interface Generator {
  readonly available: boolean;
  /** Single-shot generation without conversation context. */
  complete(prompt: string): Promise<string>;
  /** Generation continuing `history` with a new user `message`. */
  chat(history: readonly Turn[], message: string): Promise<string>;
}

export interface Synthesizer {
  readonly available: boolean;
  synthesize(params: SynthesizeParams): Promise<SynthesizedAudio>;
}

export type Capabilities = {
  transcriber: Transcriber;
  generator: Generator;
  synthesizer: Synthesizer;
};

export class CapabilityUnavailableError extends Error {
  public constructor(public readonly capabilities: readonly string[]) {
    super(`Capability not configured: ${capabilities.join(", ")}`);
    this.name = "CapabilityUnavailableError";
  }
}

/** The generation provider declined to answer on content-policy grounds. */
export class ContentSafetyError extends Error {
  public constructor(message = "Response blocked by content policy") {
    super(message);
    this.name = "ContentSafetyError";
  }
}

export function unavailableTranscriber(): Transcriber {
  return {
    available: false,
    transcribe: async () => {
      throw new CapabilityUnavailableError(["transcription"]);
    }
  };
}

export function unavailableGenerator(): Generator {
  const fail = async (): Promise<string> => {
    throw new CapabilityUnavailableError(["generation"]);
  };

  return {
    available: false,
    complete: fail,
    chat: fail
  };
}

export function unavailableSynthesizer(): Synthesizer {
  return {
    available: false,
    synthesize: async () => {
      throw new CapabilityUnavailableError(["synthesis"]);
    }
  };
}

export function missingCapabilities(capabilities: Capabilities): string[] {
  const missing: string[] = [];

  if (!capabilities.transcriber.available) {
    missing.push("transcription");
  }
  if (!capabilities.generator.available) {
    missing.push("generation");
  }
  if (!capabilities.synthesizer.available) {
    missing.push("synthesis");
  }

  return missing;
}
