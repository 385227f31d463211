import Fastify, { type FastifyBaseLogger } from "fastify";

import type {
  Capabilities,
  Generator,
  SynthesizedAudio,
  SynthesizeParams,
  TranscribeParams,
  Transcriber,
  Synthesizer
} from "../src/services/capabilities.js";
import type { Turn } from "../src/types.js";

export type GeneratorCall =
  | { kind: "complete"; prompt: string }
  | { kind: "chat"; history: Turn[]; message: string };

type Responder = (call: GeneratorCall) => string | Promise<string>;

export class FakeGenerator implements Generator {
  public available = true;
  public readonly calls: GeneratorCall[] = [];

  public constructor(private readonly responder: Responder = () => "Great job! 😊") {}

  public async complete(prompt: string): Promise<string> {
    const call: GeneratorCall = { kind: "complete", prompt };
    this.calls.push(call);
    return this.responder(call);
  }

  public async chat(history: readonly Turn[], message: string): Promise<string> {
    const call: GeneratorCall = { kind: "chat", history: history.map((turn) => ({ ...turn })), message };
    this.calls.push(call);
    return this.responder(call);
  }
}

export class FakeTranscriber implements Transcriber {
  public available = true;
  public readonly calls: TranscribeParams[] = [];

  public constructor(private readonly transcript: string | Error = "hello genie") {}

  public async transcribe(params: TranscribeParams): Promise<string> {
    this.calls.push(params);
    if (this.transcript instanceof Error) {
      throw this.transcript;
    }
    return this.transcript;
  }
}

export class FakeSynthesizer implements Synthesizer {
  public available = true;
  public readonly calls: SynthesizeParams[] = [];

  public constructor(private readonly failure?: Error) {}

  public async synthesize(params: SynthesizeParams): Promise<SynthesizedAudio> {
    this.calls.push(params);
    if (this.failure) {
      throw this.failure;
    }
    return {
      audio: Buffer.from(`audio:${params.text}`, "utf8"),
      contentType: "audio/mpeg"
    };
  }
}

export type FakeCapabilities = {
  transcriber: FakeTranscriber;
  generator: FakeGenerator;
  synthesizer: FakeSynthesizer;
};

export function fakeCapabilities(overrides: Partial<FakeCapabilities> = {}): FakeCapabilities & Capabilities {
  return {
    transcriber: overrides.transcriber ?? new FakeTranscriber(),
    generator: overrides.generator ?? new FakeGenerator(),
    synthesizer: overrides.synthesizer ?? new FakeSynthesizer()
  };
}

export function silentLogger(): FastifyBaseLogger {
  return Fastify({ logger: false }).log;
}
