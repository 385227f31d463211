import { z } from "zod";

const optionalTrimmed = (value: unknown): unknown => {
  if (typeof value !== "string") {
    return value;
  }

  const trimmed = value.trim();
  return trimmed === "" ? undefined : trimmed;
};

const schema = z.object({
  OPENAI_API_KEY: z.preprocess(optionalTrimmed, z.string().optional()),
  OPENAI_BASE_URL: z.preprocess(
    optionalTrimmed,
    z.string().url("OPENAI_BASE_URL must be a valid URL").optional()
  ),
  SPEECH_CREDENTIALS: z.preprocess(optionalTrimmed, z.string().optional()),
  OPENAI_STT_MODEL: z.string().default("gpt-4o-mini-transcribe"),
  OPENAI_LLM_MODEL: z.string().default("gpt-4.1-mini"),
  OPENAI_TTS_MODEL: z.string().default("gpt-4o-mini-tts"),
  DEFAULT_VOICE: z.string().default("coral"),
  HOST: z.string().default("127.0.0.1"),
  PORT: z.coerce.number().int().min(1).max(65535).default(8787),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  MAX_AUDIO_BYTES: z.coerce
    .number()
    .int()
    .min(1024)
    .default(20 * 1024 * 1024)
});

export type LogLevel = z.infer<typeof schema>["LOG_LEVEL"];

export type AppConfig = {
  openaiApiKey?: string;
  openaiBaseUrl?: string;
  speechCredentials?: string;
  sttModel: string;
  llmModel: string;
  ttsModel: string;
  defaultVoice: string;
  host: string;
  port: number;
  logLevel: LogLevel;
  maxAudioBytes: number;
};

/**
 * Reads the process configuration. Missing provider keys are allowed and leave the
 * matching capability disabled; malformed values throw.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = schema.safeParse(env);
  if (!parsed.success) {
    throw new Error(`Invalid environment: ${parsed.error.message}`);
  }

  return {
    openaiApiKey: parsed.data.OPENAI_API_KEY,
    openaiBaseUrl: parsed.data.OPENAI_BASE_URL,
    speechCredentials: parsed.data.SPEECH_CREDENTIALS,
    sttModel: parsed.data.OPENAI_STT_MODEL,
    llmModel: parsed.data.OPENAI_LLM_MODEL,
    ttsModel: parsed.data.OPENAI_TTS_MODEL,
    defaultVoice: parsed.data.DEFAULT_VOICE,
    host: parsed.data.HOST,
    port: parsed.data.PORT,
    logLevel: parsed.data.LOG_LEVEL,
    maxAudioBytes: parsed.data.MAX_AUDIO_BYTES
  };
}
