import path from "node:path";
import { fileURLToPath } from "node:url";

import dotenv from "dotenv";
import type { FastifyBaseLogger } from "fastify";
import OpenAI from "openai";

import {
  unavailableGenerator,
  unavailableSynthesizer,
  unavailableTranscriber,
  type Capabilities
} from "./capabilities.js";
import { parseSpeechCredential } from "./credentials.js";
import { type AppConfig, loadConfig } from "./env.js";
import { createOpenAiGenerator } from "./llm.js";
import { createOpenAiTranscriber } from "./stt.js";
import { createOpenAiSynthesizer } from "./tts.js";

const serviceDir = path.dirname(fileURLToPath(import.meta.url));
const rootEnvFile = path.resolve(serviceDir, "../../../.env");

dotenv.config({ path: rootEnvFile });
dotenv.config();

export const config = loadConfig();

/**
 * Builds the provider adapters. A missing or unreadable credential leaves the capability
 * disabled; its calls then fail when a turn runs.
 */
export function createCapabilities(appConfig: AppConfig, log: FastifyBaseLogger): Capabilities {
  const capabilities: Capabilities = {
    transcriber: unavailableTranscriber(),
    generator: unavailableGenerator(),
    synthesizer: unavailableSynthesizer()
  };

  if (appConfig.speechCredentials) {
    try {
      const credential = parseSpeechCredential(appConfig.speechCredentials);
      const speechClient = new OpenAI({
        apiKey: credential.apiKey,
        baseURL: credential.baseUrl
      });

      capabilities.transcriber = createOpenAiTranscriber(speechClient, appConfig.sttModel);
      capabilities.synthesizer = createOpenAiSynthesizer(speechClient, appConfig.ttsModel);
      log.info("Speech clients initialized");
    } catch (error) {
      log.error({ err: error }, "Could not initialize speech clients");
    }
  } else {
    log.warn("SPEECH_CREDENTIALS is not set; transcription and synthesis are disabled");
  }

  if (appConfig.openaiApiKey) {
    const generationClient = new OpenAI({
      apiKey: appConfig.openaiApiKey,
      baseURL: appConfig.openaiBaseUrl
    });

    capabilities.generator = createOpenAiGenerator(generationClient, appConfig.llmModel);
    log.info({ model: appConfig.llmModel }, "Generation model initialized");
  } else {
    log.warn("OPENAI_API_KEY is not set; generation is disabled");
  }

  return capabilities;
}
