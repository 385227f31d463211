import type { FastifyBaseLogger } from "fastify";

import type { ConnectionSession, ServerMessage, Turn, TurnRequest, TurnResult } from "../types.js";
import {
  CapabilityUnavailableError,
  ContentSafetyError,
  missingCapabilities,
  type Capabilities
} from "./capabilities.js";
import { buildFreeChatPrompt } from "./prompts.js";
import { getScenarioContext, ROLEPLAY_READY_REPLY } from "./scenarios.js";
import type { SessionStore } from "./sessionStore.js";
import { toSpeechText } from "./speechText.js";
import { translateText } from "./translation.js";
import { selectVoice } from "./voices.js";

export const EMPTY_INPUT_REPLY = "I didn't hear anything. Could you speak up, please? 😊";
export const CONTENT_SAFETY_REPLY = "I'm sorry, I can't talk about that topic. Let's discuss something else!";
export const SERVER_ERROR_MESSAGE = "An error occurred on the server.";

export type PipelineOptions = {
  capabilities: Capabilities;
  store: SessionStore;
  defaultVoice: string;
  log: FastifyBaseLogger;
};

export type SendMessage = (message: ServerMessage) => void;

export class ConversationPipeline {
  public constructor(private readonly options: PipelineOptions) {}

  /**
   * Runs one turn: reply generation (roleplay or free chat), translation, speech-text
   * cleanup and synthesis. Rejects when a capability is missing or synthesis fails.
   */
  public async handleTurn(request: TurnRequest): Promise<TurnResult> {
    const { capabilities, defaultVoice, log } = this.options;

    const missing = missingCapabilities(capabilities);
    if (missing.length > 0) {
      throw new CapabilityUnavailableError(missing);
    }

    const originalEnglishText = request.userText.trim()
      ? await this.generateReply(request)
      : EMPTY_INPUT_REPLY;

    const translatedText = await translateText(
      originalEnglishText,
      request.languageCode,
      capabilities.generator,
      log
    );

    const { audio } = await capabilities.synthesizer.synthesize({
      text: toSpeechText(translatedText),
      languageCode: request.languageCode,
      voice: selectVoice(request.languageCode, defaultVoice)
    });

    return {
      audio,
      translatedText,
      originalEnglishText
    };
  }

  /** Runs a turn and reports the outcome to the connection; never rejects. */
  public async respond(request: TurnRequest, send: SendMessage): Promise<void> {
    const { log } = this.options;

    try {
      const result = await this.handleTurn(request);

      send({
        type: "audio_response",
        audio_data: result.audio.toString("base64"),
        translated_text: result.translatedText,
        original_english: result.originalEnglishText
      });

      log.info(
        { connectionId: request.connectionId, language: request.languageCode },
        "Sent tutor response"
      );
    } catch (error) {
      log.error({ err: error, connectionId: request.connectionId }, "Failed to process turn");
      send({
        type: "backend_message",
        message: SERVER_ERROR_MESSAGE,
        error: errorMessage(error)
      });
    }
  }

  public endConnection(connectionId: string): boolean {
    return this.options.store.delete(connectionId);
  }

  private async generateReply(request: TurnRequest): Promise<string> {
    const { capabilities, store } = this.options;
    const context = request.mode === "roleplay" ? getScenarioContext(request.scenario) : undefined;

    if (context === undefined || request.scenario === undefined) {
      store.delete(request.connectionId);

      try {
        return await capabilities.generator.complete(buildFreeChatPrompt(request.userText));
      } catch (error) {
        return this.describeGenerationFailure(error);
      }
    }

    return this.continueRoleplay(request.connectionId, request.scenario, context, request.userText);
  }

  private async continueRoleplay(
    connectionId: string,
    scenario: string,
    context: string,
    userText: string
  ): Promise<string> {
    const { capabilities, store } = this.options;

    const current = store.get(connectionId);
    const priorTurns: Turn[] =
      current && current.scenario === scenario
        ? current.turns
        : [
            { role: "user", text: context },
            { role: "model", text: ROLEPLAY_READY_REPLY }
          ];

    const pending: ConnectionSession = {
      scenario,
      turns: [...priorTurns, { role: "user", text: userText }]
    };
    store.put(connectionId, pending);

    let reply: string;
    try {
      reply = await capabilities.generator.chat(priorTurns, userText);
    } catch (error) {
      if (store.get(connectionId) === pending) {
        store.put(connectionId, { scenario, turns: priorTurns });
      }
      return this.describeGenerationFailure(error);
    }

    // The session may have been discarded (disconnect, mode switch) while generating.
    if (store.get(connectionId) === pending) {
      store.put(connectionId, {
        scenario,
        turns: [...pending.turns, { role: "model", text: reply }]
      });
    }

    return reply;
  }

  private describeGenerationFailure(error: unknown): string {
    if (error instanceof ContentSafetyError) {
      this.options.log.warn({ reason: error.message }, "Generation blocked by content policy");
      return CONTENT_SAFETY_REPLY;
    }

    this.options.log.error({ err: error }, "Generation failed");
    return `An error occurred: ${errorMessage(error)}`;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
