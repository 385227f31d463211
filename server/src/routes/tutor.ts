import { randomUUID } from "node:crypto";

import type { FastifyBaseLogger, FastifyPluginAsync } from "fastify";
import type WebSocket from "ws";
import type { RawData } from "ws";
import { z } from "zod";

import type { Transcriber } from "../services/capabilities.js";
import { type ConversationPipeline, errorMessage } from "../services/pipeline.js";
import type { ConversationMode, ServerMessage, TurnRequest } from "../types.js";

type TutorRoutesOptions = {
  pipeline: ConversationPipeline;
  transcriber: Transcriber;
};

type ConnectionContext = {
  connectionId: string;
  socket: WebSocket;
  log: FastifyBaseLogger;
  /** Set once the socket closes; frames still queued behind it are dropped. */
  closed: boolean;
};

const turnFields = {
  mode: z.string(),
  scenario: z.string().nullish(),
  language: z.string().min(1)
};

const clientMessageSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("final_audio_blob"),
    audio_data: z.string().min(1),
    mime_type: z.string().optional(),
    ...turnFields
  }),
  z.object({
    type: z.literal("text_message"),
    text: z.string(),
    ...turnFields
  })
]);

type ClientMessage = z.infer<typeof clientMessageSchema>;

export const tutorRoutes: FastifyPluginAsync<TutorRoutesOptions> = async (app, options) => {
  app.get("/ws", { websocket: true }, (socket, request) => {
    const connection: ConnectionContext = {
      connectionId: randomUUID(),
      socket,
      log: request.log,
      closed: false
    };

    request.log.info({ connectionId: connection.connectionId }, "Client connected");

    // Messages from one socket are handled strictly in arrival order.
    let queue: Promise<void> = Promise.resolve();

    socket.on("message", (rawData: RawData) => {
      queue = queue
        .then(() => handleClientMessage(rawData, connection, options))
        .catch((error: unknown) => {
          request.log.error({ err: error }, "Failed to handle tutor client message");
          sendToClient(connection, {
            type: "backend_message",
            message: "An error occurred on the server.",
            error: errorMessage(error)
          });
        });
    });

    socket.on("close", () => {
      connection.closed = true;
      const discarded = options.pipeline.endConnection(connection.connectionId);
      request.log.info(
        { connectionId: connection.connectionId, discardedSession: discarded },
        "Client disconnected"
      );
    });
  });
};

async function handleClientMessage(
  rawData: RawData,
  connection: ConnectionContext,
  options: TutorRoutesOptions
): Promise<void> {
  if (connection.closed) {
    return;
  }

  let data: unknown;

  try {
    data = JSON.parse(rawDataToString(rawData));
  } catch {
    sendToClient(connection, {
      type: "backend_message",
      message: "Invalid message.",
      error: "message must be json"
    });
    return;
  }

  const parsed = clientMessageSchema.safeParse(data);
  if (!parsed.success) {
    sendToClient(connection, {
      type: "backend_message",
      message: "Invalid message.",
      error: parsed.error.message
    });
    return;
  }

  const send = (message: ServerMessage): void => sendToClient(connection, message);

  switch (parsed.data.type) {
    case "final_audio_blob": {
      let userText: string;
      try {
        userText = await options.transcriber.transcribe({
          audio: Buffer.from(parsed.data.audio_data, "base64"),
          mimeType: parsed.data.mime_type ?? "audio/webm"
        });
      } catch (error) {
        connection.log.error({ err: error, connectionId: connection.connectionId }, "Failed to transcribe audio");
        send({
          type: "backend_message",
          message: "Error processing audio.",
          error: errorMessage(error)
        });
        return;
      }

      if (connection.closed) {
        return;
      }

      send({ type: "transcription", text: userText });
      connection.log.info({ connectionId: connection.connectionId, transcript: userText }, "Transcribed audio");

      await options.pipeline.respond(toTurnRequest(connection.connectionId, userText, parsed.data), send);
      return;
    }
    case "text_message":
      connection.log.info({ connectionId: connection.connectionId, text: parsed.data.text }, "Text message");
      await options.pipeline.respond(
        toTurnRequest(connection.connectionId, parsed.data.text, parsed.data),
        send
      );
      return;
  }
}

function toTurnRequest(connectionId: string, userText: string, message: ClientMessage): TurnRequest {
  return {
    connectionId,
    userText,
    mode: parseMode(message.mode),
    scenario: message.scenario ?? undefined,
    languageCode: message.language
  };
}

function parseMode(value: string): ConversationMode {
  return value === "roleplay" ? "roleplay" : "freechat";
}

function sendToClient(connection: ConnectionContext, payload: ServerMessage): void {
  const { socket } = connection;
  if (socket.readyState !== socket.OPEN) {
    return;
  }

  socket.send(JSON.stringify(payload));
}

function rawDataToString(rawData: RawData): string {
  if (typeof rawData === "string") {
    return rawData;
  }

  if (Buffer.isBuffer(rawData)) {
    return rawData.toString("utf8");
  }

  if (Array.isArray(rawData)) {
    return Buffer.concat(rawData).toString("utf8");
  }

  return Buffer.from(rawData).toString("utf8");
}
