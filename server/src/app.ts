import websocket from "@fastify/websocket";
import Fastify, { type FastifyBaseLogger, type FastifyError, type FastifyInstance } from "fastify";

import { landingRoutes } from "./routes/landing.js";
import { tutorRoutes } from "./routes/tutor.js";
import type { Capabilities } from "./services/capabilities.js";
import type { AppConfig } from "./services/env.js";
import { ConversationPipeline } from "./services/pipeline.js";
import { InMemorySessionStore, type SessionStore } from "./services/sessionStore.js";

export type BuildAppOptions = {
  config: Pick<AppConfig, "defaultVoice" | "logLevel" | "maxAudioBytes">;
  createCapabilities: (log: FastifyBaseLogger) => Capabilities;
  clientDir: string;
  store?: SessionStore;
};

export async function buildApp(options: BuildAppOptions): Promise<FastifyInstance> {
  const app = Fastify({
    logger: {
      level: options.config.logLevel
    }
  });

  const capabilities = options.createCapabilities(app.log);
  const pipeline = new ConversationPipeline({
    capabilities,
    store: options.store ?? new InMemorySessionStore(),
    defaultVoice: options.config.defaultVoice,
    log: app.log
  });

  await app.register(websocket, {
    options: {
      maxPayload: options.config.maxAudioBytes
    }
  });

  await app.register(tutorRoutes, {
    pipeline,
    transcriber: capabilities.transcriber
  });
  await app.register(landingRoutes, { root: options.clientDir });

  app.setErrorHandler<FastifyError>((error, _request, reply) => {
    reply.code(500).send({
      error: "internal_server_error",
      message: error.message
    });
  });

  return app;
}
